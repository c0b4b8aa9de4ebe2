export type Errno = 'EIO' | 'ENOENT';

/** An error the filesystem layer reports to its caller as an errno. */
export class FilesystemError extends Error {
    constructor(message: string, readonly errno: Errno, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'FilesystemError';
    }
}

export class BackendUnavailableError extends FilesystemError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'EIO', options);
        this.name = 'BackendUnavailableError';
    }
}

export class NotFoundError extends FilesystemError {
    constructor(message: string) {
        super(message, 'ENOENT');
        this.name = 'NotFoundError';
    }
}
