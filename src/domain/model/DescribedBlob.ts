export interface FileDescription {
    fileName: string;
    mimeType: string;
    size: number;
    /** RFC 3339 timestamp of the file's own modification time, if recorded. */
    time?: string;
}

export interface DirectoryDescription {
    fileName: string;
}

export interface PermanodeDescription {
    /** Attribute name to its values; single-valued attributes hold one element. */
    attr: Record<string, string[]>;
}

/**
 * Backend-resolved metadata for one blob. At most one of `file`, `dir`
 * and `permanode` is normally set.
 */
export interface DescribedBlob {
    blobRef: string;
    camliType?: string;
    size?: number;
    file?: FileDescription;
    dir?: DirectoryDescription;
    permanode?: PermanodeDescription;
}
