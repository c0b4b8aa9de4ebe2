export interface Owner {
    uid: number;
    gid: number;
}

// getuid/getgid are absent on Windows.
export function processOwner(): Owner {
    return {
        uid: process.getuid?.() ?? 0,
        gid: process.getgid?.() ?? 0
    };
}
