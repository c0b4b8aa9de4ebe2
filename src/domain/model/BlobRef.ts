/**
 * A content-addressed blob identifier of the form `<hashName>-<hexDigest>`,
 * e.g. `sha224-3a9f...`.
 */
export interface BlobRef {
    hashName: string;
    digest: string;
}

const BLOB_REF_PATTERN = /^([a-z][a-z0-9]*)-([0-9a-f]+)$/;

export function parseBlobRef(value: string | undefined): BlobRef | null {
    if (!value) {
        return null;
    }
    const match = BLOB_REF_PATTERN.exec(value);
    if (!match || match[1] === undefined || match[2] === undefined) {
        return null;
    }
    return { hashName: match[1], digest: match[2] };
}

export function formatBlobRef(ref: BlobRef): string {
    return `${ref.hashName}-${ref.digest}`;
}
