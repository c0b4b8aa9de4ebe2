import type { Attr, FileNode } from './types.js';
import { processOwner } from './identity.js';

/** A read-only file whose content lives in memory. */
export class StaticFile implements FileNode {
    readonly blobRef = null;
    private readonly content: Buffer;

    constructor(text: string, private readonly modTime: Date = new Date()) {
        this.content = Buffer.from(text, 'utf-8');
    }

    attr(): Attr {
        return {
            type: 'file',
            mode: 0o400,
            ...processOwner(),
            size: this.content.length,
            mtime: this.modTime
        };
    }

    readAll(): Buffer {
        return this.content;
    }
}
