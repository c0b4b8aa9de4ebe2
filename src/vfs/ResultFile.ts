import type { Attr, FileNode } from './types.js';
import { processOwner } from './identity.js';

/**
 * A search match exposed as a file. Reading its bytes goes through the
 * blob store and is not handled here.
 */
export class ResultFile implements FileNode {
    constructor(
        readonly blobRef: string,
        private readonly modTime: Date,
        private readonly size: number
    ) {}

    attr(): Attr {
        return {
            type: 'file',
            mode: 0o666,
            ...processOwner(),
            size: this.size,
            mtime: this.modTime
        };
    }
}
