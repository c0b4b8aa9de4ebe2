import type { SearchBackend } from '../domain/service/SearchBackend.js';
import { processOwner } from './identity.js';
import { ResultDirectory, type ResultDirectoryOptions } from './ResultDirectory.js';
import { StaticFile } from './StaticFile.js';
import type { Attr, DirectoryNode, Dirent } from './types.js';

export const README_NAME = 'README.txt';

export const SEARCH_README = `
You are now in the "search" filesystem, where you can use
the content store's search from the mount.

Usage: cd "<search query>", e.g.:

	cd "after:\\"2015-10-01\\" and is:image"

`;

/**
 * Root of the search mount. Every name other than the readme is taken as a
 * search expression and opens a fresh result directory for it.
 */
export class QueryDirectory implements DirectoryNode {
    private readonly readme = new StaticFile(SEARCH_README);

    constructor(
        private readonly backend: SearchBackend,
        private readonly options: ResultDirectoryOptions = {}
    ) {}

    attr(): Attr {
        return {
            type: 'directory',
            mode: 0o500,
            ...processOwner(),
            size: 0,
            mtime: new Date()
        };
    }

    async readDirAll(): Promise<Dirent[]> {
        return [{ name: README_NAME, type: 'file' }];
    }

    async lookup(name: string): Promise<StaticFile | ResultDirectory> {
        if (name === README_NAME) {
            return this.readme;
        }
        return new ResultDirectory(this.backend, name, this.options);
    }
}
