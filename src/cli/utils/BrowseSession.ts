import { FilesystemError } from '../../vfs/errors.js';
import { StaticFile } from '../../vfs/StaticFile.js';
import { isDirectoryNode, type DirectoryNode, type Node } from '../../vfs/types.js';
import { formatAttr, formatError, formatListing } from './output.js';

export interface SessionResult {
    output: string;
    exit?: boolean;
}

interface Frame {
    name: string;
    dir: DirectoryNode;
}

const HELP = [
    'Commands:',
    '  ls                 list the current directory',
    '  cd <name>          enter a search expression or result directory',
    '  cd ..              go back up',
    '  stat <name>        show the attributes of an entry',
    '  cat <name>         print a static file',
    '  pwd                show the current path',
    '  help               show this help',
    '  exit               leave the shell'
].join('\n');

/**
 * Interactive navigation over a search mount. Directories entered stay open
 * while the session is inside them, so their cached listings are reused.
 */
export class BrowseSession {
    private stack: Frame[];

    constructor(root: DirectoryNode) {
        this.stack = [{ name: '', dir: root }];
    }

    cwd(): string {
        const parts = this.stack.slice(1).map(frame => frame.name);
        return '/' + parts.join('/');
    }

    prompt(): string {
        return `searchfs:${this.cwd()}> `;
    }

    async execute(line: string): Promise<SessionResult> {
        const trimmed = line.trim();
        if (trimmed === '') {
            return { output: '' };
        }
        const spaceAt = trimmed.indexOf(' ');
        const command = spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt);
        const arg = spaceAt === -1 ? '' : unquote(trimmed.slice(spaceAt + 1).trim());

        try {
            switch (command) {
                case 'ls':
                    return { output: formatListing(this.cwd(), await this.current().readDirAll(), false) };
                case 'cd':
                    return await this.changeDirectory(arg);
                case 'stat':
                    return await this.stat(arg);
                case 'cat':
                    return await this.cat(arg);
                case 'pwd':
                    return { output: this.cwd() };
                case 'help':
                    return { output: HELP };
                case 'exit':
                case 'quit':
                    return { output: '', exit: true };
                default:
                    return { output: formatError(`Unknown command: ${command} (try "help")`) };
            }
        } catch (error) {
            if (error instanceof FilesystemError) {
                return { output: formatError(`${error.message} (${error.errno})`) };
            }
            throw error;
        }
    }

    private current(): DirectoryNode {
        const top = this.stack[this.stack.length - 1];
        if (!top) {
            throw new Error('Browse session has no current directory');
        }
        return top.dir;
    }

    private async changeDirectory(name: string): Promise<SessionResult> {
        if (name === '' || name === '/') {
            this.stack = this.stack.slice(0, 1);
            return { output: '' };
        }
        if (name === '..') {
            if (this.stack.length > 1) {
                this.stack.pop();
            }
            return { output: '' };
        }

        const node = await this.current().lookup(name);
        if (!isDirectoryNode(node)) {
            return { output: formatError(`${name}: Not a directory`) };
        }
        this.stack.push({ name, dir: node });
        return { output: '' };
    }

    private async stat(name: string): Promise<SessionResult> {
        if (name === '') {
            return { output: formatError('stat needs a name') };
        }
        const node = await this.current().lookup(name);
        return { output: formatAttr(name, node.attr(), blobRefOf(node), false) };
    }

    private async cat(name: string): Promise<SessionResult> {
        if (name === '') {
            return { output: formatError('cat needs a name') };
        }
        const node = await this.current().lookup(name);
        if (!(node instanceof StaticFile)) {
            return { output: formatError(`${name}: content is served by the blob store, not by searchfs`) };
        }
        return { output: node.readAll().toString('utf-8') };
    }
}

export function blobRefOf(node: Node): string | null {
    return 'blobRef' in node && typeof node.blobRef === 'string' ? node.blobRef : null;
}

function unquote(value: string): string {
    if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
        return value.slice(1, -1).replace(/\\"/g, '"');
    }
    return value;
}
