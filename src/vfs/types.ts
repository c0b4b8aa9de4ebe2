export type NodeType = 'file' | 'directory';

export interface Attr {
    type: NodeType;
    /** Permission bits, without the file type bits. */
    mode: number;
    uid: number;
    gid: number;
    size: number;
    mtime: Date;
}

export interface Dirent {
    name: string;
    type: NodeType;
}

export interface Node {
    attr(): Attr;
}

export interface DirectoryNode extends Node {
    readDirAll(signal?: AbortSignal): Promise<Dirent[]>;
    lookup(name: string, signal?: AbortSignal): Promise<Node>;
}

export interface FileNode extends Node {
    readonly blobRef: string | null;
}

export function isDirectoryNode(node: Node): node is DirectoryNode {
    return 'readDirAll' in node && 'lookup' in node;
}
