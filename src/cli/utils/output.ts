import type { Attr, Dirent } from '../../vfs/types.js';

export function formatListing(expression: string, entries: Dirent[], json: boolean): string {
    if (json) {
        return JSON.stringify({ expression, entries }, null, 2);
    }

    if (entries.length === 0) {
        return 'No matches.';
    }

    return entries
        .map(entry => entry.type === 'directory' ? `${entry.name}/` : entry.name)
        .join('\n');
}

export function formatMode(attr: Attr): string {
    const bits = ['r', 'w', 'x'];
    let out = attr.type === 'directory' ? 'd' : '-';
    for (let shift = 6; shift >= 0; shift -= 3) {
        const triple = (attr.mode >> shift) & 0o7;
        out += bits.map((bit, i) => (triple & (0o4 >> i)) ? bit : '-').join('');
    }
    return out;
}

export function formatAttr(name: string, attr: Attr, blobRef: string | null, json: boolean): string {
    if (json) {
        return JSON.stringify({
            name,
            type: attr.type,
            mode: attr.mode.toString(8).padStart(4, '0'),
            uid: attr.uid,
            gid: attr.gid,
            size: attr.size,
            mtime: attr.mtime.toISOString(),
            blobRef
        }, null, 2);
    }

    const lines = [
        `Name: ${name}`,
        `Mode: ${formatMode(attr)}`,
        `Owner: ${attr.uid}:${attr.gid}`,
        `Size: ${attr.size}`,
        `Modified: ${attr.mtime.toISOString()}`
    ];
    if (blobRef) {
        lines.push(`Blob: ${blobRef}`);
    }
    return lines.join('\n');
}

export function formatError(message: string): string {
    return `Error: ${message}`;
}
