import { formatBlobRef, parseBlobRef, type BlobRef } from './BlobRef.js';
import type { DescribedBlob } from './DescribedBlob.js';
import { CONTENT_ATTR } from './SearchQuery.js';

export type ContentShape =
    | {
        kind: 'file';
        ref: BlobRef;
        item: DescribedBlob;
        name: string;
        mimeType: string;
        /** The file's own timestamp, or null when unknown or zero. */
        time: Date | null;
    }
    | {
        kind: 'directory';
        ref: BlobRef;
        item: DescribedBlob;
        name: string;
    }
    | {
        kind: 'unresolved';
        reason: string;
    };

function unresolved(reason: string): ContentShape {
    return { kind: 'unresolved', reason };
}

/**
 * Follows a search match's `content` relation to the item it points at and
 * classifies that item as a file or a directory.
 */
export function resolveContent(
    matchRef: string,
    meta: ReadonlyMap<string, DescribedBlob> | null
): ContentShape {
    if (!meta) {
        return unresolved('response carries no description');
    }
    const match = meta.get(matchRef);
    if (!match) {
        return unresolved(`no description for ${matchRef}`);
    }
    if (!match.permanode) {
        return unresolved(`${matchRef} is not a permanode`);
    }
    const contentValue = match.permanode.attr[CONTENT_ATTR]?.[0];
    const contentRef = parseBlobRef(contentValue);
    if (!contentRef) {
        return unresolved(`${matchRef} has no valid ${CONTENT_ATTR} attribute`);
    }
    const contentKey = formatBlobRef(contentRef);
    const item = meta.get(contentKey);
    if (!item) {
        return unresolved(`no description for content ${contentKey}`);
    }

    if (item.file) {
        return {
            kind: 'file',
            ref: contentRef,
            item,
            name: item.file.fileName,
            mimeType: item.file.mimeType,
            time: parseKnownTime(item.file.time)
        };
    }
    if (item.dir) {
        return { kind: 'directory', ref: contentRef, item, name: item.dir.fileName };
    }
    return unresolved(`content ${contentKey} is neither a file nor a directory`);
}

const YEAR_ONE_MS = Date.parse('0001-01-01T00:00:00Z');

// The Unix epoch and the year-1 zero value count as "not recorded".
export function parseKnownTime(value: string | undefined): Date | null {
    if (!value) {
        return null;
    }
    const ms = Date.parse(value);
    if (Number.isNaN(ms) || ms === 0 || ms === YEAR_ONE_MS) {
        return null;
    }
    return new Date(ms);
}
