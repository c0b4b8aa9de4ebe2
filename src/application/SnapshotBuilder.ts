import { formatBlobRef } from '../domain/model/BlobRef.js';
import { resolveContent, type ContentShape } from '../domain/model/ContentShape.js';
import type { DescribedBlob } from '../domain/model/DescribedBlob.js';
import type { SearchResponse } from '../domain/model/SearchQuery.js';
import type { Snapshot } from '../domain/model/Snapshot.js';
import logger from '../infrastructure/logger/index.js';

const FALLBACK_NAME_LENGTH = 10;

type ResolvedShape = Exclude<ContentShape, { kind: 'unresolved' }>;

/**
 * Projects a search response into a snapshot of display names.
 *
 * Matches that cannot be resolved to a file or directory are skipped. A
 * name that is empty or already taken falls back to a prefix of the content
 * digest; if that is taken too, the match is dropped.
 */
export function buildSnapshot(response: SearchResponse, now: Date): Snapshot {
    const meta = response.description?.meta ?? null;
    const entries = new Map<string, DescribedBlob>();
    const modTimes = new Map<string, Date>();
    const names: string[] = [];

    for (const matchRef of response.blobs) {
        const shape = resolveContent(matchRef, meta);
        if (shape.kind === 'unresolved') {
            logger.debug(`Skipping match ${matchRef}: ${shape.reason}`);
            continue;
        }

        const name = chooseName(shape, entries);
        if (name === null) {
            logger.debug(`Skipping match ${matchRef}: fallback name for ${formatBlobRef(shape.ref)} already taken`);
            continue;
        }

        const modTime = (shape.kind === 'file' ? shape.time : null) ?? now;
        entries.set(name, shape.item);
        modTimes.set(name, modTime);
        names.push(name);
        logger.debug(`Name "${name}" = ${formatBlobRef(shape.ref)} (at ${modTime.toISOString()})`);
    }

    return { entries, modTimes, names, refreshedAt: now };
}

function chooseName(shape: ResolvedShape, taken: ReadonlyMap<string, DescribedBlob>): string | null {
    if (shape.name !== '' && !taken.has(shape.name)) {
        return shape.name;
    }

    let ext = extensionOf(shape.name);
    if (ext === '' && shape.kind === 'file' && shape.mimeType.endsWith('image/jpeg')) {
        ext = '.jpg';
    }
    const fallback = shape.ref.digest.slice(0, FALLBACK_NAME_LENGTH) + ext;
    return taken.has(fallback) ? null : fallback;
}

// Suffix from the last dot of the final segment, dot included; dotfiles
// such as ".profile" are all extension.
function extensionOf(name: string): string {
    const segment = name.slice(name.lastIndexOf('/') + 1);
    const dot = segment.lastIndexOf('.');
    return dot === -1 ? '' : segment.slice(dot);
}
