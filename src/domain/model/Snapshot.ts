import type { DescribedBlob } from './DescribedBlob.js';

/**
 * One complete projection of a search response into display names.
 * Produced by a single refresh and never modified afterwards.
 */
export interface Snapshot {
    /** Display name to the described content item, in result order. */
    entries: ReadonlyMap<string, DescribedBlob>;
    /** Display name to best-known modification time. */
    modTimes: ReadonlyMap<string, Date>;
    names: readonly string[];
    refreshedAt: Date;
}

export function isFresh(snapshot: Snapshot, now: Date, ttlMs: number): boolean {
    return now.getTime() - snapshot.refreshedAt.getTime() < ttlMs;
}
