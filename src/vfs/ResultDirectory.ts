import { buildSnapshot } from '../application/SnapshotBuilder.js';
import { createSearchQuery, type SearchResponse } from '../domain/model/SearchQuery.js';
import { isFresh, type Snapshot } from '../domain/model/Snapshot.js';
import type { SearchBackend } from '../domain/service/SearchBackend.js';
import { Mutex } from '../infrastructure/sync/Mutex.js';
import logger from '../infrastructure/logger/index.js';
import { BackendUnavailableError, NotFoundError } from './errors.js';
import { processOwner } from './identity.js';
import { ResultFile } from './ResultFile.js';
import type { Attr, DirectoryNode, Dirent } from './types.js';

export const DEFAULT_TTL_MS = 10000;

export interface ResultDirectoryOptions {
    ttlMs?: number;
    now?: () => Date;
}

/**
 * A directory whose entries are the matches of one search expression.
 *
 * Listings and lookups share one cached snapshot. The snapshot is refreshed
 * when it is older than the TTL; a failed refresh keeps the previous one.
 * All reads and the refresh run under `mutex`, so concurrent callers see
 * either the old snapshot or the new one and a stale directory triggers a
 * single search.
 */
export class ResultDirectory implements DirectoryNode {
    private readonly mutex = new Mutex();
    private snapshot: Snapshot | null = null;
    private readonly ttlMs: number;
    private readonly now: () => Date;

    constructor(
        private readonly backend: SearchBackend,
        readonly searchExpression: string,
        options: ResultDirectoryOptions = {}
    ) {
        this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
        this.now = options.now ?? (() => new Date());
    }

    attr(): Attr {
        return {
            type: 'directory',
            mode: 0o555,
            ...processOwner(),
            size: 0,
            mtime: this.snapshot?.refreshedAt ?? this.now()
        };
    }

    /** The snapshot currently served, or null before the first successful refresh. */
    currentSnapshot(): Snapshot | null {
        return this.snapshot;
    }

    /**
     * Returns the names of the current snapshot, searching again first when
     * there is none or it has expired.
     */
    async refresh(signal?: AbortSignal): Promise<readonly string[]> {
        const snapshot = await this.mutex.runExclusive(() => this.refreshLocked(signal));
        return snapshot.names;
    }

    async readDirAll(signal?: AbortSignal): Promise<Dirent[]> {
        const snapshot = await this.mutex.runExclusive(() => this.refreshLocked(signal));
        return snapshot.names.map((name): Dirent => ({
            name,
            type: snapshot.entries.get(name)?.dir ? 'directory' : 'file'
        }));
    }

    async lookup(name: string, signal?: AbortSignal): Promise<ResultFile> {
        let release = await this.mutex.acquire();
        let file: ResultFile;
        try {
            logger.debug(`Lookup("${name}") in "${this.searchExpression}"`);
            if (!this.snapshot) {
                // Looked up before ever being listed: seed the snapshot. Another
                // caller may refresh in between; whatever is current is used.
                release();
                await this.refresh(signal);
                release = await this.mutex.acquire();
            }

            const item = this.snapshot?.entries.get(name);
            const modTime = this.snapshot?.modTimes.get(name);
            if (!item || !modTime) {
                logger.debug(`Lookup("${name}") = not found`);
                throw new NotFoundError(`No entry named "${name}" in search "${this.searchExpression}"`);
            }
            logger.debug(`Lookup("${name}") = ${item.blobRef}`);
            file = new ResultFile(item.blobRef, modTime, item.file?.size ?? item.size ?? 0);
        } finally {
            release();
        }

        await this.logSchemaType(file.blobRef, signal);
        return file;
    }

    private async refreshLocked(signal?: AbortSignal): Promise<Snapshot> {
        const now = this.now();
        if (this.snapshot && isFresh(this.snapshot, now, this.ttlMs)) {
            logger.debug(`Serving "${this.searchExpression}" from cache`);
            return this.snapshot;
        }

        logger.debug(`Searching for "${this.searchExpression}"`);
        let response: SearchResponse;
        try {
            response = await this.backend.query(createSearchQuery(this.searchExpression), signal);
        } catch (error) {
            logger.error(`Search for "${this.searchExpression}" failed:`, error);
            throw new BackendUnavailableError(
                `Search for "${this.searchExpression}" failed`,
                { cause: error }
            );
        }

        const snapshot = buildSnapshot(response, this.now());
        this.snapshot = snapshot;
        logger.debug(`Search for "${this.searchExpression}" returned ${snapshot.names.length} entries`);
        return snapshot;
    }

    private async logSchemaType(blobRef: string, signal?: AbortSignal): Promise<void> {
        try {
            const meta = await this.backend.fetchSchemaMeta(blobRef, signal);
            logger.debug(`Blob ${blobRef} has type ${meta.camliType}`);
        } catch (error) {
            logger.debug(`Could not fetch schema meta for ${blobRef}:`, error);
        }
    }
}
