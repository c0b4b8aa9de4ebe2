import { HttpSearchBackend } from '../adapter/http/HttpSearchBackend.js';
import type { SearchfsConfig } from '../domain/model/Config.js';
import type { SearchBackend } from '../domain/service/SearchBackend.js';
import { QueryDirectory } from '../vfs/QueryDirectory.js';

export interface SearchFilesystem {
    backend: SearchBackend;
    root: QueryDirectory;
}

export function createSearchFilesystem(
    config: SearchfsConfig,
    backend: SearchBackend = new HttpSearchBackend(config.backend)
): SearchFilesystem {
    return {
        backend,
        root: new QueryDirectory(backend, { ttlMs: config.cache.ttlMs })
    };
}
