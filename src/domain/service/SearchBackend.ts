import type { SchemaMeta, SearchQuery, SearchResponse } from '../model/SearchQuery.js';

export interface SearchBackend {
    query(request: SearchQuery, signal?: AbortSignal): Promise<SearchResponse>;
    fetchSchemaMeta(blobRef: string, signal?: AbortSignal): Promise<SchemaMeta>;
}
