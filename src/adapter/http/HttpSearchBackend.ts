import { z } from 'zod';
import type { DescribedBlob } from '../../domain/model/DescribedBlob.js';
import type { SchemaMeta, SearchQuery, SearchResponse } from '../../domain/model/SearchQuery.js';
import type { SearchBackend } from '../../domain/service/SearchBackend.js';
import logger from '../../infrastructure/logger/index.js';

const describedBlobSchema = z.object({
    blobRef: z.string(),
    camliType: z.string().optional(),
    size: z.number().optional(),
    file: z.object({
        fileName: z.string().default(''),
        mimeType: z.string().default(''),
        size: z.number().default(0),
        time: z.string().optional()
    }).optional(),
    dir: z.object({
        fileName: z.string().default('')
    }).optional(),
    permanode: z.object({
        attr: z.record(z.array(z.string())).default({})
    }).optional()
});

const searchResponseSchema = z.object({
    blobs: z.array(z.object({ blob: z.string() })).nullish(),
    description: z.object({
        meta: z.record(z.unknown()).nullish()
    }).nullish()
});

const schemaMetaSchema = z.object({
    camliType: z.string()
});

export interface HttpSearchBackendOptions {
    url: string;
    authToken?: string;
    timeoutMs?: number;
    fetch?: typeof fetch;
}

/**
 * Search backend reached over HTTP/JSON.
 */
export class HttpSearchBackend implements SearchBackend {
    private baseUrl: string;
    private authToken: string | undefined;
    private timeoutMs: number;
    private fetchFn: typeof fetch;

    constructor(options: HttpSearchBackendOptions) {
        this.baseUrl = options.url.replace(/\/+$/, '');
        this.authToken = options.authToken;
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.fetchFn = options.fetch ?? fetch;
        logger.debug(`HttpSearchBackend initialized with url=${this.baseUrl}`);
    }

    async query(request: SearchQuery, signal?: AbortSignal): Promise<SearchResponse> {
        const body = await this.request('POST', '/search/query', request, signal);
        const parsed = searchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new SearchBackendError(`Invalid search response: ${parsed.error.message}`);
        }

        const blobs = (parsed.data.blobs ?? []).map(b => b.blob);
        const rawMeta = parsed.data.description?.meta;
        if (!rawMeta) {
            return { blobs, description: null };
        }

        // Entries that don't decode are left out; the matches pointing at
        // them are then skipped as undescribed.
        const meta = new Map<string, DescribedBlob>();
        for (const [ref, raw] of Object.entries(rawMeta)) {
            const described = describedBlobSchema.safeParse(raw);
            if (described.success) {
                meta.set(ref, described.data);
            } else {
                logger.debug(`Ignoring undecodable description for ${ref}: ${described.error.message}`);
            }
        }
        return { blobs, description: { meta } };
    }

    async fetchSchemaMeta(blobRef: string, signal?: AbortSignal): Promise<SchemaMeta> {
        const body = await this.request('GET', `/blob/${encodeURIComponent(blobRef)}`, undefined, signal);
        const parsed = schemaMetaSchema.safeParse(body);
        if (!parsed.success) {
            throw new SearchBackendError(`Blob ${blobRef} is not a schema blob`);
        }
        return parsed.data;
    }

    private async request(
        method: string,
        path: string,
        body: unknown,
        signal?: AbortSignal
    ): Promise<unknown> {
        const timeout = AbortSignal.timeout(this.timeoutMs);
        const headers: Record<string, string> = { 'Accept': 'application/json' };
        if (body !== undefined) {
            headers['Content-Type'] = 'application/json';
        }
        if (this.authToken) {
            headers['Authorization'] = `Bearer ${this.authToken}`;
        }

        let response: Response;
        try {
            response = await this.fetchFn(`${this.baseUrl}${path}`, {
                method,
                headers,
                body: body === undefined ? undefined : JSON.stringify(body),
                signal: signal ? AbortSignal.any([signal, timeout]) : timeout
            });
        } catch (error) {
            this.handleError(error);
            throw error;
        }

        if (!response.ok) {
            const detail = await response.text().catch(() => '');
            throw new SearchBackendError(
                `${method} ${path} failed with status ${response.status}${detail ? `: ${detail}` : ''}`,
                response.status
            );
        }

        try {
            return await response.json();
        } catch (error) {
            throw new SearchBackendError(`${method} ${path} returned invalid JSON`, response.status, { cause: error });
        }
    }

    private handleError(error: unknown): void {
        if (error instanceof Error) {
            if (error.name === 'TimeoutError') {
                throw new SearchBackendConnectionError(
                    `Search backend at ${this.baseUrl} did not answer within ${this.timeoutMs}ms`,
                    { cause: error }
                );
            }
            if (error.name === 'AbortError') {
                return;
            }
            if (error.message.includes('ECONNREFUSED') || error.message.includes('fetch failed')) {
                throw new SearchBackendConnectionError(
                    `Cannot connect to search backend at ${this.baseUrl}`,
                    { cause: error }
                );
            }
        }
    }
}

export class SearchBackendError extends Error {
    constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchBackendError';
    }
}

export class SearchBackendConnectionError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'SearchBackendConnectionError';
    }
}
