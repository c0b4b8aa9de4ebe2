import type { DescribedBlob } from './DescribedBlob.js';

/** Relations resolved for every match so its content item can be described. */
export const CONTENT_ATTR = 'content';
export const DESCRIBE_ATTRS = [CONTENT_ATTR, 'content-image', 'member'] as const;

/** Limit value meaning "everything the backend has". */
export const UNLIMITED = -1;

export interface DescribeRule {
    attrs: string[];
}

export interface SearchQuery {
    expression: string;
    limit: number;
    describe: {
        rules: DescribeRule[];
    };
}

export interface SearchResponse {
    /** Matched blob refs, in rank order. */
    blobs: string[];
    description: {
        meta: Map<string, DescribedBlob>;
    } | null;
}

export interface SchemaMeta {
    camliType: string;
}

export function createSearchQuery(expression: string): SearchQuery {
    return {
        expression,
        limit: UNLIMITED,
        describe: {
            rules: [{ attrs: [...DESCRIBE_ATTRS] }]
        }
    };
}
