import type { PaperRecord } from './paper.js';

/**
 * Error returned as a value. `metadata` carries whatever was gathered
 * before the failure.
 */
export interface ErrorResult<M extends object = object> {
    status: 'error';
    message: string;
    metadata: M;
}

export type Success<T extends object> = { status: 'success' } & T;

/**
 * Search metadata. Adapters add their own paging fields.
 */
export interface SearchMeta {
    total_results: number;
    search_query?: string;
    search_note?: string;
    [key: string]: string | number | undefined;
}

export interface SearchResult<T extends PaperRecord = PaperRecord> {
    data: T[];
    meta: SearchMeta;
    links?: Record<string, string>;
}

/**
 * Narrow a value to an error result.
 */
export function isErrorResult(value: object): value is ErrorResult {
    return 'status' in value && value.status === 'error';
}
