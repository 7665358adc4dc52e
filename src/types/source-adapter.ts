import type { PaperRecord, PaperSource } from './paper.js';
import type { ErrorResult, SearchResult } from './result.js';
import type { AppConfig } from './config.js';
import type { HttpClient } from '../utils/http-client.js';

/**
 * Structured search filters. Each adapter reads only the fields listed in
 * its `capabilities`; anything else is ignored.
 */
export interface SearchFilter {
    /** Free-text query */
    query?: string;
    /** OSF provider id (e.g. 'psyarxiv') */
    providerId?: string;
    /** OSF subject filter */
    subjects?: string;
    /** arXiv category (e.g. 'cs.AI') */
    category?: string;
    /** OpenAlex concept name */
    concepts?: string;
    author?: string;
    title?: string;
    publisher?: string;
    institution?: string;
    /** ISO date (YYYY-MM-DD) */
    datePublishedGte?: string;
    maxResults?: number;
    /** 1-based page (OpenAlex) */
    page?: number;
    /** 0-based offset (arXiv) */
    startIndex?: number;
}

export type FilterField = keyof SearchFilter;

/**
 * Record field carrying the downloadable PDF link after `fetchOne`.
 */
export type PdfUrlField = 'pdf_url' | 'download_url';

/**
 * Interface for paper source adapters (arXiv, OSF, OpenAlex).
 * Each adapter normalizes results into PaperRecord subtypes.
 */
export interface SourceAdapter<T extends PaperRecord = PaperRecord> {
    /** Human-readable source name */
    readonly name: string;

    readonly sourceId: PaperSource;

    /** Filter fields this source's API understands */
    readonly capabilities: ReadonlySet<FilterField>;

    readonly pdfUrlField: PdfUrlField;

    /**
     * Search the source with the supported subset of `filters`.
     */
    search(filters: SearchFilter): Promise<SearchResult<T>>;

    /**
     * Fetch one paper's metadata by its source-specific id.
     * An error value is returned (not thrown) when partial metadata was
     * collected but the download link is missing.
     */
    fetchOne(id: string): Promise<T | ErrorResult<T>>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** Shared HTTP client (defaults to the process-wide one) */
    httpClient?: HttpClient;

    /** Endpoints, timeouts and contact email */
    config?: Pick<AppConfig, 'endpoints' | 'timeouts' | 'email'>;
}
