import {
    DEFAULT_CONFIG,
    type FilterField,
    type OpenAlexPaper,
    type SearchFilter,
    type SearchResult,
    type SourceAdapter,
    type SourceAdapterOptions,
} from '../types/index.js';
import { getHttpClient, HttpError, ResponseParseError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { sanitizeQuery } from '../utils/sanitize.js';
import { NotFoundError, UpstreamParseError, UpstreamRequestError } from '../utils/errors.js';
import { buildQueryString, reconstructAbstract, stripDoiPrefix, unsupportedFilters } from './utils.js';

const logger = getLogger();

const OPENALEX_ID_PREFIX = 'https://openalex.org/';

/** OpenAlex caps `per_page` at 200 */
const MAX_PAGE_SIZE = 200;

/**
 * OpenAlex API response types (subset of relevant fields).
 */
interface OpenAlexLocation {
    pdf_url?: string | null;
    landing_page_url?: string | null;
    is_oa?: boolean;
    source?: { display_name?: string | null } | null;
}

interface OpenAlexWork {
    id?: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_date?: string | null;
    publication_year?: number | null;
    updated_date?: string | null;
    abstract_inverted_index?: unknown;
    primary_location?: OpenAlexLocation | null;
    locations?: OpenAlexLocation[];
    cited_by_count?: number;
    authorships?: Array<{ author?: { display_name?: string | null } | null }>;
    concepts?: Array<{ display_name?: string | null }>;
    open_access?: { oa_status?: string | null } | null;
    type?: string | null;
    relevance_score?: number | null;
}

interface OpenAlexSearchResponse {
    meta?: { count?: number; next_page?: number | string | null };
    results?: OpenAlexWork[];
}

/**
 * Filter fields and the OpenAlex `filter` key each one searches.
 * Order is the order of the comma-joined filter expression.
 */
const FILTER_KEYS: ReadonlyArray<{ field: FilterField; key: string; maxLength: number }> = [
    { field: 'author', key: 'authors.author_name.search', maxLength: 200 },
    { field: 'title', key: 'title.search', maxLength: 500 },
    { field: 'publisher', key: 'publisher.search', maxLength: 200 },
    { field: 'institution', key: 'institutions.institution_name.search', maxLength: 200 },
    { field: 'concepts', key: 'concepts.display_name.search', maxLength: 200 },
];

/**
 * OpenAlex source adapter over the `/works` endpoint.
 *
 * @see https://docs.openalex.org/
 */
export class OpenAlexAdapter implements SourceAdapter<OpenAlexPaper> {
    readonly name = 'OpenAlex';
    readonly sourceId = 'openalex' as const;
    readonly pdfUrlField = 'pdf_url' as const;
    readonly capabilities: ReadonlySet<FilterField> = new Set<FilterField>([
        'query', 'author', 'title', 'publisher', 'institution', 'concepts',
        'datePublishedGte', 'maxResults', 'page',
    ]);
    private readonly httpClient: HttpClient;
    private readonly config: NonNullable<SourceAdapterOptions['config']>;

    constructor(options?: SourceAdapterOptions) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.config = options?.config ?? DEFAULT_CONFIG;
    }

    async search(filters: SearchFilter): Promise<SearchResult<OpenAlexPaper>> {
        const ignored = unsupportedFilters(filters, this.capabilities);
        if (ignored.length > 0) {
            logger.debug({ ignored }, 'OpenAlex ignores filters');
        }

        const perPage = Math.min(filters.maxResults ?? 20, MAX_PAGE_SIZE);
        const page = filters.page ?? 1;

        const params: Array<[string, string | number]> = [];
        if (filters.query) {
            params.push(['search', sanitizeQuery(filters.query, 500)]);
        }
        const filterExpression = buildFilterExpression(filters);
        if (filterExpression) {
            params.push(['filter', filterExpression]);
        }
        params.push(['per_page', perPage], ['page', page]);
        this.addPoliteParams(params);

        const url = `${this.config.endpoints.openalexApi}/works?${buildQueryString(params, { safe: ':,', spaceAsPlus: true })}`;
        logger.debug({ url }, 'OpenAlex search');

        let body: OpenAlexSearchResponse;
        try {
            const response = await this.httpClient.getJson<OpenAlexSearchResponse>(url, {
                source: 'openalex',
                timeout: this.config.timeouts.request,
            });
            body = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new UpstreamRequestError(`Request failed: ${error.message}`, error);
            }
            if (error instanceof ResponseParseError) {
                throw new UpstreamParseError(`Failed to parse OpenAlex response: ${error.message}`, error);
            }
            throw error;
        }

        const result: SearchResult<OpenAlexPaper> = {
            data: (body.results ?? []).map(normalizeWork),
            meta: {
                total_results: body.meta?.count ?? 0,
                page,
                per_page: perPage,
                search_query: filters.query,
            },
        };

        const nextPage = body.meta?.next_page;
        if (nextPage !== undefined && nextPage !== null) {
            result.links = { next_page: String(nextPage) };
        }

        return result;
    }

    async fetchOne(workId: string): Promise<OpenAlexPaper> {
        const params: Array<[string, string | number]> = [];
        this.addPoliteParams(params);

        const base = `${this.config.endpoints.openalexApi}/works/${encodeURIComponent(workId)}`;
        const url = params.length > 0 ? `${base}?${buildQueryString(params)}` : base;
        logger.debug({ url }, 'OpenAlex fetch work');

        let work: OpenAlexWork;
        try {
            const response = await this.httpClient.getJson<OpenAlexWork>(url, {
                source: 'openalex',
                timeout: this.config.timeouts.request,
            });
            work = response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new UpstreamRequestError(`Failed to fetch paper metadata: ${error.message}`, error);
            }
            if (error instanceof ResponseParseError) {
                throw new UpstreamParseError(`Failed to parse OpenAlex response: ${error.message}`, error);
            }
            throw error;
        }

        if (!work.id) {
            throw new NotFoundError(`No metadata found for paper: ${workId}`);
        }

        return normalizeWork(work);
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Identify ourselves for the polite pool when a contact address is set.
     */
    private addPoliteParams(params: Array<[string, string | number]>): void {
        if (this.config.email) {
            params.push(['mailto', this.config.email]);
        }
    }
}

/**
 * Comma-joined OpenAlex `filter` expression, or '' when no filter applies.
 */
export function buildFilterExpression(filters: SearchFilter): string {
    const parts: string[] = [];

    for (const { field, key, maxLength } of FILTER_KEYS) {
        const value = filters[field];
        if (typeof value === 'string' && value) {
            parts.push(`${key}:${sanitizeQuery(value, maxLength)}`);
        }
    }

    if (filters.datePublishedGte) {
        parts.push(`publication_date:>${filters.datePublishedGte}`);
    }

    return parts.join(',');
}

/**
 * Normalize an OpenAlex work into an OpenAlexPaper.
 */
export function normalizeWork(work: OpenAlexWork): OpenAlexPaper {
    const authors = (work.authorships ?? [])
        .map((authorship) => authorship.author?.display_name ?? '')
        .filter((name) => name.length > 0);

    const concepts = (work.concepts ?? [])
        .map((concept) => concept.display_name ?? '')
        .filter((name) => name.length > 0);

    const primary = work.primary_location ?? undefined;
    const pdfUrl = primary?.pdf_url
        || (work.locations ?? []).find((location) => location.pdf_url)?.pdf_url
        || '';

    const id = work.id ?? '';

    return {
        id: id.startsWith(OPENALEX_ID_PREFIX) ? id.slice(OPENALEX_ID_PREFIX.length) : id,
        source: 'openalex',
        title: work.title || work.display_name || '',
        abstract: reconstructAbstract(work.abstract_inverted_index),
        authors,
        subjects: concepts,
        published: work.publication_date ?? '',
        updated: work.updated_date ?? '',
        doi: stripDoiPrefix(work.doi),
        pdf_url: pdfUrl,
        abstract_url: primary?.landing_page_url ?? '',
        publication_year: work.publication_year ?? null,
        cited_by_count: work.cited_by_count ?? 0,
        primary_source: primary?.source?.display_name ?? '',
        open_access_status: work.open_access?.oa_status ?? 'closed',
        is_open_access: primary?.is_oa ?? false,
        type: work.type ?? '',
        relevance_score: work.relevance_score ?? 0,
    };
}
