import {
    DEFAULT_CONFIG,
    type ErrorResult,
    type FilterField,
    type OsfPreprint,
    type SearchFilter,
    type SearchResult,
    type SourceAdapter,
    type SourceAdapterOptions,
} from '../types/index.js';
import { getHttpClient, HttpError, ResponseParseError, type HttpClient, type HttpResponse } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { sanitizeQuery } from '../utils/sanitize.js';
import { InvalidProviderError, UpstreamParseError, UpstreamRequestError } from '../utils/errors.js';
import { ProviderRegistry } from './providers.js';
import { buildQueryString, lastPathSegment, stripDoiPrefix, unsupportedFilters } from './utils.js';

const logger = getLogger();

/** Trove page size, matching the OSF API default listing */
const TROVE_PAGE_SIZE = 20;

/**
 * OSF JSON:API preprint resource (subset of relevant fields).
 */
interface OsfPreprintResource {
    id: string;
    attributes?: {
        title?: string | null;
        description?: string | null;
        date_created?: string | null;
        date_published?: string | null;
        date_modified?: string | null;
        is_published?: boolean;
        is_preprint_orphan?: boolean | null;
        license_record?: Record<string, unknown> | null;
        doi?: string | null;
        tags?: string[];
        subjects?: Array<Array<{ id?: string; text?: string }>>;
    };
    relationships?: {
        primary_file?: { links?: { related?: { href?: string } } };
        provider?: { data?: { id?: string } | null; links?: { related?: { href?: string } } };
    };
    links?: { html?: string; self?: string };
}

interface OsfListResponse {
    data?: OsfPreprintResource[];
    meta?: { total?: number; per_page?: number; version?: string };
    links?: Record<string, string | null | undefined>;
}

interface OsfFileResponse {
    data?: { links?: { download?: string } };
}

/**
 * Trove index-card search (JSON-LD-like) shapes.
 */
type TroveValue = string | { '@value'?: string; '@id'?: string };

interface TroveItem {
    '@id'?: string;
    title?: TroveValue[];
    description?: TroveValue[];
    dateCreated?: TroveValue[];
    dateAccepted?: TroveValue[];
    dateModified?: TroveValue[];
    identifier?: TroveValue[];
    keyword?: TroveValue[];
    subject?: Array<{ prefLabel?: TroveValue[] }>;
    publisher?: Array<{ '@id'?: string }>;
    creator?: Array<{ name?: TroveValue[] }>;
}

interface TroveResponse {
    data?: TroveItem[];
    meta?: { total?: number };
    links?: { first?: string; next?: string };
}

/**
 * OSF preprints adapter: JSON:API filter listing, plus the trove
 * full-text search when a free-text query is given.
 *
 * The listing API only filters on provider, subjects and publication date.
 *
 * @see https://developer.osf.io/
 */
export class OsfAdapter implements SourceAdapter<OsfPreprint> {
    readonly name = 'OSF';
    readonly sourceId = 'osf' as const;
    readonly pdfUrlField = 'download_url' as const;
    readonly capabilities: ReadonlySet<FilterField> = new Set<FilterField>([
        'query', 'providerId', 'subjects', 'datePublishedGte',
    ]);
    private readonly httpClient: HttpClient;
    private readonly config: NonNullable<SourceAdapterOptions['config']>;
    private readonly registry: ProviderRegistry;

    constructor(options?: SourceAdapterOptions & { registry?: ProviderRegistry }) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.config = options?.config ?? DEFAULT_CONFIG;
        this.registry = options?.registry ?? new ProviderRegistry(options);
    }

    async search(filters: SearchFilter): Promise<SearchResult<OsfPreprint>> {
        const ignored = unsupportedFilters(filters, this.capabilities);
        if (ignored.length > 0) {
            logger.debug({ ignored }, 'OSF ignores filters');
        }

        if (filters.providerId) {
            await this.assertOsfProvider(filters.providerId);
        }

        if (filters.query) {
            return this.searchTrove(filters.query, filters.providerId);
        }

        const params: Array<[string, string]> = [];
        if (filters.providerId) {
            params.push(['filter[provider]', sanitizeQuery(filters.providerId, 50)]);
        }
        if (filters.subjects) {
            params.push(['filter[subjects]', sanitizeQuery(filters.subjects, 100)]);
        }
        if (filters.datePublishedGte) {
            // ISO dates pass through untouched
            params.push(['filter[date_published][gte]', filters.datePublishedGte]);
        }

        try {
            return await this.fetchListing(params);
        } catch (error) {
            if (!(error instanceof HttpError)) throw error;

            if (error.status !== 400) {
                throw new UpstreamRequestError(`Request failed: ${error.message}`, error);
            }

            if (params.length > 1) {
                const providerOnly = params.filter(([key]) => key === 'filter[provider]');
                logger.warn({ filters: params.length }, 'OSF rejected filter combination, retrying with provider only');

                try {
                    const result = await this.fetchListing(providerOnly);
                    result.meta.search_note =
                        `Original search failed (400 error), showing all results for provider '${filters.providerId ?? ''}'. ` +
                        'You may need to filter results manually.';
                    return result;
                } catch (retryError) {
                    logger.warn({ error: retryError }, 'Simplified OSF search failed');
                }
            }

            throw new UpstreamRequestError(
                `Bad request (400) - The search parameters may be invalid. Original error: ${error.message}`,
                error
            );
        }
    }

    /**
     * Two sequential calls: the preprint (for its primary-file link), then
     * the file (for its download link). A missing link is returned as an
     * error value with the metadata gathered so far.
     */
    async fetchOne(preprintId: string): Promise<OsfPreprint | ErrorResult<OsfPreprint>> {
        const url = `${this.config.endpoints.osfApi}/preprints/${encodeURIComponent(preprintId)}`;
        logger.debug({ url }, 'OSF fetch preprint');

        const preprint = await this.getJson<{ data?: OsfPreprintResource }>(url, 'Failed to fetch preprint metadata');
        if (!preprint.data) {
            throw new UpstreamRequestError(`Failed to fetch preprint metadata: empty response for ${preprintId}`);
        }

        const metadata: OsfPreprint = { ...toPreprint(preprint.data), id: preprintId, download_url: '' };

        const fileUrl = preprint.data.relationships?.primary_file?.links?.related?.href;
        if (!fileUrl) {
            logger.warn({ preprintId }, 'OSF preprint has no primary file');
            return { status: 'error', message: 'Download URL not available', metadata };
        }

        const file = await this.getJson<OsfFileResponse>(fileUrl, 'Failed to fetch preprint metadata');
        const downloadUrl = file.data?.links?.download ?? '';
        if (!downloadUrl) {
            return { status: 'error', message: 'Download URL not available', metadata };
        }

        return { ...metadata, download_url: downloadUrl, pdf_url: downloadUrl };
    }

    // ─── Private helpers ──────────────────────────────────────

    private async assertOsfProvider(providerId: string): Promise<void> {
        const osfProviders = await this.registry.fetchOsfProviders();
        const validIds = osfProviders.map((provider) => provider.id);
        if (!validIds.includes(providerId)) {
            throw new InvalidProviderError(providerId, validIds, 'OSF provider');
        }
    }

    private async fetchListing(params: Array<[string, string]>): Promise<SearchResult<OsfPreprint>> {
        const base = `${this.config.endpoints.osfApi}/preprints/`;
        const url = params.length > 0 ? `${base}?${buildQueryString(params)}` : base;
        logger.debug({ url }, 'OSF preprint listing');

        let response: HttpResponse<OsfListResponse>;
        try {
            response = await this.httpClient.getJson<OsfListResponse>(url, {
                source: 'osf',
                timeout: this.config.timeouts.request,
            });
        } catch (error) {
            if (error instanceof ResponseParseError) {
                throw new UpstreamParseError(`Failed to parse OSF response: ${error.message}`, error);
            }
            throw error;
        }

        const data = (response.data.data ?? []).map(toPreprint);
        const meta: SearchResult['meta'] = { total_results: response.data.meta?.total ?? data.length };
        if (response.data.meta?.per_page !== undefined) meta['per_page'] = response.data.meta.per_page;
        if (response.data.meta?.version) meta['version'] = response.data.meta.version;

        return { data, meta, links: stringLinks(response.data.links) };
    }

    /**
     * Full-text search through trove, transformed into OsfPreprint records.
     * With a provider id, items from other publishers are dropped.
     */
    private async searchTrove(query: string, providerId?: string): Promise<SearchResult<OsfPreprint>> {
        const params: Array<[string, string | number]> = [
            ['cardSearchFilter[resourceType]', 'Preprint'],
            ['cardSearchText[*,creator.name,isContainedBy.creator.name]', sanitizeQuery(query, 200)],
            ['page[size]', TROVE_PAGE_SIZE],
            ['sort', '-relevance'],
        ];
        const url = `${this.config.endpoints.trove}?${buildQueryString(params, { spaceAsPlus: true })}`;
        logger.debug({ url }, 'OSF trove search');

        let response: TroveResponse;
        try {
            response = (await this.httpClient.getJson<TroveResponse>(url, {
                source: 'osf',
                timeout: this.config.timeouts.request,
            })).data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new UpstreamRequestError(`Trove search failed: ${error.message}`, error);
            }
            if (error instanceof ResponseParseError) {
                throw new UpstreamParseError(`Failed to parse trove response: ${error.message}`, error);
            }
            throw error;
        }

        const data: OsfPreprint[] = [];
        for (const item of response.data ?? []) {
            const publisher = item.publisher?.[0]?.['@id'] ?? '';
            if (providerId && !publisher.includes(providerId)) {
                continue;
            }
            data.push(fromTroveItem(item));
        }

        return {
            data,
            meta: {
                total_results: response.meta?.total ?? data.length,
                version: '2.0',
                search_note: `Results from trove search for query: '${query}'`,
            },
            links: {
                first: response.links?.first ?? '',
                next: response.links?.next ?? '',
                last: '',
                prev: '',
            },
        };
    }

    private async getJson<T>(url: string, failureMessage: string): Promise<T> {
        try {
            const response = await this.httpClient.getJson<T>(url, {
                source: 'osf',
                timeout: this.config.timeouts.request,
            });
            return response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new UpstreamRequestError(`${failureMessage}: ${error.message}`, error);
            }
            if (error instanceof ResponseParseError) {
                throw new UpstreamParseError(`Failed to parse OSF response: ${error.message}`, error);
            }
            throw error;
        }
    }
}

/**
 * Normalize a JSON:API preprint resource.
 */
function toPreprint(resource: OsfPreprintResource): OsfPreprint {
    const attributes = resource.attributes ?? {};
    const providerRef = resource.relationships?.provider;
    const subjects = (attributes.subjects ?? [])
        .flat()
        .map((subject) => subject.text ?? '')
        .filter((text) => text.length > 0);

    return {
        id: resource.id,
        source: 'osf',
        title: attributes.title ?? '',
        abstract: attributes.description ?? '',
        authors: [],
        subjects,
        published: attributes.date_published ?? '',
        updated: attributes.date_modified ?? '',
        doi: attributes.doi ?? '',
        pdf_url: '',
        abstract_url: resource.links?.html ?? '',
        date_created: attributes.date_created ?? '',
        tags: attributes.tags ?? [],
        is_published: attributes.is_published ?? false,
        is_preprint_orphan: attributes.is_preprint_orphan ?? false,
        license_record: attributes.license_record ?? null,
        provider: providerRef?.data?.id ?? lastPathSegment(providerRef?.links?.related?.href ?? ''),
    };
}

/**
 * Transform a trove index card, field by field.
 */
function fromTroveItem(item: TroveItem): OsfPreprint {
    const cardId = item['@id'] ?? '';

    return {
        id: cardId.includes('osf.io/') ? lastPathSegment(cardId) : '',
        source: 'osf',
        title: firstValue(item.title),
        abstract: firstValue(item.description),
        authors: (item.creator ?? [])
            .map((creator) => firstValue(creator.name))
            .filter((name) => name.length > 0),
        subjects: (item.subject ?? []).map((subject) => firstValue(subject.prefLabel)),
        published: firstValue(item.dateAccepted),
        updated: firstValue(item.dateModified),
        doi: stripDoiPrefix(extractDoi(item.identifier ?? [])),
        pdf_url: '',
        abstract_url: cardId,
        date_created: firstValue(item.dateCreated),
        tags: (item.keyword ?? []).map(valueOf),
        is_published: true,
        is_preprint_orphan: false,
        license_record: null,
        provider: item.publisher?.[0]?.['@id'] ?? '',
    };
}

function valueOf(value: TroveValue): string {
    return typeof value === 'string' ? value : value['@value'] ?? '';
}

/**
 * First `@value` (or bare string) of a single-element trove array.
 */
export function firstValue(values: TroveValue[] | undefined): string {
    const first = values?.[0];
    return first === undefined ? '' : valueOf(first);
}

/**
 * First identifier that looks like a DOI (resolver URL or bare `10.` form).
 */
export function extractDoi(identifiers: TroveValue[]): string {
    for (const identifier of identifiers) {
        if (typeof identifier === 'string') continue;
        const value = identifier['@value'];
        if (value && (value.includes('doi.org') || value.startsWith('10.'))) {
            return value;
        }
    }
    return '';
}

function stringLinks(links: OsfListResponse['links']): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [key, value] of Object.entries(links ?? {})) {
        result[key] = value ?? '';
    }
    return result;
}
