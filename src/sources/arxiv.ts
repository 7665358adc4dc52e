import { XMLParser, XMLValidator } from 'fast-xml-parser';
import {
    DEFAULT_CONFIG,
    type ArxivPaper,
    type FilterField,
    type SearchFilter,
    type SearchResult,
    type SourceAdapter,
    type SourceAdapterOptions,
} from '../types/index.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { sanitizeQuery } from '../utils/sanitize.js';
import { NotFoundError, UpstreamParseError, UpstreamRequestError, errorMessage } from '../utils/errors.js';
import { buildQueryString, lastPathSegment, unsupportedFilters } from './utils.js';

const logger = getLogger();

/** The query API refuses larger pages */
const MAX_PAGE_SIZE = 20;

/**
 * Atom feed as produced by the XML parser (subset of relevant fields).
 * Elements carrying attributes come back as objects with '#text'.
 */
type XmlText = string | { '#text'?: string };

interface AtomLink {
    '@_href'?: string;
    '@_rel'?: string;
    '@_type'?: string;
}

interface AtomEntry {
    id?: XmlText;
    title?: XmlText;
    summary?: XmlText;
    published?: XmlText;
    updated?: XmlText;
    author?: Array<{ name?: XmlText }>;
    category?: Array<{ '@_term'?: string }>;
    link?: AtomLink[];
    'arxiv:doi'?: XmlText;
}

interface AtomFeed {
    feed?: { entry?: AtomEntry[] };
}

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    isArray: (_name: string, jpath: string) => /\.(entry|author|category|link)$/.test(jpath),
});

/**
 * arXiv source adapter over the Atom query API.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter<ArxivPaper> {
    readonly name = 'arXiv';
    readonly sourceId = 'arxiv' as const;
    readonly pdfUrlField = 'download_url' as const;
    readonly capabilities: ReadonlySet<FilterField> = new Set<FilterField>([
        'query', 'category', 'author', 'title', 'maxResults', 'startIndex',
    ]);
    private readonly httpClient: HttpClient;
    private readonly config: NonNullable<SourceAdapterOptions['config']>;

    constructor(options?: SourceAdapterOptions) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.config = options?.config ?? DEFAULT_CONFIG;
    }

    async search(filters: SearchFilter): Promise<SearchResult<ArxivPaper>> {
        const ignored = unsupportedFilters(filters, this.capabilities);
        if (ignored.length > 0) {
            logger.debug({ ignored }, 'arXiv ignores filters');
        }

        const searchQuery = buildSearchQuery(filters);
        const startIndex = filters.startIndex ?? 0;
        const maxResults = Math.min(filters.maxResults ?? 100, MAX_PAGE_SIZE);

        const queryString = buildQueryString(
            [
                ['search_query', searchQuery],
                ['start', startIndex],
                ['max_results', maxResults],
            ],
            { safe: ':' }
        );
        const url = `${this.config.endpoints.arxivApi}?${queryString}`;
        logger.debug({ url }, 'arXiv search');

        const papers = parseFeed(await this.fetchFeed(url, 'Request failed'));

        return {
            data: papers,
            meta: {
                total_results: papers.length,
                start_index: startIndex,
                max_results: maxResults,
                search_query: searchQuery,
            },
        };
    }

    /**
     * Check the PDF exists (HEAD), then read its Atom entry.
     * The record's `download_url` is the direct PDF link.
     */
    async fetchOne(paperId: string): Promise<ArxivPaper> {
        const pdfUrl = `${this.config.endpoints.arxivPdf}/${paperId}`;

        let exists: boolean;
        try {
            const head = await this.httpClient.head(pdfUrl, {
                source: 'arxiv',
                timeout: this.config.timeouts.existenceCheck,
            });
            exists = head.status === 200;
        } catch (error) {
            throw new UpstreamRequestError(`Failed to fetch paper metadata: ${errorMessage(error)}`, error);
        }
        if (!exists) {
            throw new NotFoundError(`arXiv paper not found: ${paperId}`);
        }

        const url = `${this.config.endpoints.arxivApi}?${buildQueryString([['id_list', paperId]], { safe: ':/' })}`;
        logger.debug({ url }, 'arXiv fetch paper');

        const [entry] = parseFeed(await this.fetchFeed(url, 'Failed to fetch paper metadata'));
        if (!entry) {
            throw new NotFoundError(`No metadata found for paper: ${paperId}`);
        }

        return { ...entry, download_url: pdfUrl };
    }

    private async fetchFeed(url: string, failureMessage: string): Promise<string> {
        try {
            const response = await this.httpClient.getText(url, {
                source: 'arxiv',
                timeout: this.config.timeouts.request,
            });
            return response.data;
        } catch (error) {
            if (error instanceof HttpError) {
                throw new UpstreamRequestError(`${failureMessage}: ${error.message}`, error);
            }
            throw error;
        }
    }
}

/**
 * Build the boolean `search_query` from the structured filters.
 * "all:X AND cat:Y AND au:Z AND ti:W"; `all:*` when nothing is given.
 */
export function buildSearchQuery(filters: SearchFilter): string {
    const parts: string[] = [];

    if (filters.query) parts.push(`all:${sanitizeQuery(filters.query, 200)}`);
    if (filters.category) parts.push(`cat:${sanitizeQuery(filters.category, 50)}`);
    if (filters.author) parts.push(`au:${sanitizeQuery(filters.author, 100)}`);
    if (filters.title) parts.push(`ti:${sanitizeQuery(filters.title, 200)}`);

    return parts.length > 0 ? parts.join(' AND ') : 'all:*';
}

/**
 * Parse an Atom feed into paper records.
 * Throws UpstreamParseError when the document is not well-formed XML.
 */
export function parseFeed(xml: string): ArxivPaper[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new UpstreamParseError(`Failed to parse arXiv response: ${validation.err.msg}`);
    }

    let parsed: AtomFeed;
    try {
        parsed = xmlParser.parse(xml);
    } catch (error) {
        throw new UpstreamParseError(`Failed to parse arXiv response: ${errorMessage(error)}`, error);
    }

    return (parsed.feed?.entry ?? []).map(parseEntry);
}

function parseEntry(entry: AtomEntry): ArxivPaper {
    const authors = (entry.author ?? [])
        .map((author) => textOf(author.name))
        .filter((name) => name.length > 0);

    const categories = (entry.category ?? [])
        .map((category) => category['@_term'] ?? '')
        .filter((term) => term.length > 0);

    let pdfUrl = '';
    let abstractUrl = '';
    for (const link of entry.link ?? []) {
        if (link['@_type'] === 'application/pdf') {
            pdfUrl = link['@_href'] ?? '';
        } else if (link['@_rel'] === 'alternate') {
            abstractUrl = link['@_href'] ?? '';
        }
    }

    return {
        id: lastPathSegment(textOf(entry.id)),
        source: 'arxiv',
        title: textOf(entry.title).trim(),
        abstract: textOf(entry.summary).trim(),
        authors,
        subjects: categories,
        published: textOf(entry.published),
        updated: textOf(entry.updated),
        doi: textOf(entry['arxiv:doi']),
        pdf_url: pdfUrl,
        abstract_url: abstractUrl,
    };
}

function textOf(value: XmlText | undefined): string {
    if (typeof value === 'string') return value;
    return value?.['#text'] ?? '';
}
