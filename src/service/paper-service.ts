import {
    DEFAULT_CONFIG,
    isErrorResult,
    type AppConfig,
    type ErrorResult,
    type PaperRecord,
    type PaperSource,
    type Provider,
    type SearchResult,
    type SourceAdapter,
    type Success,
} from '../types/index.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { OsfAdapter } from '../sources/osf.js';
import { OpenAlexAdapter } from '../sources/openalex.js';
import { ProviderRegistry } from '../sources/providers.js';
import { lastPathSegment } from '../sources/utils.js';
import { PdfParseConverter, type DocumentConverter } from '../documents/pdf-converter.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import {
    ExtractionError,
    InvalidProviderError,
    RetrievalError,
    UpstreamRequestError,
    errorMessage,
} from '../utils/errors.js';
import { classifyIdentifier } from './classify.js';

const logger = getLogger();

/** Sources queried when a search names no provider */
const FAN_OUT_SOURCES: readonly PaperSource[] = ['arxiv', 'openalex', 'osf'];

export type ServiceResult<T extends object> = Success<T> | ErrorResult;

/**
 * Search request as exposed to callers (tool surface and CLI).
 */
export interface SearchRequest {
    query?: string;
    /** Provider id from `listProviders()`; omitted → every source */
    provider?: string;
    subjects?: string;
    /** YYYY-MM-DD */
    datePublishedGte?: string;
}

/**
 * One source's share of a fan-out search.
 */
export type ProviderOutcome =
    | ({ provider: PaperSource } & Success<SearchResult>)
    | ({ provider: PaperSource } & ErrorResult);

export interface FanOutResult {
    papers: ProviderOutcome[];
    total_count: number;
    providers_searched: PaperSource[];
}

export interface ProviderList {
    providers: Provider[];
    total_count: number;
}

export interface PaperContent {
    metadata: PaperRecord;
    content: string;
    file_size: number;
    message: string;
}

export interface UrlContent {
    content: string;
    file_size: number;
    pdf_url: string;
    message: string;
}

export interface PaperServiceOptions {
    config?: AppConfig;
    httpClient?: HttpClient;
    converter?: DocumentConverter;
    registry?: ProviderRegistry;
    adapters?: Partial<Record<PaperSource, SourceAdapter>>;
}

/**
 * Single entry point over every source: provider listing, routed or
 * fanned-out search, identifier-routed metadata and content retrieval.
 * Every operation resolves to a tagged result and never rejects.
 */
export class PaperService {
    private readonly config: AppConfig;
    private readonly httpClient: HttpClient;
    private readonly converter: DocumentConverter;
    private readonly registry: ProviderRegistry;
    private readonly adapters: Record<PaperSource, SourceAdapter>;

    constructor(options?: PaperServiceOptions) {
        this.config = options?.config ?? DEFAULT_CONFIG;
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.converter = options?.converter ?? new PdfParseConverter();

        const adapterOptions = { httpClient: this.httpClient, config: this.config };
        this.registry = options?.registry ?? new ProviderRegistry(adapterOptions);
        this.adapters = {
            arxiv: options?.adapters?.arxiv ?? new ArxivAdapter(adapterOptions),
            osf: options?.adapters?.osf ?? new OsfAdapter({ ...adapterOptions, registry: this.registry }),
            openalex: options?.adapters?.openalex ?? new OpenAlexAdapter(adapterOptions),
        };
    }

    async listProviders(): Promise<ServiceResult<ProviderList>> {
        try {
            const providers = await this.registry.getAllProviders();
            return { status: 'success', providers, total_count: providers.length };
        } catch (error) {
            return toErrorResult(error, {});
        }
    }

    /**
     * Route a search to one source by provider id, or fan out to all of them.
     */
    async search(request: SearchRequest): Promise<ServiceResult<SearchResult> | ServiceResult<FanOutResult>> {
        if (!request.provider) {
            return this.searchAll(request);
        }

        try {
            const providers = await this.registry.getAllProviders();
            const validIds = providers.map((provider) => provider.id);
            if (!validIds.includes(request.provider)) {
                throw new InvalidProviderError(request.provider, validIds);
            }

            const result = await this.searchSource(sourceForProvider(request.provider), request);
            return { status: 'success', ...result };
        } catch (error) {
            return toErrorResult(error, { provider: request.provider });
        }
    }

    async getPaperMetadata(id: string): Promise<ServiceResult<{ metadata: PaperRecord }>> {
        try {
            const record = await this.adapterForId(id).fetchOne(id);
            if (isErrorResult(record)) {
                return record;
            }
            return { status: 'success', metadata: record };
        } catch (error) {
            return toErrorResult(error, {});
        }
    }

    /**
     * Fetch metadata, download the PDF it points at, and convert it.
     * Errors carry whatever metadata was gathered before the failure.
     */
    async getPaperContent(id: string): Promise<ServiceResult<PaperContent>> {
        let metadata: object = {};

        try {
            const adapter = this.adapterForId(id);
            const record = await adapter.fetchOne(id);
            if (isErrorResult(record)) {
                return record;
            }
            metadata = record;

            const pdfUrl = record[adapter.pdfUrlField];
            if (!pdfUrl) {
                return {
                    status: 'error',
                    message: `No PDF URL found in metadata field '${adapter.pdfUrlField}'`,
                    metadata,
                };
            }

            const converted = await this.downloadAndConvert(pdfUrl, `${id}.pdf`);
            return { status: 'success', metadata: record, ...converted };
        } catch (error) {
            return toErrorResult(error, metadata);
        }
    }

    /**
     * Download and convert a PDF from a direct URL.
     */
    async getPaperContentByUrl(pdfUrl: string): Promise<ServiceResult<UrlContent>> {
        try {
            const converted = await this.downloadAndConvert(pdfUrl, filenameFromUrl(pdfUrl));
            return { status: 'success', ...converted, pdf_url: pdfUrl };
        } catch (error) {
            return toErrorResult(error, { pdf_url: pdfUrl });
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * Query every source concurrently. One failing source does not fail
     * the others; the whole search is an error only when all of them fail.
     */
    private async searchAll(request: SearchRequest): Promise<ServiceResult<FanOutResult>> {
        const settled = await Promise.allSettled(
            FAN_OUT_SOURCES.map((source) => this.searchSource(source, { ...request, provider: 'osf' }))
        );

        const papers = settled.map((outcome, index): ProviderOutcome => {
            const provider = FAN_OUT_SOURCES[index] ?? 'osf';
            if (outcome.status === 'fulfilled') {
                return { provider, status: 'success', ...outcome.value };
            }
            logger.warn({ provider, error: errorMessage(outcome.reason) }, 'Source failed during fan-out search');
            return { provider, ...toErrorResult(outcome.reason, {}) };
        });

        const result: FanOutResult = {
            papers,
            total_count: papers.length,
            providers_searched: [...FAN_OUT_SOURCES],
        };

        if (papers.every((outcome) => outcome.status === 'error')) {
            return { status: 'error', message: 'Search failed for every provider', metadata: result };
        }
        return { status: 'success', ...result };
    }

    private searchSource(source: PaperSource, request: SearchRequest): Promise<SearchResult> {
        switch (source) {
            case 'arxiv':
                return this.adapters.arxiv.search({
                    query: request.query,
                    category: request.subjects,
                });
            case 'openalex':
                return this.adapters.openalex.search({
                    query: request.query,
                    concepts: request.subjects,
                    datePublishedGte: request.datePublishedGte,
                });
            case 'osf':
                return this.adapters.osf.search({
                    query: request.query,
                    providerId: request.provider,
                    subjects: request.subjects,
                    datePublishedGte: request.datePublishedGte,
                });
        }
    }

    private adapterForId(id: string): SourceAdapter {
        const { source, ambiguous } = classifyIdentifier(id);
        if (ambiguous) {
            logger.warn({ id, source }, 'Identifier matched arXiv by the loose rule only');
        }
        return this.adapters[source];
    }

    private async downloadAndConvert(
        pdfUrl: string,
        filename: string
    ): Promise<{ content: string; file_size: number; message: string }> {
        logger.debug({ pdfUrl }, 'Downloading PDF');
        const response = await this.httpClient.getBuffer(pdfUrl, {
            source: 'pdf',
            timeout: this.config.timeouts.download,
        });

        const content = await this.converter.toMarkdown(response.data, { filename });
        const fileSize = response.data.length;

        return {
            content,
            file_size: fileSize,
            message: `Successfully parsed PDF content (${fileSize} bytes)`,
        };
    }
}

/**
 * Provider ids other than the standalone sources are OSF providers.
 */
function sourceForProvider(providerId: string): PaperSource {
    if (providerId === 'arxiv' || providerId === 'openalex') {
        return providerId;
    }
    return 'osf';
}

/**
 * Last URL segment when it names a PDF, else a generic name.
 */
export function filenameFromUrl(pdfUrl: string): string {
    const segment = lastPathSegment(pdfUrl);
    return segment.endsWith('.pdf') ? segment : 'paper.pdf';
}

/**
 * The request never got an HTTP response (network failure or timeout),
 * directly or as the cause of an upstream request error.
 */
function isTransportFailure(error: unknown): boolean {
    if (error instanceof HttpError) {
        return error.status === 0;
    }
    return error instanceof UpstreamRequestError
        && error.cause instanceof HttpError
        && error.cause.status === 0;
}

/**
 * Convert a thrown value into an error result.
 */
export function toErrorResult<M extends object>(error: unknown, metadata: M): ErrorResult<M> {
    let message: string;

    if (isTransportFailure(error)) {
        message = `Network error: ${errorMessage(error).replace(/^Network error: /, '')}`;
    } else if (error instanceof HttpError) {
        message = `Request failed: ${error.message}`;
    } else if (error instanceof ExtractionError) {
        message = `Error parsing PDF: ${error.message}`;
    } else if (error instanceof RetrievalError) {
        message = error.message;
    } else {
        message = `Error processing paper: ${errorMessage(error)}`;
    }

    logger.error({ error: errorMessage(error) }, message);

    const result: ErrorResult<M> = { status: 'error', message, metadata };
    if (error instanceof InvalidProviderError) {
        return { ...result, metadata: { ...metadata, valid_providers: error.validIds } };
    }
    return result;
}
