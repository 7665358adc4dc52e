import { describe, it, expect, vi, afterEach, type Mock } from 'vitest';
import { PaperService, filenameFromUrl, toErrorResult } from '../service/paper-service.js';
import { ProviderRegistry } from '../sources/providers.js';
import { createHttpClient, HttpError } from '../utils/http-client.js';
import { ExtractionError, NotFoundError, UpstreamRequestError } from '../utils/errors.js';
import type { DocumentConverter } from '../documents/pdf-converter.js';
import type {
    ErrorResult,
    PaperRecord,
    PaperSource,
    PdfUrlField,
    Provider,
    SearchFilter,
    SearchResult,
    SourceAdapter,
} from '../types/index.js';
import { emptyResponse, stubFetch, textResponse } from './helpers/fetch-stub.js';

const PROVIDERS: Provider[] = [
    { id: 'arxiv', type: 'standalone', description: 'arXiv' },
    { id: 'openalex', type: 'standalone', description: 'OpenAlex' },
    { id: 'osf', type: 'osf', description: 'OSF Preprints' },
    { id: 'psyarxiv', type: 'osf', description: 'PsyArXiv' },
];

const EMPTY_RESULT: SearchResult = { data: [], meta: { total_results: 0 } };

function record(source: PaperSource, overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        id: 'id-1',
        source,
        title: 'A Paper',
        abstract: '',
        authors: [],
        subjects: [],
        published: '',
        updated: '',
        doi: '',
        pdf_url: '',
        abstract_url: '',
        ...overrides,
    };
}

type FetchOne = (id: string) => Promise<PaperRecord | ErrorResult<PaperRecord>>;

interface FakeAdapter extends SourceAdapter {
    search: Mock<(filters: SearchFilter) => Promise<SearchResult>>;
    fetchOne: Mock<FetchOne>;
}

function fakeAdapter(sourceId: PaperSource, pdfUrlField: PdfUrlField): FakeAdapter {
    return {
        name: sourceId,
        sourceId,
        pdfUrlField,
        capabilities: new Set(),
        search: vi.fn(async (_filters: SearchFilter) => EMPTY_RESULT),
        fetchOne: vi.fn<FetchOne>(async (id) => record(sourceId, { id })),
    };
}

function setup() {
    const httpClient = createHttpClient();
    const registry = new ProviderRegistry({ httpClient });
    vi.spyOn(registry, 'getAllProviders').mockResolvedValue(PROVIDERS);

    const adapters = {
        arxiv: fakeAdapter('arxiv', 'download_url'),
        osf: fakeAdapter('osf', 'download_url'),
        openalex: fakeAdapter('openalex', 'pdf_url'),
    };
    const toMarkdown = vi.fn(async () => '# Paper\n');
    const converter: DocumentConverter = { toMarkdown };

    const service = new PaperService({ httpClient, registry, adapters, converter });
    return { service, adapters, toMarkdown };
}

describe('PaperService', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    describe('listProviders', () => {
        it('should return providers with a count', async () => {
            const { service } = setup();

            await expect(service.listProviders()).resolves.toEqual({
                status: 'success',
                providers: PROVIDERS,
                total_count: 4,
            });
        });
    });

    describe('search', () => {
        it('should reject an unknown provider with the valid ids', async () => {
            const { service, adapters } = setup();

            await expect(service.search({ provider: 'nope' })).resolves.toEqual({
                status: 'error',
                message: 'Invalid provider: nope. Valid providers: arxiv, openalex, osf, psyarxiv',
                metadata: { provider: 'nope', valid_providers: ['arxiv', 'openalex', 'osf', 'psyarxiv'] },
            });
            expect(adapters.osf.search).not.toHaveBeenCalled();
        });

        it('should pass subjects to arXiv as the category', async () => {
            const { service, adapters } = setup();

            const result = await service.search({ provider: 'arxiv', query: 'q', subjects: 'cs.AI', datePublishedGte: '2024-01-01' });

            expect(result).toEqual({ status: 'success', ...EMPTY_RESULT });
            expect(adapters.arxiv.search).toHaveBeenCalledWith({ query: 'q', category: 'cs.AI' });
        });

        it('should pass subjects to OpenAlex as concepts', async () => {
            const { service, adapters } = setup();

            await service.search({ provider: 'openalex', query: 'q', subjects: 'Biology', datePublishedGte: '2024-01-01' });

            expect(adapters.openalex.search).toHaveBeenCalledWith({
                query: 'q',
                concepts: 'Biology',
                datePublishedGte: '2024-01-01',
            });
        });

        it('should route OSF provider ids to the OSF adapter', async () => {
            const { service, adapters } = setup();

            await service.search({ provider: 'psyarxiv', subjects: 'Psychology' });

            expect(adapters.osf.search).toHaveBeenCalledWith({
                query: undefined,
                providerId: 'psyarxiv',
                subjects: 'Psychology',
                datePublishedGte: undefined,
            });
        });

        it('should report each source separately when fanning out', async () => {
            const { service, adapters } = setup();
            adapters.arxiv.search.mockRejectedValue(new UpstreamRequestError('Request failed: HTTP 503'));

            const result = await service.search({ query: 'q' });

            expect(result).toEqual({
                status: 'success',
                papers: [
                    { provider: 'arxiv', status: 'error', message: 'Request failed: HTTP 503', metadata: {} },
                    { provider: 'openalex', status: 'success', ...EMPTY_RESULT },
                    { provider: 'osf', status: 'success', ...EMPTY_RESULT },
                ],
                total_count: 3,
                providers_searched: ['arxiv', 'openalex', 'osf'],
            });
            expect(adapters.osf.search).toHaveBeenCalledWith(expect.objectContaining({ providerId: 'osf', query: 'q' }));
        });

        it('should fail the fan-out only when every source fails', async () => {
            const { service, adapters } = setup();
            for (const adapter of Object.values(adapters)) {
                adapter.search.mockRejectedValue(new UpstreamRequestError('down'));
            }

            const result = await service.search({ query: 'q' });

            expect(result.status).toBe('error');
            expect(result).toMatchObject({ message: 'Search failed for every provider' });
        });
    });

    describe('getPaperMetadata', () => {
        it('should route by identifier shape', async () => {
            const { service, adapters } = setup();

            await expect(service.getPaperMetadata('W42')).resolves.toEqual({
                status: 'success',
                metadata: record('openalex', { id: 'W42' }),
            });
            expect(adapters.openalex.fetchOne).toHaveBeenCalledWith('W42');
        });

        it('should turn thrown errors into error results', async () => {
            const { service, adapters } = setup();
            adapters.arxiv.fetchOne.mockRejectedValue(new NotFoundError('arXiv paper not found: 2401.00001'));

            await expect(service.getPaperMetadata('2401.00001')).resolves.toEqual({
                status: 'error',
                message: 'arXiv paper not found: 2401.00001',
                metadata: {},
            });
        });

        it('should label unexpected failures', async () => {
            const { service, adapters } = setup();
            adapters.osf.fetchOne.mockRejectedValue(new Error('boom'));

            await expect(service.getPaperMetadata('abc12')).resolves.toEqual({
                status: 'error',
                message: 'Error processing paper: boom',
                metadata: {},
            });
        });
    });

    describe('getPaperContent', () => {
        const PDF_URL = 'https://arxiv.org/pdf/2401.00001v1';

        it('should download and convert the PDF named by the source\'s field', async () => {
            const { service, adapters, toMarkdown } = setup();
            const paper = record('arxiv', { id: '2401.00001v1', download_url: PDF_URL });
            adapters.arxiv.fetchOne.mockResolvedValue(paper);
            stubFetch([{ url: PDF_URL, respond: () => new Response(new Uint8Array([1, 2, 3, 4]), { status: 200 }) }]);

            const result = await service.getPaperContent('2401.00001v1');

            expect(result).toEqual({
                status: 'success',
                metadata: paper,
                content: '# Paper\n',
                file_size: 4,
                message: 'Successfully parsed PDF content (4 bytes)',
            });
            expect(toMarkdown).toHaveBeenCalledWith(Buffer.from([1, 2, 3, 4]), { filename: '2401.00001v1.pdf' });
        });

        it('should report a missing PDF URL with the metadata', async () => {
            const { service } = setup();

            await expect(service.getPaperContent('W7')).resolves.toEqual({
                status: 'error',
                message: "No PDF URL found in metadata field 'pdf_url'",
                metadata: record('openalex', { id: 'W7' }),
            });
        });

        it('should keep the metadata when the download fails', async () => {
            const { service, adapters } = setup();
            const paper = record('openalex', { id: 'W8', pdf_url: 'https://example.org/w8.pdf' });
            adapters.openalex.fetchOne.mockResolvedValue(paper);
            stubFetch([{ url: 'https://example.org/w8.pdf', respond: () => emptyResponse(404) }]);

            await expect(service.getPaperContent('W8')).resolves.toEqual({
                status: 'error',
                message: 'Request failed: HTTP 404',
                metadata: paper,
            });
        });

        it('should label conversion failures', async () => {
            const { service, adapters, toMarkdown } = setup();
            const paper = record('openalex', { id: 'W9', pdf_url: 'https://example.org/w9.pdf' });
            adapters.openalex.fetchOne.mockResolvedValue(paper);
            toMarkdown.mockRejectedValue(new ExtractionError('No text could be extracted from W9.pdf'));
            stubFetch([{ url: 'https://example.org/w9.pdf', respond: () => new Response(new Uint8Array([1]), { status: 200 }) }]);

            await expect(service.getPaperContent('W9')).resolves.toEqual({
                status: 'error',
                message: 'Error parsing PDF: No text could be extracted from W9.pdf',
                metadata: paper,
            });
        });

        it('should pass through an adapter\'s error value', async () => {
            const { service, adapters } = setup();
            const failure: ErrorResult<PaperRecord> = {
                status: 'error',
                message: 'Download URL not available',
                metadata: record('osf'),
            };
            adapters.osf.fetchOne.mockResolvedValue(failure);

            await expect(service.getPaperContent('abc12')).resolves.toEqual(failure);
        });
    });

    describe('getPaperContentByUrl', () => {
        it('should convert a PDF named after the URL', async () => {
            const { service, toMarkdown } = setup();
            const url = 'https://example.org/files/paper-1.pdf';
            stubFetch([{ url, respond: () => new Response(new Uint8Array([9, 9]), { status: 200 }) }]);

            await expect(service.getPaperContentByUrl(url)).resolves.toEqual({
                status: 'success',
                content: '# Paper\n',
                file_size: 2,
                pdf_url: url,
                message: 'Successfully parsed PDF content (2 bytes)',
            });
            expect(toMarkdown).toHaveBeenCalledWith(Buffer.from([9, 9]), { filename: 'paper-1.pdf' });
        });

        it('should carry the URL in error results', async () => {
            const { service } = setup();
            stubFetch([]);

            await expect(service.getPaperContentByUrl('https://example.org/x.pdf')).resolves.toEqual({
                status: 'error',
                message: 'Network error: fetch failed',
                metadata: { pdf_url: 'https://example.org/x.pdf' },
            });
        });
    });

    describe('error results', () => {
        it('should label transport failures as network errors', () => {
            const cause = new HttpError('Request timeout after 30000ms: https://api.osf.io/v2/preprints/', 0);

            expect(toErrorResult(new UpstreamRequestError('Trove search failed: timed out', cause), {}).message)
                .toBe('Network error: Trove search failed: timed out');
            expect(toErrorResult(cause, {}).message)
                .toBe('Network error: Request timeout after 30000ms: https://api.osf.io/v2/preprints/');
        });

        it('should keep an upstream rejection\'s own message', () => {
            const cause = new HttpError('HTTP 400', 400);
            const error = new UpstreamRequestError(
                'Bad request (400) - The search parameters may be invalid. Original error: HTTP 400',
                cause
            );

            expect(toErrorResult(error, { provider: 'psyarxiv' })).toEqual({
                status: 'error',
                message: 'Bad request (400) - The search parameters may be invalid. Original error: HTTP 400',
                metadata: { provider: 'psyarxiv' },
            });
        });

        it('should report an unparseable search response as a parse failure', async () => {
            const httpClient = createHttpClient();
            const registry = new ProviderRegistry({ httpClient });
            vi.spyOn(registry, 'getAllProviders').mockResolvedValue(PROVIDERS);
            stubFetch([{
                url: 'https://api.openalex.org/works?search=x&per_page=20&page=1',
                respond: () => textResponse('<html>oops', 200, 'text/html'),
            }]);

            const service = new PaperService({ httpClient, registry });
            const result = await service.search({ provider: 'openalex', query: 'x' });

            expect(result).toMatchObject({ status: 'error', metadata: { provider: 'openalex' } });
            expect(result).toHaveProperty(
                'message',
                expect.stringMatching(/^Failed to parse OpenAlex response: Invalid JSON from /)
            );
        });
    });

    describe('filenameFromUrl', () => {
        it('should fall back to a generic name', () => {
            expect(filenameFromUrl('https://example.org/download?id=3')).toBe('paper.pdf');
            expect(filenameFromUrl('https://example.org/a/b.pdf')).toBe('b.pdf');
        });
    });
});
