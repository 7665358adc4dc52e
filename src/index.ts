/**
 * Library entry: the unified PaperService plus the pieces it is built from.
 */
export {
    PaperService,
    filenameFromUrl,
    toErrorResult,
    type ServiceResult,
    type SearchRequest,
    type ProviderOutcome,
    type FanOutResult,
    type ProviderList,
    type PaperContent,
    type UrlContent,
    type PaperServiceOptions,
} from './service/paper-service.js';
export { classifyIdentifier, type IdentifierClass } from './service/classify.js';
export { ArxivAdapter, buildSearchQuery, parseFeed } from './sources/arxiv.js';
export { OsfAdapter } from './sources/osf.js';
export { OpenAlexAdapter, buildFilterExpression, normalizeWork } from './sources/openalex.js';
export { ProviderRegistry } from './sources/providers.js';
export { reconstructAbstract, stripDoiPrefix } from './sources/utils.js';
export {
    PdfParseConverter,
    type DocumentConverter,
    type DocumentInput,
    type PdfTextExtractor,
} from './documents/pdf-converter.js';
export { sanitizeQuery } from './utils/sanitize.js';
export { HttpClient, HttpError, ResponseParseError, createHttpClient, getHttpClient } from './utils/http-client.js';
export { resolveConfig, mergeConfig, loadEnvVars, type ConfigOverrides } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
export * from './utils/errors.js';
export * from './types/index.js';
