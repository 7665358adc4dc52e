/**
 * Barrel export for all shared types.
 */
export type {
    PaperRecord,
    PaperSource,
    ArxivPaper,
    OsfPreprint,
    OpenAlexPaper,
    InvertedIndex,
} from './paper.js';
export type { Provider, ProviderType } from './provider.js';
export { isErrorResult } from './result.js';
export type { ErrorResult, Success, SearchMeta, SearchResult } from './result.js';
export { DEFAULT_CONFIG } from './config.js';
export type { AppConfig, LogLevel, EndpointConfig, TimeoutConfig } from './config.js';
export type {
    SourceAdapter,
    SourceAdapterOptions,
    SearchFilter,
    FilterField,
    PdfUrlField,
} from './source-adapter.js';
