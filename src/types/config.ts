/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * Upstream API locations.
 */
export interface EndpointConfig {
    arxivApi: string;
    /** Base for direct PDF links: `${arxivPdf}/${id}` */
    arxivPdf: string;
    osfApi: string;
    trove: string;
    openalexApi: string;
}

/**
 * Per-call timeouts in milliseconds.
 */
export interface TimeoutConfig {
    /** HEAD checks against direct resource URLs */
    existenceCheck: number;
    /** Search and metadata calls */
    request: number;
    /** PDF downloads */
    download: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface AppConfig {
    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    /** Contact address for User-Agent and the OpenAlex polite pool */
    email?: string;

    endpoints: EndpointConfig;
    timeouts: TimeoutConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
    logLevel: 'info',
    jsonLogs: false,
    endpoints: {
        arxivApi: 'https://export.arxiv.org/api/query',
        arxivPdf: 'https://arxiv.org/pdf',
        osfApi: 'https://api.osf.io/v2',
        trove: 'https://share.osf.io/trove/index-card-search',
        openalexApi: 'https://api.openalex.org',
    },
    timeouts: {
        existenceCheck: 10000,
        request: 30000,
        download: 60000,
    },
};
