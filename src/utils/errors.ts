/**
 * Error taxonomy for retrieval failures. Adapters throw these; the
 * PaperService turns them into `{ status: 'error' }` values.
 */
export type RetrievalErrorKind =
    | 'not_found'
    | 'invalid_provider'
    | 'upstream_request'
    | 'upstream_parse'
    | 'extraction';

export class RetrievalError extends Error {
    constructor(
        message: string,
        public readonly kind: RetrievalErrorKind,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RetrievalError';
    }
}

/**
 * A direct resource URL or id lookup came back empty / non-200.
 */
export class NotFoundError extends RetrievalError {
    constructor(message: string) {
        super(message, 'not_found');
        this.name = 'NotFoundError';
    }
}

/**
 * Provider id not present in the registry. Carries the valid ids so the
 * caller can correct the request.
 */
export class InvalidProviderError extends RetrievalError {
    constructor(
        public readonly providerId: string,
        public readonly validIds: string[],
        label = 'provider'
    ) {
        super(`Invalid ${label}: ${providerId}. Valid ${label}s: ${validIds.join(', ')}`, 'invalid_provider');
        this.name = 'InvalidProviderError';
    }
}

/**
 * Network-level or HTTP failure talking to an upstream API.
 */
export class UpstreamRequestError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(message, 'upstream_request', { cause });
        this.name = 'UpstreamRequestError';
    }
}

/**
 * Upstream answered with something we could not parse.
 */
export class UpstreamParseError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(message, 'upstream_parse', { cause });
        this.name = 'UpstreamParseError';
    }
}

/**
 * The document converter failed or produced nothing usable.
 */
export class ExtractionError extends RetrievalError {
    constructor(message: string, cause?: unknown) {
        super(message, 'extraction', { cause });
        this.name = 'ExtractionError';
    }
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
