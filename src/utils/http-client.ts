import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'HEAD';
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source request counting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * HTTP error with status. Status 0 means the request never got a response
 * (network failure or timeout).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * The response arrived but its body could not be decoded.
 */
export class ResponseParseError extends Error {
    constructor(
        message: string,
        public readonly status: number
    ) {
        super(message);
        this.name = 'ResponseParseError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
}

/**
 * Centralized fetch-based HTTP client. Every call carries a timeout;
 * non-2xx responses become HttpError. No retries.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = options?.email
            ? `PreprintBridge/${version} (mailto:${options.email})`
            : `PreprintBridge/${version}`;
    }

    /**
     * GET a JSON document. A body that is not valid JSON throws
     * ResponseParseError.
     */
    async getJson<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.send(url, {
            ...options,
            method: 'GET',
            headers: { Accept: 'application/json', ...options?.headers },
        }, async (response) => {
            const text = await response.text();
            try {
                return JSON.parse(text) as T;
            } catch (error) {
                throw new ResponseParseError(
                    `Invalid JSON from ${url}: ${error instanceof Error ? error.message : String(error)}`,
                    response.status
                );
            }
        });
    }

    /**
     * GET a text document (XML feeds).
     */
    async getText(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<string>> {
        return this.send(url, { ...options, method: 'GET' }, (response) => response.text());
    }

    /**
     * GET a binary body (PDF downloads).
     */
    async getBuffer(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<Buffer>> {
        return this.send(url, { ...options, method: 'GET' }, async (response) =>
            Buffer.from(await response.arrayBuffer())
        );
    }

    /**
     * HEAD request. Resolves with the status for any HTTP response;
     * only network failures throw.
     */
    async head(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<null>> {
        try {
            return await this.send(url, { ...options, method: 'HEAD' }, async () => null);
        } catch (error) {
            if (error instanceof HttpError && error.status > 0) {
                return { status: error.status, headers: {}, data: null, ok: false };
            }
            throw error;
        }
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    /**
     * Issue the request and read its body under one timeout: the timer
     * covers the headers and the body read alike.
     */
    private async send<T>(
        url: string,
        options: HttpRequestOptions,
        readBody: (response: Response) => Promise<T>
    ): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const controller = new AbortController();
        const timedOut = new Promise<never>((_resolve, reject) => {
            controller.signal.addEventListener('abort', () => {
                reject(new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0));
            }, { once: true });
        });
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            let response: Response;
            try {
                response = await Promise.race([
                    fetch(url, {
                        method,
                        headers: { 'User-Agent': this.userAgent, ...headers },
                        signal: controller.signal,
                    }),
                    timedOut,
                ]);
            } catch (error) {
                throw transportError(error, timeout, url);
            }

            if (!response.ok) {
                const body = method === 'HEAD'
                    ? undefined
                    : await Promise.race([response.text(), timedOut]).catch(() => undefined);
                logger.debug({ status: response.status, url }, 'HTTP error response');
                throw new HttpError(
                    `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
                    response.status,
                    body
                );
            }

            let data: T;
            try {
                data = await Promise.race([readBody(response), timedOut]);
            } catch (error) {
                if (error instanceof ResponseParseError) throw error;
                throw transportError(error, timeout, url);
            }

            return this.wrap(response, data);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    private wrap<T>(response: Response, data: T): HttpResponse<T> {
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });
        return { status: response.status, headers: responseHeaders, data, ok: response.ok };
    }
}

/**
 * Map a fetch or body-read rejection to a status-0 HttpError.
 */
function transportError(error: unknown, timeout: number, url: string): HttpError {
    if (error instanceof HttpError) {
        return error;
    }
    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0);
    }
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0
    );
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
