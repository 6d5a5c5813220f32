import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    /** Objects are sent as JSON, URLSearchParams as a form */
    body?: string | object | URLSearchParams;
    timeout?: number;
    source?: string;  // For per-source request counting
}

/**
 * HTTP response wrapper. `data` is parsed JSON when the server says so,
 * otherwise the body text; callers validate it.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification. Status 0 means the request never got a
 * response (timeout, connection failure).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    /** Retries for retryable failures; 0 sends every request exactly once */
    maxRetries?: number;
}

/**
 * Centralized HTTP client with per-request timeouts and optional retry.
 */
export class HttpClient {
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        this.maxRetries = options?.maxRetries ?? 0;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `scite-vivo-import/${version}`;
    }

    /**
     * Make an HTTP request. Non-2xx responses and transport failures are
     * thrown as `HttpError`.
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const logger = getLogger();
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body instanceof URLSearchParams) {
            requestBody = body.toString();
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/x-www-form-urlencoded';
        } else if (typeof body === 'object') {
            requestBody = JSON.stringify(body);
            requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
        } else {
            requestBody = body;
        }

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data = parseBody(await response.text(), contentType);

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt, initialBackoff, maxBackoff);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            `Retryable HTTP error, backing off`
                        );
                        await sleep(backoff);
                        continue;
                    }

                    throw new HttpError(
                        `HTTP ${response.status}: ${response.statusText}`,
                        response.status,
                        retryable,
                        data
                    );
                }

                return { status: response.status, headers: responseHeaders, data, ok: true };
            } catch (error) {
                if (error instanceof HttpError) throw error;

                const errorCode = networkErrorCode(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt, initialBackoff, maxBackoff);
                    logger.warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        `Retryable network error, backing off`
                    );
                    await sleep(backoff);
                    continue;
                }

                if (error instanceof Error && error.name === 'AbortError') {
                    throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
                }

                throw new HttpError(
                    `Network error: ${error instanceof Error ? error.message : String(error)}`,
                    0,
                    retryable
                );
            } finally {
                clearTimeout(timeoutId);
            }
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    /**
     * Convenience method for GET requests.
     */
    async get(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post(
        url: string,
        body: string | object | URLSearchParams,
        options?: Omit<HttpRequestOptions, 'method' | 'body'>
    ): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
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

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        // Try parsing as seconds
        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return seconds * 1000;

        // Try parsing as HTTP date
        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.max(0, date.getTime() - Date.now());
        }

        return null;
    }

    private calculateBackoff(attempt: number, initial: number, max: number): number {
        // Exponential backoff with jitter
        const exponential = initial * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(max, exponential + jitter);
    }
}

/**
 * System error code of a failed fetch. undici puts it on `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * JSON when the server says so and the text parses, otherwise the raw text.
 * The status alone decides success, so an empty or broken JSON body is not an error.
 */
function parseBody(text: string, contentType: string): unknown {
    if (!contentType.includes('application/json') || text.length === 0) return text;
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch (error) {
        if (error instanceof SyntaxError) return text;
        throw error;
    }
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Create a new HTTP client.
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
