import { getLogger } from './logger.js';
import { VERSION } from '../version.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-source rate limit configurations.
 */
const DEFAULT_RATE_LIMIT: RateLimit = { tokensPerSecond: 5, maxBurst: 5 };
const RATE_LIMITS: Record<string, RateLimit> = {
    crossref: { tokensPerSecond: 10, maxBurst: 10 },  // polite pool with mailto
    pubmed: { tokensPerSecond: 3, maxBurst: 3 },      // E-utilities: 3/s without API key
    deepl: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    params?: Record<string, string | number | undefined>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
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
 * HTTP error with classification.
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

/**
 * The request succeeded but the body could not be decoded.
 */
export class ResponseParseError extends Error {
    constructor(message: string, public readonly url: string) {
        super(message);
        this.name = 'ResponseParseError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    maxRetries?: number;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly maxRetries: number;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 10000;
        this.maxRetries = options?.maxRetries ?? 3;
        const version = options?.version ?? VERSION;
        const email = options?.email ?? 'litalert@example.com';
        this.userAgent = `litalert/${version} (mailto:${email})`;
    }

    /**
     * Make a request and decode the body as JSON.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const { response, fullUrl } = await this.send(url, options);
        const text = await response.text();

        let data: T;
        try {
            data = JSON.parse(text) as T;
        } catch (error) {
            throw new ResponseParseError(
                `Invalid JSON from ${fullUrl}: ${error instanceof Error ? error.message : String(error)}`,
                fullUrl
            );
        }

        return { status: response.status, headers: collectHeaders(response), data, ok: true };
    }

    /**
     * Make a request and return the raw body (XML endpoints).
     */
    async requestText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        const { response } = await this.send(url, options);
        const data = await response.text();
        return { status: response.status, headers: collectHeaders(response), data, ok: true };
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
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

    // ─── Private helpers ──────────────────────────────────────

    private async send(url: string, options: HttpRequestOptions): Promise<{ response: Response; fullUrl: string }> {
        const {
            method = 'GET',
            headers = {},
            params,
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        const fullUrl = withParams(url, params);

        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body !== undefined) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const initialBackoff = 1000;
        const maxBackoff = 30000;

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            let response: Response;
            try {
                response = await fetch(fullUrl, {
                    method,
                    headers: requestHeaders,
                    body: requestBody,
                    signal: controller.signal,
                });
            } catch (error) {
                clearTimeout(timeoutId);

                const errorCode = networkErrorCode(error);
                const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false;

                if (retryable && attempt < this.maxRetries) {
                    const backoff = calculateBackoff(attempt, initialBackoff, maxBackoff);
                    getLogger().warn(
                        { errorCode, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
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
            }
            clearTimeout(timeoutId);

            if (response.ok) {
                return { response, fullUrl };
            }

            const retryable = RETRYABLE_STATUS_CODES.has(response.status);
            if (retryable && attempt < this.maxRetries) {
                const retryAfter = parseRetryAfter(response.headers.get('retry-after'));
                const backoff = retryAfter ?? calculateBackoff(attempt, initialBackoff, maxBackoff);

                getLogger().warn(
                    { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                    'Retryable HTTP error, backing off'
                );
                await sleep(backoff);
                continue;
            }

            const errorBody = await response.text().catch(() => '');
            throw new HttpError(
                `HTTP ${response.status}: ${response.statusText}`,
                response.status,
                retryable,
                errorBody
            );
        }

        throw new HttpError(`Max retries exceeded for ${url}`, 0, false);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Append query parameters, skipping undefined values.
 */
function withParams(url: string, params?: Record<string, string | number | undefined>): string {
    if (!params) return url;

    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) search.set(key, String(value));
    }

    const query = search.toString();
    if (!query) return url;
    return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

function collectHeaders(response: Response): Record<string, string> {
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
        headers[key] = value;
    });
    return headers;
}

/**
 * Node's fetch wraps socket errors: the errno code sits on `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    for (const candidate of [error, error instanceof Error ? error.cause : undefined]) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

function parseRetryAfter(header: string | null): number | null {
    if (!header) return null;

    const seconds = parseInt(header, 10);
    if (!isNaN(seconds)) return seconds * 1000;

    const date = new Date(header);
    if (!isNaN(date.getTime())) {
        return Math.max(0, date.getTime() - Date.now());
    }

    return null;
}

function calculateBackoff(attempt: number, initial: number, max: number): number {
    // Exponential backoff with jitter
    const exponential = initial * Math.pow(2, attempt);
    const jitter = Math.random() * exponential * 0.5;
    return Math.min(max, exponential + jitter);
}

function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

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
