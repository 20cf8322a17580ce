import { VERSION, type HttpConfig } from '../types/index.js';
import { getLogger } from './logger.js';

const logger = getLogger();

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
    chembl: { tokensPerSecond: 5, maxBurst: 5 },
    bioportal: { tokensPerSecond: 10, maxBurst: 10 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper. `data` is parsed JSON or text and is
 * validated by the caller.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
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

export interface HttpClientOptions extends Partial<HttpConfig> {
    version?: string;
}

/**
 * undici reports socket failures as `TypeError: fetch failed` with the
 * system error under `cause`.
 */
function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    for (const candidate of [error, error.cause]) {
        if (candidate && typeof candidate === 'object' && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Centralized HTTP client with per-source rate limiting and retry logic.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly maxRetries: number;
    private readonly initialBackoffMs: number;
    private readonly maxBackoffMs: number;
    private readonly userAgent: string;

    constructor(options: HttpClientOptions = {}) {
        this.defaultTimeout = options.timeout ?? 30000;
        this.maxRetries = options.maxRetries ?? 3;
        this.initialBackoffMs = options.initialBackoffMs ?? 1000;
        this.maxBackoffMs = options.maxBackoffMs ?? 30000;
        const version = options.version ?? VERSION;
        this.userAgent = options.email
            ? `ontoresolve/${version} (mailto:${options.email})`
            : `ontoresolve/${version}`;
    }

    /**
     * GET with per-source rate limiting and retry.
     */
    async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            headers = {},
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: 'application/json',
            ...headers,
        };

        for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
            const controller = new AbortController();
            const timeoutId = setTimeout(() => controller.abort(), timeout);

            try {
                const response = await fetch(url, {
                    method: 'GET',
                    headers: requestHeaders,
                    signal: controller.signal,
                });

                const contentType = response.headers.get('content-type') ?? '';
                const data: unknown = contentType.includes('application/json')
                    ? await response.json()
                    : await response.text();

                const responseHeaders: Record<string, string> = {};
                response.headers.forEach((value, key) => {
                    responseHeaders[key] = value;
                });

                if (!response.ok) {
                    const retryable = RETRYABLE_STATUS_CODES.has(response.status);

                    if (retryable && attempt < this.maxRetries) {
                        const retryAfter = this.parseRetryAfter(response.headers.get('retry-after'));
                        const backoff = retryAfter ?? this.calculateBackoff(attempt);

                        logger.warn(
                            { status: response.status, attempt: attempt + 1, backoffMs: backoff, url },
                            'Retryable HTTP error, backing off'
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
                const timedOut = error instanceof Error && error.name === 'AbortError';
                const retryable = timedOut || (errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : false);

                if (retryable && attempt < this.maxRetries) {
                    const backoff = this.calculateBackoff(attempt);
                    logger.warn(
                        { errorCode, timedOut, attempt: attempt + 1, backoffMs: backoff, url },
                        'Retryable network error, backing off'
                    );
                    await sleep(backoff);
                    continue;
                }

                if (timedOut) {
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

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }

    private parseRetryAfter(header: string | null): number | null {
        if (!header) return null;

        const seconds = parseInt(header, 10);
        if (!isNaN(seconds)) return Math.min(this.maxBackoffMs, seconds * 1000);

        const date = new Date(header);
        if (!isNaN(date.getTime())) {
            return Math.min(this.maxBackoffMs, Math.max(0, date.getTime() - Date.now()));
        }

        return null;
    }

    private calculateBackoff(attempt: number): number {
        // Exponential backoff with jitter
        const exponential = this.initialBackoffMs * Math.pow(2, attempt);
        const jitter = Math.random() * exponential * 0.5;
        return Math.min(this.maxBackoffMs, exponential + jitter);
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
