import { Readable, Transform, pipeline } from 'node:stream';
import { describeError } from '../types/index.js';
import { getLogger } from './logger.js';

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

        // Wait until a token is available
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

/**
 * Abort signal that fires after `ms` without activity. `touch()` restarts the countdown.
 */
class IdleTimeout {
    private readonly controller = new AbortController();
    private timer: NodeJS.Timeout;
    private onExpire: (() => void) | null = null;

    constructor(private readonly ms: number) {
        this.timer = setTimeout(() => this.expire(), ms);
    }

    get signal(): AbortSignal {
        return this.controller.signal;
    }

    touch(): void {
        clearTimeout(this.timer);
        this.timer = setTimeout(() => this.expire(), this.ms);
    }

    clear(): void {
        clearTimeout(this.timer);
    }

    whenExpired(callback: () => void): void {
        this.onExpire = callback;
    }

    private expire(): void {
        this.onExpire?.();
        this.controller.abort();
    }
}

export interface RateLimit {
    tokensPerSecond: number;
    maxBurst: number;
}

/**
 * Per-host rate limits. A burst of 1 keeps each host at one request in flight.
 */
const RATE_LIMITS: Record<string, RateLimit> = {
    dblp: { tokensPerSecond: 1, maxBurst: 1 },
    arxiv: { tokensPerSecond: 1 / 3, maxBurst: 1 },  // arXiv API asks for one request every 3 s
    download: { tokensPerSecond: 1, maxBurst: 1 },
    default: { tokensPerSecond: 1, maxBurst: 1 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    headers?: Record<string, string>;
    query?: Record<string, string | number>;
    timeout?: number;
    source?: string;  // For per-host rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * Streamed response: headers are available, the body has not been read yet.
 */
export interface HttpStreamResponse {
    status: number;
    /** Final URL after redirects */
    url: string;
    contentType: string;
    body: Readable;
}

/**
 * HTTP error with status (0 for transport failures and timeouts).
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly url: string
    ) {
        super(message);
        this.name = 'HttpError';
    }

    get forbidden(): boolean {
        return this.status === 403;
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
    rateLimits?: Record<string, RateLimit>;
}

/**
 * Centralized HTTP client with per-host rate limiting and bounded timeouts.
 * JSON and text reads time out on the whole exchange, streams on inactivity.
 * Failed requests are not retried.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;
    private readonly rateLimits: Record<string, RateLimit>;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        const contact = options?.email ? ` (mailto:${options.email})` : '';
        this.userAgent = `paperfetch/${version}${contact}`;
        this.rateLimits = { ...RATE_LIMITS, ...options?.rateLimits };
    }

    /**
     * GET a JSON document. The body is returned unvalidated.
     */
    async getJson(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<unknown>> {
        const response = await this.send(url, options, 'application/json');
        try {
            return { ...this.wrap(response), data: await response.json() };
        } catch (error) {
            throw new HttpError(`Malformed JSON from ${url}: ${describeError(error)}`, response.status, url);
        }
    }

    /**
     * GET a text document (XML feeds, HTML).
     */
    async getText(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<string>> {
        const response = await this.send(url, options, '*/*');
        try {
            return { ...this.wrap(response), data: await response.text() };
        } catch (error) {
            throw new HttpError(`Failed to read body from ${url}: ${describeError(error)}`, response.status, url);
        }
    }

    /**
     * GET with the body left as a stream. Redirects are followed.
     *
     * The timeout bounds inactivity, not the whole transfer: the wait for the
     * response and then each gap between body chunks.
     */
    async stream(url: string, options: HttpRequestOptions = {}): Promise<HttpStreamResponse> {
        const timeout = options.timeout ?? this.defaultTimeout;
        const idle = new IdleTimeout(timeout);

        let response: Response;
        try {
            response = await this.send(url, options, 'application/pdf,*/*', idle.signal);
        } catch (error) {
            idle.clear();
            throw error;
        }

        const finalUrl = response.url || url;
        if (!response.body) {
            idle.clear();
            throw new HttpError(`Empty response body from ${url}`, response.status, url);
        }

        idle.touch();
        const body = new Transform({
            transform(chunk: Uint8Array, _encoding, callback) {
                idle.touch();
                callback(null, chunk);
            },
        });
        idle.whenExpired(() => {
            body.destroy(new HttpError(`Download stalled: no data for ${timeout}ms: ${finalUrl}`, 0, finalUrl));
        });

        pipeline(Readable.fromWeb(response.body), body, (error) => {
            idle.clear();
            if (error) {
                getLogger('http').debug({ url: finalUrl, error: describeError(error) }, 'Response stream closed early');
            }
        });

        return {
            status: response.status,
            url: finalUrl,
            contentType: response.headers.get('content-type') ?? '',
            body,
        };
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

    private async send(
        url: string,
        options: HttpRequestOptions,
        accept: string,
        signal?: AbortSignal
    ): Promise<Response> {
        const {
            headers = {},
            query,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        const target = query ? withQuery(url, query) : url;

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        // Track request count
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            Accept: accept,
            ...headers,
        };

        getLogger('http').debug({ url: target, source }, 'HTTP GET');

        let response: Response;
        try {
            response = await fetch(target, {
                method: 'GET',
                headers: requestHeaders,
                redirect: 'follow',
                signal: signal ?? AbortSignal.timeout(timeout),
            });
        } catch (error) {
            if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
                throw new HttpError(`Request timeout after ${timeout}ms: ${target}`, 0, target);
            }
            throw new HttpError(`Network error: ${describeError(error)}`, 0, target);
        }

        if (!response.ok) {
            // Release the connection without reading the body
            await response.body?.cancel().catch((error: unknown) => {
                getLogger('http').debug({ error, url: target }, 'Failed to cancel response body');
            });
            throw new HttpError(`HTTP ${response.status}: ${response.statusText}`, response.status, target);
        }

        return response;
    }

    private wrap(response: Response): Omit<HttpResponse<never>, 'data'> {
        const responseHeaders: Record<string, string> = {};
        response.headers.forEach((value, key) => {
            responseHeaders[key] = value;
        });
        return { status: response.status, headers: responseHeaders, ok: response.ok };
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = this.rateLimits[source] ?? this.rateLimits['default'] ?? { tokensPerSecond: 1, maxBurst: 1 };
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Append query parameters to a URL.
 */
export function withQuery(url: string, query: Record<string, string | number>): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
        params.set(key, String(value));
    }
    return `${url}?${params.toString()}`;
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
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
