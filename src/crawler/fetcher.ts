/**
 * src/crawler/fetcher.ts
 *
 * Single-shot page fetch over got-scraping. Library retries are off: the
 * CrawlWorker owns retry and backoff so every try is visible in its logs.
 *
 * Non-2xx responses are returned, not thrown. The worker decides what
 * counts as a failure.
 */

export interface FetchedPage {
    url: string;
    statusCode: number;
    body: string;
}

export interface PageFetcher {
    fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}

export interface HttpFetcherOptions {
    timeoutMs: number;
    userAgent: string;
}

/** Raised when a fetch was cancelled through its AbortSignal. */
export class FetchAbortedError extends Error {
    constructor(url: string) {
        super(`Fetch of ${url} was aborted`);
        this.name = 'FetchAbortedError';
    }
}

export class HttpPageFetcher implements PageFetcher {
    constructor(private readonly options: HttpFetcherOptions) {}

    async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
        if (signal?.aborted) throw new FetchAbortedError(url);

        const { gotScraping } = await import('got-scraping');
        const request = gotScraping({
            url,
            headers: {
                'User-Agent': this.options.userAgent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-IN,en;q=0.9',
            },
            timeout: { request: this.options.timeoutMs },
            retry: { limit: 0 },
            throwHttpErrors: false,
            followRedirect: true,
        });

        const cancel = (): void => request.cancel();
        signal?.addEventListener('abort', cancel, { once: true });
        try {
            const response = await request;
            return { url: response.url, statusCode: response.statusCode, body: response.body };
        } catch (err) {
            if (signal?.aborted) throw new FetchAbortedError(url);
            throw err;
        } finally {
            signal?.removeEventListener('abort', cancel);
        }
    }
}
