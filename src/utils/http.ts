import { UpstreamService, UpstreamUnavailableError, describeError } from './errors.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface RequestOptions {
    service: UpstreamService;
    timeoutMs: number;
    headers?: Record<string, string>;
    fetchImpl?: FetchLike;
}

export async function sleep(ms: number): Promise<void> {
    await new Promise<void>(resolve => setTimeout(resolve, ms));
}

/**
 * GET a URL and return the body as text. Network failures, timeouts and
 * non-2xx responses all surface as UpstreamUnavailableError.
 */
export async function requestText(url: string, options: RequestOptions): Promise<string> {
    const fetchImpl = options.fetchImpl ?? fetch;
    let response: Response;

    try {
        response = await fetchImpl(url, {
            method: 'GET',
            headers: options.headers,
            signal: AbortSignal.timeout(options.timeoutMs),
        });
    } catch (error) {
        throw new UpstreamUnavailableError(
            `${options.service} request failed: ${describeError(error)}`,
            options.service,
            0,
            url
        );
    }

    if (!response.ok) {
        throw new UpstreamUnavailableError(
            `${options.service} API returned status ${response.status}`,
            options.service,
            response.status,
            url
        );
    }

    try {
        return await response.text();
    } catch (error) {
        throw new UpstreamUnavailableError(
            `${options.service} response could not be read: ${describeError(error)}`,
            options.service,
            response.status,
            url
        );
    }
}
