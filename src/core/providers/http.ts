import { TransientProviderError, describeError } from "../errors";
import { Logger } from "../utils/Logger";

export const BROWSER_USER_AGENT =
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export type HttpResult<T> =
    | { kind: 'ok'; body: T }
    | { kind: 'missing' }
    | { kind: 'error'; error: TransientProviderError };

/**
 * GET helper shared by the providers. A 404 maps to `missing`; any other
 * non-OK status, a network failure, an abort or a timeout maps to `error`.
 */
export async function httpGet<T>(
    provider: string,
    url: string,
    read: (response: Response) => Promise<T>,
    init: { headers?: Record<string, string>; signal?: AbortSignal } = {}
): Promise<HttpResult<T>> {
    let response: Response;
    try {
        Logger.debug(`[${provider}] GET ${url}`);
        response = await fetch(url, { headers: init.headers, signal: init.signal });
    } catch (e) {
        return { kind: 'error', error: new TransientProviderError(provider, `Request failed: ${describeError(e)}`, undefined, { cause: e }) };
    }

    if (response.status === 404) {
        return { kind: 'missing' };
    }
    if (!response.ok) {
        return { kind: 'error', error: new TransientProviderError(provider, `HTTP ${response.status} for ${url}`, response.status) };
    }

    try {
        return { kind: 'ok', body: await read(response) };
    } catch (e) {
        return { kind: 'error', error: new TransientProviderError(provider, `Unreadable response: ${describeError(e)}`, response.status, { cause: e }) };
    }
}

/**
 * Drops leading newlines, the way both sites pad the top of their lyrics.
 */
export function trimLeadingNewlines(text: string): string {
    return text.replace(/^(?:\r?\n)+/, '');
}
