import type { TransientProviderError } from "../errors";

export interface LyricsQuery {
    artist: string;
    title: string;
}

export type ProviderOutcome =
    | { status: 'found'; text: string }
    | { status: 'not_found' }
    | { status: 'error'; error: TransientProviderError };

/**
 * A remote source of plain-text lyrics.
 * Implementations report failures through the outcome and never reject.
 */
export interface LyricsProvider {
    /**
     * Name of the provider, used in logs.
     */
    name: string;

    /**
     * Which document source this provider produces.
     */
    kind: 'api' | 'scrape';

    fetch(query: LyricsQuery, signal?: AbortSignal): Promise<ProviderOutcome>;
}
