import type { LyricsProvider, LyricsQuery, ProviderOutcome } from "../interfaces/LyricsProvider";

/**
 * In-process provider that answers from a fixed table and records every query.
 * Stands in for the remote providers in tests.
 */
export class MockLyricsProvider implements LyricsProvider {
    public name = "MockNetwork";
    public readonly calls: LyricsQuery[] = [];

    constructor(
        public kind: 'api' | 'scrape' = 'api',
        private readonly answer: (query: LyricsQuery, signal?: AbortSignal) => Promise<ProviderOutcome> | ProviderOutcome =
            () => ({ status: 'not_found' })
    ) {}

    public async fetch(query: LyricsQuery, signal?: AbortSignal): Promise<ProviderOutcome> {
        this.calls.push(query);
        return this.answer(query, signal);
    }
}
