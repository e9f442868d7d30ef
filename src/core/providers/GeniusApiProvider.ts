import type { LyricsProvider, LyricsQuery, ProviderOutcome } from "../interfaces/LyricsProvider";
import { ScoringService, type SongCandidate } from "../services/ScoringService";
import { Logger } from "../utils/Logger";
import { extractElements, htmlToText } from "../utils/html";
import { BROWSER_USER_AGENT, httpGet, trimLeadingNewlines } from "./http";

interface GeniusHit {
    type: string;
    result: SongCandidate;
}

// Hits with these words in the title are never the studio track being played
const EXCLUDED_TERMS = ['(remix)', 'instrumental'];

/**
 * Looks songs up through the Genius search API (token required),
 * then extracts the lyrics from the chosen song's page.
 */
export class GeniusApiProvider implements LyricsProvider {
    public name = "Genius";
    public kind = 'api' as const;

    private readonly API_BASE = "https://api.genius.com";
    private scoring = new ScoringService();

    constructor(private readonly token: string) {}

    public async fetch(query: LyricsQuery, signal?: AbortSignal): Promise<ProviderOutcome> {
        const q = `${query.title} ${query.artist}`.trim();
        const searchUrl = `${this.API_BASE}/search?q=${encodeURIComponent(q)}`;
        Logger.info(`[Genius] Searching: ${q}`);

        const search = await httpGet(this.name, searchUrl, r => r.json(), {
            headers: { Authorization: `Bearer ${this.token}`, Accept: 'application/json' },
            signal
        });
        if (search.kind === 'error') return { status: 'error', error: search.error };
        if (search.kind === 'missing') return { status: 'not_found' };

        const hits = parseHits(search.body).filter(hit =>
            hit.type === 'song' &&
            !EXCLUDED_TERMS.some(term => hit.result.title.toLowerCase().includes(term))
        );
        const best = this.scoring.pickBest(query, hits.map(h => h.result));
        if (!best) {
            Logger.info(`[Genius] No matching song among ${hits.length} hits for "${q}".`);
            return { status: 'not_found' };
        }
        Logger.info(`[Genius] Picked '${best.candidate.artist} - ${best.candidate.title}' (score ${best.score})`);

        const page = await httpGet(this.name, best.candidate.url, r => r.text(), {
            headers: { 'User-Agent': BROWSER_USER_AGENT },
            signal
        });
        if (page.kind === 'error') return { status: 'error', error: page.error };
        if (page.kind === 'missing') return { status: 'not_found' };

        const containers = extractElements(page.body, 'div', 'data-lyrics-container', 'true');
        if (containers.length === 0) {
            Logger.warn(`[Genius] No lyrics block on ${best.candidate.url}`);
            return { status: 'not_found' };
        }

        const text = cleanGeniusLyrics(containers.map(htmlToText).join('\n'), best.candidate.title);
        if (!text.trim()) return { status: 'not_found' };
        return { status: 'found', text };
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

/**
 * Picks the usable hits out of a search response, skipping malformed entries.
 */
export function parseHits(body: unknown): GeniusHit[] {
    if (!isRecord(body)) return [];
    const response = body.response;
    if (!isRecord(response)) return [];
    const rawHits = response.hits;
    if (!Array.isArray(rawHits)) return [];

    const hits: GeniusHit[] = [];
    const entries: unknown[] = rawHits;
    for (const hit of entries) {
        if (!isRecord(hit)) continue;
        const result = hit.result;
        if (!isRecord(result)) continue;
        const { title, url, primary_artist: artist } = result;
        if (typeof title !== 'string' || typeof url !== 'string') continue;
        hits.push({
            type: typeof hit.type === 'string' ? hit.type : 'unknown',
            result: {
                title,
                url,
                artist: isRecord(artist) && typeof artist.name === 'string' ? artist.name : ''
            }
        });
    }
    return hits;
}

/**
 * Strips the page furniture Genius mixes into the lyrics text.
 */
export function cleanGeniusLyrics(raw: string, songTitle: string): string {
    let lyrics = raw;
    for (const junk of [`${songTitle} Lyrics`, 'Embed', 'Share URLCopyCopy', 'You might also like']) {
        lyrics = lyrics.split(junk).join('');
    }

    // Trailing pyong counter
    lyrics = lyrics.replace(/\d{1,3}$/, '');

    lyrics = lyrics
        .split('\n')
        .filter(line => !line.includes('Contributors'))
        .join('\n');

    return trimLeadingNewlines(lyrics);
}
