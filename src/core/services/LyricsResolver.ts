import type { AppConfig } from "../config/AppConfig";
import { TagWriteFailure, describeError } from "../errors";
import type { LyricsProvider, LyricsQuery } from "../interfaces/LyricsProvider";
import type { TagFields, TagStore } from "../interfaces/TagStore";
import { type TrackIdentity, describeTrack, identityKey } from "../interfaces/TrackIdentity";
import { type LyricsDocument, emptyDocument } from "../models/LyricsDocument";
import { PlainTextParser } from "../parsers/PlainTextParser";
import { parseTagLyrics } from "../parsers/LrcLineParser";
import { Logger } from "../utils/Logger";
import { clearSectionHeaders } from "../utils/SectionHeaders";
import { withTimeout } from "../utils/timeout";
import { guessTrack } from "./MetadataGuesser";

export type ResolverOptions = Pick<AppConfig, 'offline' | 'clearHeaders' | 'saveTags' | 'requestTimeoutMs'>;

/**
 * Decides which lyrics to show for a track:
 * embedded tag first, then the single configured remote provider.
 *
 * Results are cached for the current track only; asking for another
 * track replaces the entry.
 */
export class LyricsResolver {
    private cache: { key: string; document: Promise<LyricsDocument> } | null = null;
    private pendingWrites = new Set<Promise<void>>();
    private plain = new PlainTextParser();

    constructor(
        private readonly options: ResolverOptions,
        private readonly provider: LyricsProvider | null
    ) {}

    /**
     * Resolves lyrics for the identity. Repeated and concurrent calls for an
     * equal identity share one resolution. Never rejects.
     */
    public resolve(identity: TrackIdentity, tagStore: TagStore): Promise<LyricsDocument> {
        const key = identityKey(identity);
        if (this.cache && this.cache.key === key) {
            Logger.debug(`[Resolver] Cache hit for ${describeTrack(identity)}`);
            return this.cache.document;
        }

        const document = this.resolveUncached(identity, tagStore).catch((e: unknown) => {
            Logger.error(`[Resolver] Unexpected failure for ${describeTrack(identity)}`, describeError(e));
            return emptyDocument();
        });
        this.cache = { key, document };
        return document;
    }

    /**
     * Forgets the cached result so the next call resolves afresh.
     */
    public invalidate() {
        this.cache = null;
    }

    /**
     * Waits for tag writes started by earlier resolutions.
     */
    public async flushWrites(): Promise<void> {
        while (this.pendingWrites.size > 0) {
            await Promise.all([...this.pendingWrites]);
        }
    }

    private async resolveUncached(identity: TrackIdentity, tagStore: TagStore): Promise<LyricsDocument> {
        const tags = await this.readTags(identity.filePath, tagStore);

        // 1. Embedded lyrics are authoritative and shown as stored
        if (tags.lyrics !== undefined && tags.lyrics.trim() !== '') {
            Logger.info(`[Resolver] Using embedded lyrics for ${describeTrack(identity)}`);
            const parsed = parseTagLyrics(tags.lyrics);
            const document: LyricsDocument = { lines: parsed.lines, source: 'tag', headerCleared: false };
            if (parsed.timestamps) document.timestamps = parsed.timestamps;
            return document;
        }

        // 2. No network in offline mode or without a usable provider
        if (this.options.offline || !this.provider) {
            Logger.info(`[Resolver] No lyrics tag for ${describeTrack(identity)}; remote lookups are off.`);
            return emptyDocument();
        }

        // 3. Artist and title: player, then file tags, then the file name
        const query = this.buildQuery(identity, tags);
        if (!query) {
            Logger.info(`[Resolver] Cannot tell artist and title of ${identity.filePath}`);
            return emptyDocument();
        }

        // 4. Single attempt against the configured provider
        const provider = this.provider;
        const timeoutMs = this.options.requestTimeoutMs;
        const outcome = await withTimeout(provider.fetch(query, AbortSignal.timeout(timeoutMs)), timeoutMs)
            .catch((e: unknown) => ({ status: 'timeout' as const, reason: describeError(e) }));

        if (outcome.status === 'timeout') {
            Logger.warn(`[Resolver] ${provider.name} did not answer: ${outcome.reason}`);
            return emptyDocument();
        }
        if (outcome.status === 'error') {
            Logger.warn(`[Resolver] ${outcome.error.message}`, outcome.error);
            return emptyDocument();
        }
        if (outcome.status === 'not_found') {
            Logger.info(`[Resolver] ${provider.name} has no lyrics for ${query.artist} - ${query.title}`);
            return emptyDocument();
        }

        // 5. Optional header clearing for remote text
        let lines = this.plain.parse(outcome.text).lines;
        const headerCleared = this.options.clearHeaders;
        if (headerCleared) lines = clearSectionHeaders(lines);

        const document: LyricsDocument = { lines, source: provider.kind, headerCleared };
        Logger.info(`[Resolver] ${provider.name} returned ${lines.length} lines for ${query.artist} - ${query.title}`);

        // 6. Write back, never blocking the caller
        if (this.options.saveTags && lines.length > 0) {
            this.scheduleWrite(identity.filePath, tagStore, { lyrics: lines.join('\n'), artist: query.artist, title: query.title });
        }

        return document;
    }

    private async readTags(filePath: string, tagStore: TagStore): Promise<TagFields> {
        try {
            return await tagStore.read(filePath);
        } catch (e) {
            Logger.warn(`[Resolver] Could not read tags of ${filePath}`, describeError(e));
            return {};
        }
    }

    private buildQuery(identity: TrackIdentity, tags: TagFields): LyricsQuery | null {
        let artist = nonBlank(identity.artist) ?? nonBlank(tags.artist);
        let title = nonBlank(identity.title) ?? nonBlank(tags.title);
        if (artist === undefined || title === undefined) {
            const guess = guessTrack(identity.filePath);
            artist = artist ?? nonBlank(guess.artist);
            title = title ?? nonBlank(guess.title);
        }
        if (artist === undefined || title === undefined) return null;
        return { artist, title };
    }

    private scheduleWrite(filePath: string, tagStore: TagStore, fields: TagFields) {
        const write = tagStore.write(filePath, fields)
            .then(ok => {
                if (!ok) throw new TagWriteFailure(filePath, 'Tag store refused the write');
            })
            .catch((e: unknown) => {
                const failure = e instanceof TagWriteFailure ? e : new TagWriteFailure(filePath, describeError(e), { cause: e });
                Logger.warn(`[Resolver] ${failure.message}`);
            })
            .finally(() => {
                this.pendingWrites.delete(write);
            });
        this.pendingWrites.add(write);
    }
}

function nonBlank(value: string | undefined): string | undefined {
    return value !== undefined && value.trim() !== '' ? value : undefined;
}
