import { parseFile } from 'music-metadata';
import type { TagFields, TagStore } from '../interfaces/TagStore';
import { describeError } from '../errors';
import { Logger } from '../utils/Logger';
import { FFmpegTagWriter } from './FFmpegTagWriter';

// Native frame ids that carry unsynchronised lyrics, lowercased
const NATIVE_LYRICS_IDS = new Set(['©lyr', 'uslt', 'lyrics', 'unsynced lyrics', 'unsyncedlyrics']);

/**
 * Lyrics text from a tag value: plain strings, or USLT-style `{ text }` objects.
 */
export function lyricsText(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'object' && value !== null && 'text' in value && typeof value.text === 'string') {
        return value.text;
    }
    return undefined;
}

function present(value: string | undefined): string | undefined {
    return value !== undefined && value.trim() !== '' ? value : undefined;
}

/**
 * Tag store over real audio files: music-metadata for reading,
 * ffmpeg for writing and as a fallback lyrics probe.
 */
export class MetadataTagStore implements TagStore {
    constructor(private readonly ffmpeg: FFmpegTagWriter = new FFmpegTagWriter()) {}

    public async read(filePath: string): Promise<TagFields> {
        const result: TagFields = {};
        try {
            const metadata = await parseFile(filePath, { skipCovers: true, duration: false });
            const common = metadata.common;

            result.title = present(common.title);
            result.artist = present(common.artist);

            // PRIORITY 1: common.lyrics
            result.lyrics = present(lyricsText(common.lyrics?.[0]));

            // PRIORITY 2: native frames (USLT, ©lyr, Vorbis LYRICS)
            if (!result.lyrics) {
                for (const [tagType, tags] of Object.entries(metadata.native)) {
                    const tag = tags.find(t => NATIVE_LYRICS_IDS.has(String(t.id).toLowerCase()));
                    const text = tag ? present(lyricsText(tag.value)) : undefined;
                    if (text) {
                        Logger.debug(`[Metadata] Found lyrics in native ${tagType}:${tag?.id}`);
                        result.lyrics = text;
                        break;
                    }
                }
            }
        } catch (error) {
            Logger.warn(`[Metadata] Failed to parse ${filePath}`, describeError(error));
        }

        // Final Fallback: FFmpeg Probe
        if (!result.lyrics) {
            result.lyrics = present(await this.ffmpeg.probeLyrics(filePath));
        }

        return result;
    }

    public async write(filePath: string, fields: TagFields): Promise<boolean> {
        try {
            await this.ffmpeg.write(filePath, fields);
            return true;
        } catch (error) {
            Logger.error(`[Metadata] Tag write failed`, describeError(error));
            return false;
        }
    }
}
