import path from 'node:path';
import { rename, rm } from 'node:fs/promises';
import type { TagFields } from '../interfaces/TagStore';
import { TagWriteFailure, describeError } from '../errors';
import { Logger } from '../utils/Logger';
import { runCommand, type CommandResult, type CommandRunner } from '../utils/process';

/**
 * Reads and rewrites tags through the ffmpeg binary.
 * Used for formats music-metadata reads but cannot write, and as a last-resort lyrics probe.
 */
export class FFmpegTagWriter {
    constructor(
        private readonly run: CommandRunner = runCommand,
        private readonly binary = 'ffmpeg'
    ) {}

    /**
     * Probes the file and pulls the lyrics entry out of ffmpeg's metadata dump.
     */
    public async probeLyrics(filePath: string): Promise<string | undefined> {
        try {
            Logger.debug(`[FFmpeg] Probing metadata for ${filePath}`);
            // Without an output file ffmpeg exits with 1 after printing the input info
            const { stderr } = await this.run(this.binary, ['-hide_banner', '-i', filePath], { timeoutMs: 10000 });
            const lyrics = extractLyricsFromProbe(stderr);
            if (lyrics) Logger.info(`[FFmpeg] Extracted lyrics from probe output.`);
            return lyrics;
        } catch (e) {
            Logger.warn(`[FFmpeg] Metadata probe failed`, describeError(e));
            return undefined;
        }
    }

    /**
     * Copies all streams into a sibling temp file with the new tags, then
     * renames it over the original so readers never see a half-written file.
     * @throws TagWriteFailure
     */
    public async write(filePath: string, fields: TagFields): Promise<void> {
        const parsed = path.parse(filePath);
        const tempPath = path.join(parsed.dir, `.${parsed.name}.lyrics-tmp${parsed.ext}`);

        const metadataArgs: string[] = [];
        for (const key of ['artist', 'title', 'lyrics'] as const) {
            const value = fields[key];
            if (value !== undefined) metadataArgs.push('-metadata', `${key}=${value}`);
        }

        const args = [
            '-hide_banner', '-v', 'error', '-y',
            '-i', filePath,
            '-map', '0', '-c', 'copy', '-map_metadata', '0',
            ...metadataArgs,
            tempPath
        ];

        let result: CommandResult;
        try {
            result = await this.run(this.binary, args, { timeoutMs: 60000 });
        } catch (e) {
            throw new TagWriteFailure(filePath, `Could not start ${this.binary}`, { cause: e });
        }

        if (result.code !== 0) {
            await rm(tempPath, { force: true });
            throw new TagWriteFailure(filePath, `${this.binary} exited with ${result.code}: ${result.stderr.trim()}`);
        }

        try {
            await rename(tempPath, filePath);
        } catch (e) {
            await rm(tempPath, { force: true });
            throw new TagWriteFailure(filePath, 'Could not replace file', { cause: e });
        }
        Logger.info(`[FFmpeg] Wrote tags to ${filePath}`);
    }
}

/**
 * Collects the value of the first `lyrics` key from ffmpeg's input dump.
 *
 * Format seen:
 *     lyrics          : [00:23.35]Line 1
 *                     : [00:26.00]Line 2
 *     genre           : Rock
 */
export function extractLyricsFromProbe(stderr: string): string | undefined {
    let collected = "";
    let inLyrics = false;

    for (const line of stderr.split(/\r?\n/)) {
        const trimmed = line.trim();

        // Start of lyrics; mp3 files report the key with a language suffix (lyrics-eng)
        if (!inLyrics && /^lyrics(?:-\w+)?\s*:/i.test(trimmed)) {
            inLyrics = true;
            collected += trimmed.substring(trimmed.indexOf(':') + 1).trim() + "\n";
            continue;
        }

        if (inLyrics) {
            if (trimmed.startsWith(':')) {
                collected += trimmed.substring(1).trim() + "\n";
            } else {
                // Next metadata key or section
                break;
            }
        }
    }

    const lyrics = collected.trim();
    return lyrics ? lyrics : undefined;
}
