import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { FFmpegTagWriter, extractLyricsFromProbe } from './FFmpegTagWriter';
import { TagWriteFailure } from '../errors';
import type { CommandRunner } from '../utils/process';

const PROBE_OUTPUT = `Input #0, flac, from '/m/song.flac':
  Metadata:
    ARTIST          : Test Artist
    lyrics          : [00:01.00]First
                    : [00:02.00]Second
    genre           : Rock
  Duration: 00:03:20.00, start: 0.000000, bitrate: 900 kb/s
At least one output file must be specified`;

describe('extractLyricsFromProbe', () => {
    it('should collect the lyrics entry and its continuation lines', () => {
        expect(extractLyricsFromProbe(PROBE_OUTPUT)).toBe('[00:01.00]First\n[00:02.00]Second');
    });

    it('should accept language-suffixed keys', () => {
        expect(extractLyricsFromProbe('    lyrics-eng      : Only line\n  Duration: 00:01:00.00')).toBe('Only line');
    });

    it('should return undefined without a lyrics entry', () => {
        expect(extractLyricsFromProbe('    title : Song\n')).toBeUndefined();
    });
});

describe('FFmpegTagWriter', () => {
    let dir: string;
    let target: string;

    beforeEach(async () => {
        dir = await mkdtemp(path.join(os.tmpdir(), 'lyrics-tags-'));
        target = path.join(dir, 'song.mp3');
        await writeFile(target, 'original');
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    it('should pass all fields in one invocation and swap the file in', async () => {
        const calls: string[][] = [];
        const run: CommandRunner = async (_command, args) => {
            calls.push(args);
            await writeFile(args[args.length - 1], 'tagged');
            return { code: 0, stdout: '', stderr: '' };
        };
        const writer = new FFmpegTagWriter(run);

        await writer.write(target, { artist: 'A', title: 'T', lyrics: 'la la' });

        expect(calls).toHaveLength(1);
        expect(calls[0]).toEqual([
            '-hide_banner', '-v', 'error', '-y',
            '-i', target,
            '-map', '0', '-c', 'copy', '-map_metadata', '0',
            '-metadata', 'artist=A', '-metadata', 'title=T', '-metadata', 'lyrics=la la',
            path.join(dir, '.song.lyrics-tmp.mp3')
        ]);
        expect(await readFile(target, 'utf8')).toBe('tagged');
        expect(await readdir(dir)).toEqual(['song.mp3']);
    });

    it('should leave the original untouched when ffmpeg fails', async () => {
        const run: CommandRunner = async (_command, args) => {
            await writeFile(args[args.length - 1], 'partial');
            return { code: 1, stdout: '', stderr: 'Invalid data found' };
        };
        const writer = new FFmpegTagWriter(run);

        await expect(writer.write(target, { lyrics: 'x' })).rejects.toBeInstanceOf(TagWriteFailure);
        expect(await readFile(target, 'utf8')).toBe('original');
        expect(await readdir(dir)).toEqual(['song.mp3']);
    });

    it('should report a missing binary as a write failure', async () => {
        const run: CommandRunner = async () => {
            throw Object.assign(new Error('spawn ffmpeg ENOENT'), { code: 'ENOENT' });
        };
        await expect(new FFmpegTagWriter(run).write(target, { lyrics: 'x' })).rejects.toThrow('Could not start ffmpeg');
    });

    it('should probe lyrics through the runner', async () => {
        const run: CommandRunner = async () => ({ code: 1, stdout: '', stderr: PROBE_OUTPUT });
        expect(await new FFmpegTagWriter(run).probeLyrics(target)).toBe('[00:01.00]First\n[00:02.00]Second');
    });
});
