import path from 'node:path';
import type { TrackIdentity } from '../interfaces/TrackIdentity';

/**
 * Best-effort artist and title from a file path, for files without tags.
 *
 * Patterns, first match wins:
 * 1. `<artist> - <title>.<ext>`
 * 2. `<artist>-<title>.<ext>`
 * 3. `<parent dir>/<title>.<ext>`
 *
 * Parts are returned exactly as they appear in the name, without trimming.
 */
export function guessTrack(filePath: string): TrackIdentity {
    const parsed = path.posix.parse(filePath);
    const baseName = parsed.name;

    let artist: string | undefined;
    let title: string | undefined;

    const spaced = splitOnce(baseName, ' - ');
    const dashed = spaced ?? splitOnce(baseName, '-');
    if (dashed) {
        [artist, title] = dashed;
    } else {
        title = baseName;
        const parent = path.posix.basename(parsed.dir);
        artist = parent === '' ? undefined : parent;
    }

    if (!title) {
        return { filePath };
    }
    return { artist: artist === '' ? undefined : artist, title, filePath };
}

function splitOnce(value: string, separator: string): [string, string] | null {
    const index = value.indexOf(separator);
    if (index === -1) return null;
    return [value.slice(0, index), value.slice(index + separator.length)];
}
