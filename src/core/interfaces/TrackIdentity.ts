/**
 * Identifies what is currently playing.
 * Built fresh for every playback sample and never mutated.
 */
export interface TrackIdentity {
    /** Artist from player tags or guessed from the path. */
    artist?: string;

    /** Title from player tags or guessed from the path. */
    title?: string;

    /** Absolute path of the audio file as reported by the player. */
    filePath: string;
}

/**
 * Key used for change detection and caching.
 * Identities with both artist and title compare by those two, all others by path.
 */
export function identityKey(track: TrackIdentity): string {
    if (track.artist !== undefined && track.title !== undefined) {
        return `tag:${track.artist}\u0000${track.title}`;
    }
    return `path:${track.filePath}`;
}

export function sameIdentity(a: TrackIdentity | null, b: TrackIdentity | null): boolean {
    if (a === null || b === null) return a === b;
    return identityKey(a) === identityKey(b);
}

export function describeTrack(track: TrackIdentity): string {
    if (track.artist && track.title) return `${track.artist} - ${track.title}`;
    return track.title ?? track.filePath;
}
