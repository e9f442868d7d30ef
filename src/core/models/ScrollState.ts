import type { TrackIdentity } from "../interfaces/TrackIdentity";

export type ScrollMode = 'auto' | 'manual';

export interface ScrollState {
    mode: ScrollMode;

    /** Index of the focused line; always within [0, lineCount - 1], or 0 when empty. */
    offset: number;

    lastTrack: TrackIdentity | null;
}
