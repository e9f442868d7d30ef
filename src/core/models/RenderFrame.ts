import type { TrackIdentity } from "../interfaces/TrackIdentity";
import type { LyricsSource } from "./LyricsDocument";
import type { ScrollMode } from "./ScrollState";

export type SessionStatus =
    | 'starting'
    | 'player-unavailable'
    | 'idle'
    | 'resolving'
    | 'ready'
    | 'no-lyrics';

/**
 * Everything the renderer needs to draw one frame.
 */
export interface RenderFrame {
    lines: string[];
    offset: number;
    mode: ScrollMode;
    status: SessionStatus;
    source: LyricsSource;
    track: TrackIdentity | null;
}

/**
 * The drawing side of the session. Scroll input flows back through `onScroll`.
 */
export interface LyricsRenderer {
    render(frame: RenderFrame): void;

    /**
     * Registers the handler for discrete scroll deltas.
     * @returns an unsubscribe function.
     */
    onScroll(handler: (delta: number) => void): () => void;
}
