import type { PlaybackSample } from "../interfaces/PlaybackPoller";
import type { TrackIdentity } from "../interfaces/TrackIdentity";
import { type LyricsDocument, isTimed } from "../models/LyricsDocument";
import type { ScrollMode, ScrollState } from "../models/ScrollState";

interface TimedLine {
    time: number;
    index: number;
}

/**
 * Maps playback progress, or the user's scrolling, to a line offset.
 *
 * Auto mode follows playback: by line timestamps when the lyrics carry them,
 * proportionally to position / duration otherwise. Any manual scroll switches
 * to manual mode until the next track change.
 */
export class ScrollSynchronizer {
    private mode: ScrollMode;
    private offset = 0;
    private lastTrack: TrackIdentity | null = null;
    private lineCount = 0;
    private timedLines: TimedLine[] = [];

    constructor(private readonly autoScroll: boolean) {
        this.mode = autoScroll ? 'auto' : 'manual';
    }

    public getState(): ScrollState {
        return { mode: this.mode, offset: this.offset, lastTrack: this.lastTrack };
    }

    public trackChanged(identity: TrackIdentity, document: LyricsDocument) {
        this.lastTrack = identity;
        this.lineCount = document.lines.length;
        this.timedLines = isTimed(document) ? indexTimestamps(document.timestamps) : [];
        this.offset = 0;
        this.mode = this.autoScroll ? 'auto' : 'manual';
    }

    /**
     * Recomputes the offset from a playback sample. No effect in manual mode.
     */
    public tick(sample: PlaybackSample) {
        if (this.mode !== 'auto') return;
        if (this.lineCount === 0) {
            this.offset = 0;
            return;
        }

        if (this.timedLines.length > 0) {
            const found = findLineIndex(this.timedLines, sample.positionSeconds);
            this.offset = found === -1 ? 0 : this.timedLines[found].index;
            return;
        }

        // Untimed text: assume lines are spread evenly over the track
        const ratio = clamp(sample.positionSeconds / sample.durationSeconds, 0, 1);
        this.offset = Math.floor(ratio * (this.lineCount - 1));
    }

    public manualScroll(delta: number) {
        this.mode = 'manual';
        this.offset = clamp(this.offset + Math.trunc(delta), 0, Math.max(0, this.lineCount - 1));
    }
}

function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

function indexTimestamps(timestamps: (number | null)[]): TimedLine[] {
    const timed: TimedLine[] = [];
    timestamps.forEach((time, index) => {
        if (time !== null) timed.push({ time, index });
    });
    // Stable sort keeps file order for equal times
    return timed.sort((a, b) => a.time - b.time);
}

/**
 * Binary search for the last line starting at or before `positionSeconds`.
 * @returns the position in `lines`, or -1 before the first line.
 */
export function findLineIndex(lines: TimedLine[], positionSeconds: number): number {
    let low = 0;
    let high = lines.length - 1;
    let result = -1;

    while (low <= high) {
        const mid = Math.floor((low + high) / 2);
        if (lines[mid].time <= positionSeconds) {
            result = mid; // Candidate found
            low = mid + 1; // Try to find a later one that is still <= position
        } else {
            high = mid - 1;
        }
    }

    return result;
}
