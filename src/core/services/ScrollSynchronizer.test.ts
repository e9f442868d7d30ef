import { describe, it, expect } from 'vitest';
import { ScrollSynchronizer, findLineIndex } from './ScrollSynchronizer';
import type { LyricsDocument } from '../models/LyricsDocument';
import type { PlaybackSample } from '../interfaces/PlaybackPoller';

const track = { artist: 'Band', title: 'Song', filePath: '/m/song.flac' };
const nextTrack = { artist: 'Band', title: 'Other', filePath: '/m/other.flac' };

function untimed(count: number): LyricsDocument {
    return { lines: Array.from({ length: count }, (_, i) => `Line ${i}`), source: 'api', headerCleared: false };
}

function sample(positionSeconds: number, durationSeconds = 200): PlaybackSample {
    return { track, positionSeconds, durationSeconds, transport: 'playing' };
}

describe('ScrollSynchronizer', () => {
    it('should start in auto mode only when auto-scroll is enabled', () => {
        expect(new ScrollSynchronizer(true).getState()).toEqual({ mode: 'auto', offset: 0, lastTrack: null });
        expect(new ScrollSynchronizer(false).getState().mode).toBe('manual');
    });

    it('should scroll proportionally to playback', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, untimed(101));

        sync.tick(sample(100));
        expect(sync.getState().offset).toBe(50);

        sync.tick(sample(0));
        expect(sync.getState().offset).toBe(0);

        sync.tick(sample(199));
        // floor(0.995 * 100)
        expect(sync.getState().offset).toBe(99);
    });

    it('should clamp positions past the end of the track', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, untimed(10));

        sync.tick(sample(250));
        expect(sync.getState().offset).toBe(9);
    });

    it('should stay at zero for empty lyrics', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, untimed(0));

        sync.tick(sample(120));
        sync.manualScroll(5);
        expect(sync.getState().offset).toBe(0);
    });

    it('should never recompute without auto-scroll', () => {
        const sync = new ScrollSynchronizer(false);
        sync.trackChanged(track, untimed(101));

        sync.tick(sample(100));
        expect(sync.getState()).toEqual({ mode: 'manual', offset: 0, lastTrack: track });

        sync.manualScroll(3);
        sync.trackChanged(nextTrack, untimed(5));
        expect(sync.getState()).toEqual({ mode: 'manual', offset: 0, lastTrack: nextTrack });
    });

    it('should keep a manual override until the track changes', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, untimed(101));
        sync.tick(sample(20));
        expect(sync.getState().offset).toBe(10);

        sync.manualScroll(-3);
        sync.tick(sample(100));
        sync.tick(sample(150));
        sync.tick(sample(190));
        expect(sync.getState()).toEqual({ mode: 'manual', offset: 7, lastTrack: track });

        sync.trackChanged(nextTrack, untimed(101));
        expect(sync.getState()).toEqual({ mode: 'auto', offset: 0, lastTrack: nextTrack });
    });

    it('should clamp manual scrolling to the document', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, untimed(4));

        sync.manualScroll(-2);
        expect(sync.getState().offset).toBe(0);
        sync.manualScroll(10);
        expect(sync.getState().offset).toBe(3);
    });

    it('should follow line timestamps when the lyrics carry them', () => {
        const sync = new ScrollSynchronizer(true);
        sync.trackChanged(track, {
            lines: ['Intro', 'One', 'Break', 'Two'],
            source: 'tag',
            headerCleared: false,
            timestamps: [null, 10, null, 30]
        });

        sync.tick(sample(5));
        expect(sync.getState().offset).toBe(0);
        sync.tick(sample(10));
        expect(sync.getState().offset).toBe(1);
        sync.tick(sample(29.9));
        expect(sync.getState().offset).toBe(1);
        sync.tick(sample(45));
        expect(sync.getState().offset).toBe(3);
    });

    it('should keep the offset inside the document for any sequence of events', () => {
        // Deterministic pseudo-random walk over ticks, scrolls and track changes
        let seed = 7;
        const next = () => {
            seed = (seed * 1103515245 + 12345) % 2147483648;
            return seed / 2147483648;
        };

        const sync = new ScrollSynchronizer(true);
        let count = 0;
        for (let step = 0; step < 2000; step++) {
            const roll = next();
            if (roll < 0.05) {
                count = Math.floor(next() * 40);
                sync.trackChanged(step % 2 ? track : nextTrack, untimed(count));
            } else if (roll < 0.5) {
                sync.manualScroll(Math.floor(next() * 21) - 10);
            } else {
                sync.tick(sample(next() * 300 - 20, 1 + next() * 250));
            }
            const { offset } = sync.getState();
            expect(Number.isInteger(offset)).toBe(true);
            expect(offset).toBeGreaterThanOrEqual(0);
            expect(offset).toBeLessThanOrEqual(Math.max(0, count - 1));
        }
    });
});

describe('findLineIndex', () => {
    const lines = [
        { time: 1, index: 0 },
        { time: 2, index: 1 },
        { time: 3, index: 2 }
    ];

    it('should find the last line started', () => {
        expect(findLineIndex(lines, 0)).toBe(-1);
        expect(findLineIndex(lines, 1)).toBe(0);
        expect(findLineIndex(lines, 2.999)).toBe(1);
        expect(findLineIndex(lines, 5)).toBe(2);
    });
});
