import { describe, it, expect } from 'vitest';
import { computeViewport, pageSize, paneRows } from './viewport';

describe('computeViewport', () => {
    it('should center the focused line', () => {
        expect(computeViewport(100, 50, 11)).toEqual({ start: 45, end: 56 });
        expect(computeViewport(100, 50, 10)).toEqual({ start: 45, end: 55 });
    });

    it('should stick to the top near the start', () => {
        expect(computeViewport(100, 2, 10)).toEqual({ start: 0, end: 10 });
    });

    it('should stick to the bottom near the end', () => {
        expect(computeViewport(100, 98, 10)).toEqual({ start: 90, end: 100 });
    });

    it('should show everything when the document fits', () => {
        expect(computeViewport(4, 3, 10)).toEqual({ start: 0, end: 4 });
    });

    it('should handle an empty document', () => {
        expect(computeViewport(0, 0, 10)).toEqual({ start: 0, end: 0 });
    });

    it('should keep the offset visible for every position', () => {
        for (let offset = 0; offset < 30; offset++) {
            const { start, end } = computeViewport(30, offset, 7);
            expect(end - start).toBe(7);
            expect(offset).toBeGreaterThanOrEqual(start);
            expect(offset).toBeLessThan(end);
        }
    });
});

describe('pageSize', () => {
    it('should keep one line of context', () => {
        expect(pageSize(20)).toBe(19);
        expect(pageSize(1)).toBe(1);
    });
});

describe('paneRows', () => {
    const lines = Array.from({ length: 60 }, (_, i) => `line ${i}`);

    it('should mark the playing line in auto mode', () => {
        const rows = paneRows(lines, 30, 'auto', 5);
        expect(rows.map(r => r.index)).toEqual([28, 29, 30, 31, 32]);
        expect(rows.map(r => r.emphasis)).toEqual(['none', 'none', 'current', 'none', 'none']);
        expect(rows[2].text).toBe('line 30');
    });

    it('should mark the scrolled-to line in manual mode', () => {
        expect(paneRows(lines, 0, 'manual', 5).map(r => r.emphasis)).toEqual(['cursor', 'none', 'none', 'none', 'none']);
    });

    it('should change what is drawn on every manual step', () => {
        let previous = JSON.stringify(paneRows(lines, 0, 'manual', 39));
        for (let offset = 1; offset < lines.length; offset++) {
            const drawn = JSON.stringify(paneRows(lines, offset, 'manual', 39));
            expect(drawn).not.toBe(previous);
            previous = drawn;
        }
    });

    it('should draw nothing for an empty document', () => {
        expect(paneRows([], 0, 'auto', 10)).toEqual([]);
    });
});
