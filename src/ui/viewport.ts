import type { ScrollMode } from "@/core/models/ScrollState";

export interface Viewport {
    /** First visible line, inclusive. */
    start: number;
    /** Last visible line, exclusive. */
    end: number;
}

/**
 * Window of `height` lines that keeps `offset` as close to the middle as the document allows.
 */
export function computeViewport(lineCount: number, offset: number, height: number): Viewport {
    const rows = Math.max(0, Math.floor(height));
    const maxStart = Math.max(0, lineCount - rows);
    const start = Math.min(maxStart, Math.max(0, offset - Math.floor(rows / 2)));
    return { start, end: Math.min(lineCount, start + rows) };
}

/**
 * Distance moved by PageUp / PageDown: one screen, keeping a line of context.
 */
export function pageSize(height: number): number {
    return Math.max(1, height - 1);
}

/**
 * 'current' marks the line playback is at, 'cursor' the line a manual scroll landed on.
 */
export type LineEmphasis = 'current' | 'cursor' | 'none';

export interface PaneRow {
    index: number;
    text: string;
    emphasis: LineEmphasis;
}

export function paneRows(lines: string[], offset: number, mode: ScrollMode, height: number): PaneRow[] {
    const { start, end } = computeViewport(lines.length, offset, height);
    const focus: LineEmphasis = mode === 'auto' ? 'current' : 'cursor';
    return lines.slice(start, end).map((text, i) => ({
        index: start + i,
        text,
        emphasis: start + i === offset ? focus : 'none'
    }));
}
