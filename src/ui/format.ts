import { describeTrack } from "@/core/interfaces/TrackIdentity";
import type { LyricsSource } from "@/core/models/LyricsDocument";
import type { RenderFrame, SessionStatus } from "@/core/models/RenderFrame";

const STATUS_MESSAGES: Record<SessionStatus, string | null> = {
    'starting': 'Connecting to cmus...',
    'player-unavailable': 'cmus not running',
    'idle': 'Nothing playing',
    'resolving': 'Resolving lyrics...',
    'no-lyrics': 'No lyrics found',
    'ready': null
};

const SOURCE_LABELS: Record<LyricsSource, string> = {
    tag: 'tag',
    api: 'Genius',
    scrape: 'AZLyrics',
    none: 'none'
};

/**
 * Text shown instead of lyrics, or null when the lyrics themselves should be drawn.
 */
export function statusMessage(status: SessionStatus): string | null {
    return STATUS_MESSAGES[status];
}

export function statusBar(frame: RenderFrame, warning?: string): string {
    const parts: string[] = [];
    if (frame.track) parts.push(describeTrack(frame.track));
    if (frame.status === 'ready') {
        parts.push(`source: ${SOURCE_LABELS[frame.source]}`);
        parts.push(frame.mode === 'auto' ? 'auto' : 'manual');
    }
    if (warning) parts.push(`! ${warning}`);
    return parts.join(' | ');
}

/**
 * Ink color string for an 8-bit ANSI color; -1 keeps the terminal default.
 */
export function ansiColor(code: number): string | undefined {
    return code < 0 ? undefined : `ansi256(${code})`;
}
