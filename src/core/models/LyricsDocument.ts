/**
 * Where the lines of a document came from.
 * 'api' and 'scrape' are the two remote providers, only one of which is active per run.
 */
export type LyricsSource = 'tag' | 'api' | 'scrape' | 'none';

/**
 * Resolved lyrics for one track. Immutable once created.
 */
export interface LyricsDocument {
    lines: string[];

    source: LyricsSource;

    /** True when bracketed section headers were removed from remote text. */
    headerCleared: boolean;

    /**
     * Start time in seconds of each line, parallel to `lines`.
     * Only present for tag lyrics that carry LRC line timestamps;
     * untimed lines in such a document hold null.
     */
    timestamps?: (number | null)[];
}

export function emptyDocument(): LyricsDocument {
    return { lines: [], source: 'none', headerCleared: false };
}

export function isTimed(doc: LyricsDocument): doc is LyricsDocument & { timestamps: (number | null)[] } {
    return doc.timestamps !== undefined;
}
