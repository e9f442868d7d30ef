// A line that is nothing but one bracketed label, e.g. "[Chorus]" or "[Verse 2: Artist]"
const SECTION_HEADER = /^\s*\[[^\]]*\]\s*$/;

export function isSectionHeader(line: string): boolean {
    return SECTION_HEADER.test(line);
}

/**
 * Removes section header lines and nothing else; surrounding blank lines stay.
 */
export function clearSectionHeaders(lines: string[]): string[] {
    return lines.filter(line => !isSectionHeader(line));
}
