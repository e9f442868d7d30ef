const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
    rsquo: '’',
    lsquo: '‘',
    rdquo: '”',
    ldquo: '“',
    hellip: '…',
    mdash: '—',
    ndash: '–'
};

export function decodeEntities(text: string): string {
    return text.replace(/&(#[xX][0-9a-fA-F]+|#\d+|[a-zA-Z]+);/g, (match, body: string) => {
        if (body.startsWith('#')) {
            const hex = body[1] === 'x' || body[1] === 'X';
            const code = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
            // Out of Unicode range: keep the entity as written
            return code <= 0x10ffff ? String.fromCodePoint(code) : match;
        }
        return NAMED_ENTITIES[body.toLowerCase()] ?? match;
    });
}

/**
 * Converts a lyrics markup fragment to text: `<br>` becomes a newline,
 * every other tag and comment is dropped, entities are decoded.
 */
export function htmlToText(fragment: string): string {
    const withBreaks = fragment
        .replace(/<!--[\s\S]*?-->/g, '')
        .replace(/\r?\n/g, '')
        .replace(/<br\s*\/?>/gi, '\n');
    return decodeEntities(withBreaks.replace(/<[^>]+>/g, ''));
}

/**
 * Returns the inner markup of every `<tag ...attribute="value"...>` element,
 * following nested elements of the same tag to the matching close.
 */
export function extractElements(html: string, tag: string, attribute: string, value: string): string[] {
    const opening = new RegExp(`<${tag}\\b[^>]*\\b${attribute}="${value}"[^>]*>`, 'gi');
    const nested = new RegExp(`<${tag}\\b[^>]*>|</${tag}\\s*>`, 'gi');
    const blocks: string[] = [];

    let match: RegExpExecArray | null;
    while ((match = opening.exec(html)) !== null) {
        const start = match.index + match[0].length;
        nested.lastIndex = start;
        let depth = 1;
        let end = -1;
        let inner: RegExpExecArray | null;
        while ((inner = nested.exec(html)) !== null) {
            depth += inner[0].startsWith('</') ? -1 : 1;
            if (depth === 0) {
                end = inner.index;
                break;
            }
        }
        if (end === -1) break; // unterminated element
        blocks.push(html.slice(start, end));
        opening.lastIndex = nested.lastIndex;
    }

    return blocks;
}
