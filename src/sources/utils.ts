/**
 * Shared text utilities for source adapters.
 */

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
};

/**
 * Decode XML character references and the predefined entities.
 * "Caf&#xe9; &amp; Bar" → "Café & Bar"
 */
export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, ref: string) => {
        if (ref[0] === '#') {
            const code = ref[1] === 'x' || ref[1] === 'X'
                ? parseInt(ref.slice(2), 16)
                : parseInt(ref.slice(1), 10);
            return Number.isFinite(code) && code <= 0x10ffff ? String.fromCodePoint(code) : entity;
        }
        return NAMED_ENTITIES[ref.toLowerCase()] ?? entity;
    });
}

/**
 * Drop inline markup (<i>, <sup>, <sub>, ...) from raw element content.
 */
export function stripMarkup(raw: string): string {
    return raw.replace(/<[^>]*>/g, '');
}

/**
 * Collapse runs of whitespace and trim.
 */
export function normalizeWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

const CDATA_SECTION = /<!\[CDATA\[([\s\S]*?)\]\]>/;

/**
 * Raw inner XML of an element → plain display text.
 * "The <i>TP53</i> &amp; MDM2 axis" → "The TP53 & MDM2 axis"
 *
 * CDATA sections are kept verbatim: no tag stripping, no entity decoding.
 */
export function innerText(raw: string): string {
    // split() with a capture group alternates markup (even) and CDATA text (odd)
    const text = raw
        .split(CDATA_SECTION)
        .map((part, i) => (i % 2 === 1 ? part : decodeEntities(stripMarkup(part))))
        .join('');
    return normalizeWhitespace(text);
}
