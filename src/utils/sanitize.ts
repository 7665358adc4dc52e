/**
 * Query-string sanitizing for upstream search APIs.
 */

/** Characters that break URL encoding on one upstream or another */
const STRIPPED_CHARS = /[<>{}|\\^`[\]]/g;

/** Removed after the colon/semicolon rewrites */
const DROPPED_PUNCTUATION = /[?!#%]/g;

/**
 * Clean free-form text before embedding it in an upstream query.
 *
 * Steps run in a fixed order: quote normalization, non-breaking spaces and
 * control whitespace to spaces, whitespace collapse, truncation to
 * `maxLength` (ending in "..."), character stripping, `:` → ` -`
 * (OSF rejects colons), `;` → `,`, dropping `?!#%`, then a final collapse.
 *
 * Truncation runs before stripping, so the `maxLength - 3` kept characters
 * are chosen from the unstripped text.
 *
 * @param maxLength - Maximum length in characters, counted before stripping
 */
export function sanitizeQuery(text: string, maxLength = 200): string {
    if (!text) {
        return text;
    }

    let cleaned = text
        .replace(/[\u201c\u201d\u201e\u201f]/g, '"')
        .replace(/[\u2018\u2019\u201a\u201b]/g, "'")
        .replace(/&nbsp;/g, ' ')
        .replace(/[\u00a0\u2007\u202f]/g, ' ')
        .replace(/[\n\r\t]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();

    const chars = Array.from(cleaned);
    if (chars.length > maxLength) {
        cleaned = chars.slice(0, Math.max(0, maxLength - 3)).join('') + '...';
    }

    cleaned = cleaned
        .replace(STRIPPED_CHARS, '')
        .replace(/:/g, ' -')
        .replace(/;/g, ',')
        .replace(DROPPED_PUNCTUATION, '');

    return cleaned.replace(/\s+/g, ' ').trim();
}
