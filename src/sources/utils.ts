/**
 * Shared utilities for source adapters.
 */
import type { FilterField, SearchFilter } from '../types/index.js';

/**
 * Reconstruct abstract text from OpenAlex inverted index format.
 *
 * OpenAlex stores abstracts as inverted indexes: { "word": [position1, position2], ... }
 * Words are laid out by position (stable for equal positions) and joined
 * with single spaces. Entries whose positions are not a list are skipped;
 * any other malformed input yields an empty string.
 */
export function reconstructAbstract(invertedIndex: unknown): string {
    if (!invertedIndex || typeof invertedIndex !== 'object' || Array.isArray(invertedIndex)) {
        return '';
    }

    try {
        const words: Array<[number, string]> = [];

        for (const [word, positions] of Object.entries(invertedIndex)) {
            if (!Array.isArray(positions)) continue;
            for (const pos of positions) {
                if (typeof pos !== 'number' || !Number.isInteger(pos)) {
                    throw new TypeError(`Invalid position for "${word}"`);
                }
                words.push([pos, word]);
            }
        }

        // Array.prototype.sort is stable
        words.sort((a, b) => a[0] - b[0]);

        return words.map(([, word]) => word).join(' ');
    } catch {
        return '';
    }
}

/**
 * Strip DOI resolver prefixes to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string {
    if (!doi) return '';
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .trim();
}

/**
 * Last non-empty path segment of a URL or path.
 * "http://arxiv.org/abs/2407.06405v1" → "2407.06405v1"
 */
export function lastPathSegment(value: string): string {
    const segments = value.split('/').filter((segment) => segment.length > 0);
    return segments[segments.length - 1] ?? '';
}

/**
 * Percent-encode a query component, leaving `safe` characters literal.
 * With `spaceAsPlus`, spaces become '+' (form encoding).
 */
export function encodeQueryComponent(
    value: string,
    options: { safe?: string; spaceAsPlus?: boolean } = {}
): string {
    let encoded = encodeURIComponent(value);

    for (const char of options.safe ?? '') {
        encoded = encoded.split(encodeURIComponent(char)).join(char);
    }

    return options.spaceAsPlus ? encoded.replace(/%20/g, '+') : encoded;
}

/**
 * Build a query string from ordered key/value pairs.
 */
export function buildQueryString(
    params: Array<[string, string | number]>,
    options: { safe?: string; spaceAsPlus?: boolean } = {}
): string {
    return params
        .map(([key, value]) => `${encodeQueryComponent(key, options)}=${encodeQueryComponent(String(value), options)}`)
        .join('&');
}

const FILTER_FIELDS: readonly FilterField[] = [
    'query', 'providerId', 'subjects', 'category', 'concepts', 'author', 'title',
    'publisher', 'institution', 'datePublishedGte', 'maxResults', 'page', 'startIndex',
];

/**
 * Filter fields that are set but not understood by an adapter.
 */
export function unsupportedFilters(
    filters: SearchFilter,
    capabilities: ReadonlySet<FilterField>
): FilterField[] {
    const present: FilterField[] = [];
    for (const [key, value] of Object.entries(filters)) {
        if (value === undefined || value === null || value === '') continue;
        const field = FILTER_FIELDS.find((candidate) => candidate === key);
        if (field && !capabilities.has(field)) {
            present.push(field);
        }
    }
    return present;
}
