import type { PaperSource } from '../types/index.js';

export interface IdentifierClass {
    source: PaperSource;
    /** Routed to arXiv by the loose dot rule without looking like an arXiv id */
    ambiguous: boolean;
}

const OPENALEX_WORK_ID = /^W\d+$/;

/** 2407.06405, 2407.06405v1 */
const ARXIV_MODERN_ID = /^\d{4}\.\d{4,5}(v\d+)?$/;

/** hep-th/9901001, cs.AI/0001001v2 */
const ARXIV_LEGACY_ID = /^[a-z-]+(\.[A-Za-z]{2})?\/\d{7}(v\d+)?$/;

/**
 * Decide which source an identifier belongs to.
 *
 * `W` + digits is an OpenAlex work. An id containing a dot that also
 * contains a `v` or has four characters before its first dot goes to
 * arXiv. Everything else is treated as an OSF preprint id.
 */
export function classifyIdentifier(id: string): IdentifierClass {
    if (OPENALEX_WORK_ID.test(id)) {
        return { source: 'openalex', ambiguous: false };
    }

    const beforeFirstDot = id.split('.')[0] ?? '';
    if (id.includes('.') && (id.includes('v') || beforeFirstDot.length === 4)) {
        const strict = ARXIV_MODERN_ID.test(id) || ARXIV_LEGACY_ID.test(id);
        return { source: 'arxiv', ambiguous: !strict };
    }

    return { source: 'osf', ambiguous: false };
}
