/**
 * Paper records: the common shape every source adapter normalizes into.
 * Fields a source does not know are left as '' or [].
 */
export interface PaperRecord {
    /** Source-specific identifier (unique only within its source) */
    id: string;

    /** Source adapter that produced this record */
    source: PaperSource;

    title: string;

    /** Abstract / summary / description text */
    abstract: string;

    /** Author display names, in publication order */
    authors: string[];

    /** Categories, subjects or concepts, depending on the source */
    subjects: string[];

    /** Publication date as reported by the source */
    published: string;

    /** Last update / modification date */
    updated: string;

    /** Digital Object Identifier (without resolver prefix where known) */
    doi: string;

    /** Direct PDF link, when the source exposes one in its listings */
    pdf_url: string;

    /** Landing-page / abstract URL */
    abstract_url: string;

    /** Resolved download link, set by single-paper lookups */
    download_url?: string;
}

export type PaperSource = 'arxiv' | 'osf' | 'openalex';

/**
 * arXiv entry parsed from the Atom feed.
 */
export interface ArxivPaper extends PaperRecord {
    source: 'arxiv';
}

/**
 * OSF preprint, from either the JSON:API listing or the trove search.
 */
export interface OsfPreprint extends PaperRecord {
    source: 'osf';
    date_created: string;
    tags: string[];
    is_published: boolean;
    is_preprint_orphan: boolean;
    license_record: Record<string, unknown> | null;
    /** Publisher / provider reference (trove publisher URL or provider id) */
    provider: string;
}

/**
 * OpenAlex work with its bibliometric extras.
 */
export interface OpenAlexPaper extends PaperRecord {
    source: 'openalex';
    publication_year: number | null;
    cited_by_count: number;
    primary_source: string;
    open_access_status: string;
    is_open_access: boolean;
    type: string;
    relevance_score: number;
}

/**
 * OpenAlex abstract storage: word → positions at which it occurs.
 */
export type InvertedIndex = Record<string, number[]>;
