/**
 * PaperRecord: the common shape every provider's search results are normalized into.
 *
 * Display fields are always populated; missing data is replaced with the
 * sentinels below rather than left null.
 */
export interface PaperRecord {
    /** Paper title, or NO_TITLE */
    title: string;

    /** DOI as reported by the provider (case preserved), or NO_DOI */
    doi: string;

    /** https://doi.org/<doi>, else a provider permalink, else NO_URL */
    url: string;

    /** Comma-joined author display names, or NO_AUTHORS */
    authors: string;

    /** Four-digit year, or NO_YEAR */
    year: string;

    /** Journal / container title, or NO_JOURNAL */
    journal: string;

    /** Search query that produced this record */
    query: string;

    /** Provider name, or several joined with '+' once merged (e.g. "Crossref+PubMed") */
    source: string;

    /** Provider-native identifier used for enrichment lookups (PubMed PMID) */
    provider_id: string | null;

    abstract: string | null;

    /** Machine translation of `abstract` (nullable) */
    abstract_translated: string | null;

    /** Provider-asserted category labels in first-seen order, without duplicates */
    classification_tags: string[] | null;
}

export const NO_TITLE = '(no title)';
export const NO_DOI = '(no DOI)';
export const NO_URL = '(no URL)';
export const NO_AUTHORS = '(no authors)';
export const NO_AUTHOR_NAME = '(no name)';
export const NO_YEAR = '(n.d.)';
export const NO_JOURNAL = '(no journal)';
export const UNKNOWN_ARTICLE_TYPE = '(unknown)';

/** Provider names as they appear in `PaperRecord.source` */
export const CROSSREF = 'Crossref';
export const PUBMED = 'PubMed';

export type ProviderName = typeof CROSSREF | typeof PUBMED;

/**
 * Supplementary data fetched for a record after ranking.
 */
export interface EnrichmentEntry {
    abstract: string | null;
    classification_tags: string[];
}
