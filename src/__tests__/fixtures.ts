import type { PaperRecord } from '../types/index.js';

/**
 * A complete record with test defaults; override only what a test cares about.
 */
export function makeRecord(overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        title: 'A test paper',
        doi: '10.1000/test',
        url: 'https://doi.org/10.1000/test',
        authors: 'Ada Example',
        year: '2020',
        journal: 'Journal of Tests',
        query: 'test',
        source: 'Crossref',
        provider_id: null,
        abstract: null,
        abstract_translated: null,
        classification_tags: null,
        ...overrides,
    };
}
