import {
    CROSSREF,
    NO_AUTHOR_NAME,
    NO_AUTHORS,
    NO_DOI,
    NO_JOURNAL,
    NO_TITLE,
    NO_URL,
    NO_YEAR,
    type PaperRecord,
    type SourceAdapter,
    type SourceAdapterOptions,
    type SourceResult,
} from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { failureNotice, stripDoiPrefix, stripMarkup } from './utils.js';

const CROSSREF_BASE = 'https://api.crossref.org';

/** Date fields tried in order when picking a publication year */
const YEAR_FIELDS = ['published-print', 'published-online', 'issued'] as const;

interface CrossrefDate {
    'date-parts'?: Array<Array<number | null>>;
}

/**
 * Crossref API response types (subset of relevant fields).
 */
export interface CrossrefItem {
    DOI?: string;
    URL?: string;
    title?: string[];
    'container-title'?: string[];
    author?: Array<{ given?: string; family?: string; name?: string }>;
    type?: string;
    abstract?: string;
    'published-print'?: CrossrefDate;
    'published-online'?: CrossrefDate;
    issued?: CrossrefDate;
}

interface CrossrefWorksResponse {
    status?: string;
    message?: {
        'total-results'?: number;
        items?: CrossrefItem[];
    };
}

/**
 * Crossref source adapter.
 * Registry-wide DOI metadata; the only source of JATS abstracts for non-biomedical journals.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefAdapter implements SourceAdapter {
    readonly name = CROSSREF;
    private httpClient: HttpClient;
    private email?: string;
    private yearFrom?: number;

    constructor(options?: SourceAdapterOptions) {
        this.email = options?.email;
        this.yearFrom = options?.yearFrom;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(query: string, limit: number): Promise<SourceResult> {
        const logger = getLogger();
        logger.info({ query, rows: limit }, 'Crossref search');

        const filters = ['type:journal-article'];
        if (this.yearFrom !== undefined) {
            filters.push(`from-pub-date:${this.yearFrom}-01-01`);
        }

        let items: CrossrefItem[];
        try {
            const response = await this.httpClient.get<CrossrefWorksResponse>(`${CROSSREF_BASE}/works`, {
                source: 'crossref',
                params: {
                    query,
                    rows: limit,
                    sort: 'published',
                    order: 'desc',
                    filter: filters.join(','),
                    mailto: this.email,
                },
            });
            items = response.data?.message?.items ?? [];
        } catch (error) {
            logger.error({ query, error }, 'Crossref request failed');
            return { records: [], notice: failureNotice(CROSSREF, 'Crossref request', error) };
        }

        logger.info({ query, items: items.length }, 'Crossref items received');

        if (items.length === 0) {
            return {
                records: [],
                notice: { provider: CROSSREF, kind: 'empty', message: 'Crossref: No items found.' },
            };
        }

        try {
            return { records: items.map((item) => normalizeCrossrefItem(item, query)), notice: null };
        } catch (error) {
            logger.error({ query, error }, 'Crossref items could not be normalized');
            return { records: [], notice: failureNotice(CROSSREF, 'Crossref response', error, 'parse') };
        }
    }
}

/**
 * Normalize one Crossref work into a PaperRecord.
 */
export function normalizeCrossrefItem(item: CrossrefItem, query: string): PaperRecord {
    const doi = stripDoiPrefix(item.DOI);

    const authors = (item.author ?? []).map((a) => {
        const name = `${a.given ?? ''} ${a.family ?? ''}`.trim() || a.name?.trim();
        return name || NO_AUTHOR_NAME;
    });

    return {
        title: item.title?.[0] || NO_TITLE,
        doi: doi ?? NO_DOI,
        url: doi ? `https://doi.org/${doi}` : item.URL || NO_URL,
        authors: authors.length > 0 ? authors.join(', ') : NO_AUTHORS,
        year: pickYear(item),
        journal: item['container-title']?.[0] || NO_JOURNAL,
        query,
        source: CROSSREF,
        provider_id: null,
        abstract: stripMarkup(item.abstract),
        abstract_translated: null,
        classification_tags: item.type ? [item.type] : null,
    };
}

function pickYear(item: CrossrefItem): string {
    for (const field of YEAR_FIELDS) {
        const year = item[field]?.['date-parts']?.[0]?.[0];
        if (typeof year === 'number') return String(year);
    }
    return NO_YEAR;
}
