import { XMLParser } from 'fast-xml-parser';
import {
    NO_AUTHORS,
    NO_DOI,
    NO_JOURNAL,
    NO_TITLE,
    NO_YEAR,
    PUBMED,
    type EnrichmentEntry,
    type EnrichmentSource,
    type PaperRecord,
    type SourceAdapter,
    type SourceAdapterOptions,
    type SourceResult,
} from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { extractYear, failureNotice, stripDoiPrefix } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';
const TOOL_NAME = 'litalert';

/**
 * E-utilities JSON response types (subset of relevant fields).
 */
interface ESearchResponse {
    esearchresult?: {
        count?: string;
        idlist?: string[];
        ERROR?: string;
    };
}

export interface ESummaryDoc {
    uid?: string;
    title?: string;
    authors?: Array<{ name?: string; authtype?: string }>;
    fulljournalname?: string;
    source?: string;
    pubdate?: string;
    epubdate?: string;
    articleids?: Array<{ idtype?: string; value?: string }>;
}

interface ESummaryResponse {
    result?: {
        uids?: string[];
        [pmid: string]: ESummaryDoc | string[] | undefined;
    };
}

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    // Document order keeps inline markup (<i>, <sup>) in place within abstract text
    preserveOrder: true,
    trimValues: false,
    processEntities: true,
    htmlEntities: true,
});

/**
 * PubMed source adapter (NCBI E-utilities).
 * Search goes through ESearch + ESummary; abstracts and publication types are
 * fetched separately through EFetch, only for records that survive ranking.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25501/
 */
export class PubMedAdapter implements SourceAdapter, EnrichmentSource {
    readonly name = PUBMED;
    private httpClient: HttpClient;
    private apiKey?: string;
    private email?: string;
    private yearFrom?: number;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['NCBI_API_KEY'];
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
        logger.info({ query, retmax: limit }, 'PubMed search');

        // ─── ESearch: PMIDs ───────────────────────────────────
        let ids: string[];
        try {
            const response = await this.httpClient.get<ESearchResponse>(`${EUTILS_BASE}/esearch.fcgi`, {
                source: 'pubmed',
                params: {
                    ...this.commonParams(),
                    db: 'pubmed',
                    term: `${query}[Title/Abstract]`,
                    retmode: 'json',
                    retmax: limit,
                    sort: 'relevance',
                    datetype: this.yearFrom !== undefined ? 'pdat' : undefined,
                    mindate: this.yearFrom !== undefined ? `${this.yearFrom}/01/01` : undefined,
                    // E-utilities only honours mindate together with maxdate
                    maxdate: this.yearFrom !== undefined ? '3000' : undefined,
                },
            });
            ids = response.data?.esearchresult?.idlist ?? [];
        } catch (error) {
            logger.error({ query, error }, 'PubMed ESearch failed');
            return { records: [], notice: failureNotice(PUBMED, 'PubMed ESearch', error) };
        }

        logger.info({ query, pmids: ids.length }, 'PubMed ESearch done');

        if (ids.length === 0) {
            return { records: [], notice: { provider: PUBMED, kind: 'empty', message: 'PubMed: No PMIDs found.' } };
        }

        // ─── ESummary: metadata ───────────────────────────────
        let result: NonNullable<ESummaryResponse['result']>;
        try {
            const response = await this.httpClient.get<ESummaryResponse>(`${EUTILS_BASE}/esummary.fcgi`, {
                source: 'pubmed',
                params: {
                    ...this.commonParams(),
                    db: 'pubmed',
                    id: ids.join(','),
                    retmode: 'json',
                },
            });
            result = response.data?.result ?? {};
        } catch (error) {
            logger.error({ query, error }, 'PubMed ESummary failed');
            return { records: [], notice: failureNotice(PUBMED, 'PubMed ESummary', error) };
        }

        const uids = result.uids ?? [];
        if (uids.length === 0) {
            logger.warn({ query }, 'PubMed returned no summaries');
            return { records: [], notice: { provider: PUBMED, kind: 'empty', message: 'PubMed: No summaries returned.' } };
        }

        const records: PaperRecord[] = [];
        try {
            for (const pmid of uids) {
                const doc = result[pmid];
                if (!doc || Array.isArray(doc)) continue;
                records.push(normalizeSummary(pmid, doc, query));
            }
        } catch (error) {
            logger.error({ query, error }, 'PubMed summaries could not be normalized');
            return { records: [], notice: failureNotice(PUBMED, 'PubMed ESummary', error, 'parse') };
        }

        logger.info({ query, records: records.length }, 'PubMed records normalized');
        return { records, notice: null };
    }

    /**
     * EFetch abstracts and publication types for the given PMIDs.
     * Rejects on transport or parse failure.
     */
    async fetchEnrichment(ids: string[]): Promise<Map<string, EnrichmentEntry>> {
        if (ids.length === 0) return new Map();

        getLogger().info({ pmids: ids.length }, 'Fetching PubMed abstracts and publication types');

        const response = await this.httpClient.requestText(`${EUTILS_BASE}/efetch.fcgi`, {
            source: 'pubmed',
            params: {
                ...this.commonParams(),
                db: 'pubmed',
                id: ids.join(','),
                retmode: 'xml',
            },
        });

        const entries = parseEFetchXml(response.data);
        getLogger().info({ fetched: entries.size }, 'EFetch done');
        return entries;
    }

    // ─── Private helpers ──────────────────────────────────────

    private commonParams(): Record<string, string | undefined> {
        return {
            tool: TOOL_NAME,
            email: this.email,
            api_key: this.apiKey,
        };
    }
}

/**
 * Normalize one ESummary document into a PaperRecord.
 */
export function normalizeSummary(pmid: string, doc: ESummaryDoc, query: string): PaperRecord {
    const authors = (doc.authors ?? [])
        .map((a) => a.name)
        .filter((name): name is string => !!name);

    const doiValue = (doc.articleids ?? []).find((aid) => aid.idtype === 'doi' && aid.value)?.value;
    const doi = stripDoiPrefix(doiValue);

    return {
        title: doc.title || NO_TITLE,
        doi: doi ?? NO_DOI,
        url: doi ? `https://doi.org/${doi}` : `https://pubmed.ncbi.nlm.nih.gov/${pmid}/`,
        authors: authors.length > 0 ? authors.join(', ') : NO_AUTHORS,
        year: extractYear(doc.pubdate || doc.epubdate) ?? NO_YEAR,
        journal: doc.fulljournalname || doc.source || NO_JOURNAL,
        query,
        source: PUBMED,
        provider_id: pmid,
        abstract: null,
        abstract_translated: null,
        classification_tags: null,
    };
}

/**
 * Parse an EFetch PubmedArticleSet into enrichment entries keyed by PMID.
 *
 * Abstract sections are joined with newlines; a missing abstract stays null
 * so it never displaces text another provider supplied.
 */
export function parseEFetchXml(xml: string): Map<string, EnrichmentEntry> {
    const parsed: unknown = xmlParser.parse(xml);
    const entries = new Map<string, EnrichmentEntry>();

    for (const articleData of elements(first(parsed, 'PubmedArticleSet'), 'PubmedArticle')) {
        const citation = first(articleData, 'MedlineCitation');
        const pmid = flattenText(first(citation, 'PMID'));
        if (!pmid) continue;

        const article = first(citation, 'Article');

        const sections = elements(first(article, 'Abstract'), 'AbstractText')
            .map(flattenText)
            .filter((text) => text.length > 0);

        const types = elements(first(article, 'PublicationTypeList'), 'PublicationType')
            .map(flattenText)
            .filter((pt) => pt.length > 0);

        entries.set(pmid, {
            abstract: sections.length > 0 ? sections.join('\n') : null,
            classification_tags: types,
        });
    }

    return entries;
}

// ─── Ordered XML helpers ──────────────────────────────────
// Each parsed node is { [tag]: children[], ':@'?: attributes } or { '#text': string }.

function child(node: unknown, key: string): unknown {
    if (typeof node !== 'object' || node === null || Array.isArray(node)) return undefined;
    return Object.getOwnPropertyDescriptor(node, key)?.value;
}

function asArray(node: unknown): unknown[] {
    if (node === undefined || node === null) return [];
    return Array.isArray(node) ? node : [node];
}

/**
 * Children of every element named `tag` in a node list.
 */
function elements(nodes: unknown, tag: string): unknown[][] {
    return asArray(nodes).flatMap((node) => {
        const children = child(node, tag);
        return Array.isArray(children) ? [children] : [];
    });
}

function first(nodes: unknown, tag: string): unknown[] {
    return elements(nodes, tag)[0] ?? [];
}

/**
 * Text content of a node list in document order, inline elements included,
 * with whitespace collapsed.
 */
function flattenText(nodes: unknown): string {
    return collectText(nodes).replace(/\s+/g, ' ').trim();
}

function collectText(nodes: unknown): string {
    return asArray(nodes)
        .map((node) => {
            const text = child(node, '#text');
            if (typeof text === 'string' || typeof text === 'number') return String(text);
            if (typeof node !== 'object' || node === null) return '';
            return Object.keys(node)
                .filter((key) => key !== ':@')
                .map((key) => collectText(child(node, key)))
                .join('');
        })
        .join('');
}
