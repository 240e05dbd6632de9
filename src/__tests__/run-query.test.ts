import { describe, it, expect, vi } from 'vitest';
import { runQuery } from '../pipeline/run-query.js';
import {
    CROSSREF,
    PUBMED,
    type EnrichmentEntry,
    type EnrichmentSource,
    type PaperRecord,
    type ProviderName,
    type ProviderNotice,
    type SourceAdapter,
    type Translator,
} from '../types/index.js';
import { makeRecord } from './fixtures.js';

const QUERY = 'organic electrochemical transistors';

function fakeSource(name: ProviderName, records: PaperRecord[], notice: ProviderNotice | null = null): SourceAdapter {
    return { name, search: vi.fn(async (_query: string, _limit: number) => ({ records, notice })) };
}

function fakeEnrichment(data: Record<string, EnrichmentEntry>): EnrichmentSource {
    return { name: PUBMED, fetchEnrichment: vi.fn(async (_ids: string[]) => new Map(Object.entries(data))) };
}

const crossrefHit = makeRecord({
    doi: '10.1/x',
    title: 'Organic electrochemical transistors for sensing',
    year: '2021',
});
const crossrefMiss = makeRecord({ doi: '10.1/z', title: 'Unrelated', year: '2022' });
const pubmedHit = makeRecord({
    doi: '10.1/X',
    title: 'organic electrochemical transistors',
    year: '2021',
    source: PUBMED,
    provider_id: '111',
});

describe('runQuery', () => {
    it('should merge, rank, enrich and translate', async () => {
        const crossref = fakeSource(CROSSREF, [crossrefHit, crossrefMiss]);
        const pubmed = fakeSource(PUBMED, [pubmedHit]);
        const enrichment = fakeEnrichment({ '111': { abstract: 'Abstract text', classification_tags: ['Review'] } });
        const translator: Translator = { name: 'Fake', translate: vi.fn(async (texts: string[]) => texts.map(() => 'JA text')) };

        const digest = await runQuery(
            QUERY,
            { sources: [crossref, pubmed], enrichment, translator },
            { topN: 1, limits: { [CROSSREF]: 5, [PUBMED]: 7 } }
        );

        expect(crossref.search).toHaveBeenCalledWith(QUERY, 5);
        expect(pubmed.search).toHaveBeenCalledWith(QUERY, 7);
        expect(enrichment.fetchEnrichment).toHaveBeenCalledWith(['111']);
        expect(translator.translate).toHaveBeenCalledWith(['Abstract text']);

        expect(digest.status).toBe('ok');
        expect(digest.candidates).toBe(2);
        expect(digest.notices).toEqual([]);
        expect(digest.records).toEqual([
            {
                ...crossrefHit,
                source: 'Crossref+PubMed',
                provider_id: '111',
                abstract: 'Abstract text',
                abstract_translated: 'JA text',
                classification_tags: ['Review'],
            },
        ]);
    });

    it('should default each provider limit to 20', async () => {
        const crossref = fakeSource(CROSSREF, []);
        const pubmed = fakeSource(PUBMED, []);

        await runQuery(QUERY, { sources: [crossref, pubmed] }, { topN: 3 });

        expect(crossref.search).toHaveBeenCalledWith(QUERY, 20);
        expect(pubmed.search).toHaveBeenCalledWith(QUERY, 20);
    });

    it('should keep one provider\'s results when the other fails', async () => {
        const failure: ProviderNotice = { provider: PUBMED, kind: 'transport', message: 'PubMed ESearch error: Network error: boom' };

        const digest = await runQuery(
            QUERY,
            { sources: [fakeSource(CROSSREF, [crossrefHit]), fakeSource(PUBMED, [], failure)] },
            { topN: 3 }
        );

        expect(digest.status).toBe('ok');
        expect(digest.records).toHaveLength(1);
        expect(digest.notices).toEqual([failure]);
    });

    it('should report failed when nothing came back and a provider errored', async () => {
        const enrichment = fakeEnrichment({});

        const digest = await runQuery(
            QUERY,
            {
                sources: [
                    fakeSource(CROSSREF, [], { provider: CROSSREF, kind: 'parse', message: 'Crossref request parse error: bad body' }),
                    fakeSource(PUBMED, [], { provider: PUBMED, kind: 'empty', message: 'PubMed: No PMIDs found.' }),
                ],
                enrichment,
            },
            { topN: 3 }
        );

        expect(digest.status).toBe('failed');
        expect(digest.records).toEqual([]);
        expect(digest.notices.map((n) => n.provider)).toEqual([CROSSREF, PUBMED]);
        expect(enrichment.fetchEnrichment).not.toHaveBeenCalled();
    });

    it('should report empty when every provider answered with nothing', async () => {
        const digest = await runQuery(
            QUERY,
            {
                sources: [
                    fakeSource(CROSSREF, [], { provider: CROSSREF, kind: 'empty', message: 'Crossref: No items found.' }),
                    fakeSource(PUBMED, [], { provider: PUBMED, kind: 'empty', message: 'PubMed: No PMIDs found.' }),
                ],
            },
            { topN: 3 }
        );

        expect(digest.status).toBe('empty');
        expect(digest.candidates).toBe(0);
    });
});
