import { describe, it, expect } from 'vitest';
import {
    CROSSREF,
    DEFAULT_CONFIG,
    NO_DOI,
    NO_TITLE,
    NO_URL,
    NO_YEAR,
    PUBMED,
} from '../types/index.js';

describe('Types', () => {
    describe('sentinels', () => {
        it('should be distinct display strings', () => {
            const sentinels = [NO_TITLE, NO_DOI, NO_URL, NO_YEAR];
            expect(new Set(sentinels).size).toBe(sentinels.length);
        });

        it('should never look like a year', () => {
            expect(NO_YEAR).not.toMatch(/^\d+$/);
        });
    });

    describe('provider names', () => {
        it('should not contain the source separator', () => {
            expect(CROSSREF).not.toContain('+');
            expect(PUBMED).not.toContain('+');
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should rank the top 3 per query', () => {
            expect(DEFAULT_CONFIG.topN).toBe(3);
        });

        it('should fetch 20 results from each provider', () => {
            expect(DEFAULT_CONFIG.crossrefRows).toBe(20);
            expect(DEFAULT_CONFIG.pubmedRetmax).toBe(20);
        });

        it('should truncate abstracts at 500 characters', () => {
            expect(DEFAULT_CONFIG.abstractCharLimit).toBe(500);
        });

        it('should translate to Japanese via the DeepL free API', () => {
            expect(DEFAULT_CONFIG.translation).toEqual({
                enabled: true,
                targetLang: 'JA',
                apiUrl: 'https://api-free.deepl.com/v2/translate',
            });
        });

        it('should send through Gmail with STARTTLS', () => {
            expect(DEFAULT_CONFIG.mail).toEqual({ host: 'smtp.gmail.com', port: 587, secure: false });
        });

        it('should start without queries', () => {
            expect(DEFAULT_CONFIG.queries).toEqual([]);
        });
    });
});
