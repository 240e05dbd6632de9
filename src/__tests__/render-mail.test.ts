import { describe, it, expect } from 'vitest';
import nodemailer from 'nodemailer';
import { escapeHtml, formatRunTime, renderDigest, truncate, type RenderOptions } from '../digest/render.js';
import { buildMailOptions, createSmtpMailer, DigestMailer } from '../mail/mailer.js';
import type { QueryDigest } from '../pipeline/run-query.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { makeRecord } from './fixtures.js';

const RUN_TIME = new Date(2026, 0, 5, 9, 7);

const OPTIONS: RenderOptions = {
    runTime: RUN_TIME,
    includeAbstract: true,
    abstractCharLimit: 500,
    translationEnabled: true,
    targetLang: 'JA',
};

const FOUND: QueryDigest = {
    query: 'oect',
    records: [
        makeRecord({
            title: 'OECT sensors',
            abstract: 'Line one\nLine two',
            abstract_translated: 'Translated',
            classification_tags: ['Review'],
        }),
    ],
    notices: [{ provider: 'PubMed', kind: 'empty', message: 'PubMed: No PMIDs found.' }],
    status: 'ok',
    candidates: 1,
};

const FAILED: QueryDigest = {
    query: 'nothing',
    records: [],
    notices: [{ provider: 'Crossref', kind: 'transport', message: 'Crossref request error: Network error: boom' }],
    status: 'failed',
    candidates: 0,
};

describe('Digest rendering', () => {
    describe('helpers', () => {
        it('should format run times as local YYYY-MM-DD HH:mm', () => {
            expect(formatRunTime(RUN_TIME)).toBe('2026-01-05 09:07');
        });

        it('should truncate with an ellipsis', () => {
            expect(truncate('abcdefgh', 5)).toBe('abcde...');
            expect(truncate('abc', 5)).toBe('abc');
            expect(truncate('abcdefgh', null)).toBe('abcdefgh');
        });

        it('should escape HTML special characters', () => {
            expect(escapeHtml(`<a href="x">it's & more</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;it&#x27;s &amp; more&lt;/a&gt;');
        });
    });

    describe('subject', () => {
        it('should count queries when any query has papers', () => {
            expect(renderDigest([FOUND, FAILED], OPTIONS).subject).toBe('litalert (2 queries) - 2026-01-05 09:07');
            expect(renderDigest([FOUND], OPTIONS).subject).toBe('litalert (1 query) - 2026-01-05 09:07');
        });

        it('should flag runs without any papers', () => {
            expect(renderDigest([FAILED], OPTIONS).subject).toBe('litalert ERROR (no results) - 2026-01-05 09:07');
        });
    });

    describe('text body', () => {
        it('should render every section', () => {
            const { text } = renderDigest([FOUND, FAILED], OPTIONS);

            expect(text).toBe(
                [
                    'Run time: 2026-01-05 09:07',
                    '',
                    '=== Query: "oect" ===',
                    '[PubMed note] PubMed: No PMIDs found.',
                    '',
                    '[1] OECT sensors',
                    '    Authors: Ada Example',
                    '    Journal: Journal of Tests',
                    '    Year   : 2020',
                    '    Type   : Review',
                    '    DOI    : 10.1000/test',
                    '    Source : Crossref',
                    '    URL    : https://doi.org/10.1000/test',
                    '    Abstract (EN):',
                    '        Line one',
                    '        Line two',
                    '    Abstract (JA):',
                    '        Translated',
                    '',
                    '-'.repeat(60),
                    '=== Query: "nothing" ===',
                    'No papers found (a source request failed).',
                    '[Crossref] Crossref request error: Network error: boom',
                ].join('\n')
            );
        });

        it('should say so when translation is disabled', () => {
            const { text } = renderDigest([FOUND], { ...OPTIONS, translationEnabled: false });

            expect(text.split('\n').slice(0, 4)).toEqual([
                'Run time: 2026-01-05 09:07',
                '',
                'NOTE: translation disabled (DEEPL_AUTH_KEY not set).',
                '',
            ]);
        });

        it('should report a plain empty query', () => {
            const empty: QueryDigest = { query: 'rare', records: [], notices: [], status: 'empty', candidates: 0 };

            expect(renderDigest([empty], OPTIONS).text.split('\n').slice(2)).toEqual([
                '=== Query: "rare" ===',
                'No papers found.',
            ]);
        });

        it('should truncate abstracts to the limit', () => {
            const digest: QueryDigest = { ...FOUND, records: [makeRecord({ abstract: 'abcdefgh' })], notices: [] };

            const lines = renderDigest([digest], { ...OPTIONS, abstractCharLimit: 5 }).text.split('\n');

            expect(lines).toContain('        abcde...');
        });

        it('should leave abstracts out when disabled', () => {
            const lines = renderDigest([FOUND], { ...OPTIONS, includeAbstract: false }).text.split('\n');

            expect(lines).not.toContain('    Abstract (EN):');
            expect(lines).not.toContain('    Abstract (JA):');
        });
    });

    describe('HTML body', () => {
        it('should escape every value', () => {
            const digest: QueryDigest = {
                ...FOUND,
                query: 'a&b',
                records: [makeRecord({ title: 'Ions <in> "gels"', authors: "O'Neil" })],
                notices: [],
            };

            const lines = renderDigest([digest], OPTIONS).html.split('\n');

            expect(lines).toContain('<h2>Query: "a&amp;b"</h2>');
            expect(lines).toContain('<b>[1] Ions &lt;in&gt; &quot;gels&quot;</b><br>');
            expect(lines).toContain('Authors: O&#x27;Neil<br>');
        });

        it('should link only real URLs', () => {
            const digest: QueryDigest = {
                ...FOUND,
                records: [makeRecord(), makeRecord({ doi: '10.1/b', url: '(no URL)' })],
                notices: [],
            };

            const lines = renderDigest([digest], OPTIONS).html.split('\n');

            expect(lines).toContain('URL: <a href="https://doi.org/10.1000/test">https://doi.org/10.1000/test</a><br>');
            expect(lines).toContain('URL: (no URL)<br>');
        });

        it('should separate queries with rules', () => {
            const { html } = renderDigest([FOUND, FAILED], OPTIONS);

            expect(html.split('<hr>')).toHaveLength(3);
            expect(html.startsWith('<html><body>\n<p>Run time: 2026-01-05 09:07</p>\n<hr>')).toBe(true);
            expect(html.endsWith('</body></html>')).toBe(true);
        });
    });
});

describe('Mail delivery', () => {
    const digest = { subject: 'litalert (1 query) - 2026-01-05 09:07', text: 'plain', html: '<p>html</p>' };
    const addresses = { from: 'alerts@example.com', to: 'reader@example.com' };

    it('should build a message with both bodies', () => {
        expect(buildMailOptions(digest, addresses)).toEqual({
            from: 'alerts@example.com',
            to: 'reader@example.com',
            subject: 'litalert (1 query) - 2026-01-05 09:07',
            text: 'plain',
            html: '<p>html</p>',
        });
    });

    it('should send through the transport and return the Message-ID', async () => {
        const mailer = new DigestMailer(nodemailer.createTransport({ jsonTransport: true }), addresses);

        const messageId = await mailer.send(digest);

        expect(messageId).toMatch(/^<.+>$/);
    });

    it('should refuse an SMTP mailer without a user', () => {
        expect(() => createSmtpMailer(DEFAULT_CONFIG.mail, 'test-secret')).toThrow(ConfigError);
    });

    it('should build an SMTP mailer when a user is set', () => {
        const mailer = createSmtpMailer({ ...DEFAULT_CONFIG.mail, user: 'alerts@example.com' }, 'test-secret');
        expect(mailer).toBeInstanceOf(DigestMailer);
    });
});
