import type { PaperRecord, ProviderNotice } from '../types/index.js';
import { classifyArticleType } from '../pipeline/article-type.js';
import type { QueryDigest } from '../pipeline/run-query.js';

export interface RenderOptions {
    runTime: Date;
    includeAbstract: boolean;
    /** Truncate abstracts to this many characters (null = no limit) */
    abstractCharLimit: number | null;
    translationEnabled: boolean;
    /** Language label for translated abstracts, e.g. "JA" */
    targetLang: string;
}

export interface RenderedDigest {
    subject: string;
    text: string;
    html: string;
}

const SECTION_RULE = '-'.repeat(60);
const TRANSLATION_DISABLED_NOTE = 'NOTE: translation disabled (DEEPL_AUTH_KEY not set).';

/**
 * Render query digests as a mail subject plus plain-text and HTML bodies.
 */
export function renderDigest(digests: readonly QueryDigest[], options: RenderOptions): RenderedDigest {
    const runTime = formatRunTime(options.runTime);
    const anyPapers = digests.some((d) => d.status === 'ok');

    const subject = anyPapers
        ? `litalert (${digests.length} ${digests.length === 1 ? 'query' : 'queries'}) - ${runTime}`
        : `litalert ERROR (no results) - ${runTime}`;

    return {
        subject,
        text: renderText(digests, runTime, options),
        html: renderHtml(digests, runTime, options),
    };
}

/**
 * "YYYY-MM-DD HH:mm" in local time.
 */
export function formatRunTime(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function truncate(text: string, limit: number | null): string {
    if (limit === null || text.length <= limit) return text;
    return `${text.slice(0, limit)}...`;
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#x27;');
}

function emptyMessage(digest: QueryDigest): string {
    return digest.status === 'failed'
        ? 'No papers found (a source request failed).'
        : 'No papers found.';
}

/**
 * "[Crossref] msg" when the query came back empty, "[Crossref note] msg" alongside results.
 */
function noticeLabel(notice: ProviderNotice, hasRecords: boolean): string {
    return hasRecords ? `[${notice.provider} note]` : `[${notice.provider}]`;
}

/** Abstract blocks to show for a record: [label, text] */
function abstractBlocks(record: PaperRecord, options: RenderOptions): Array<[string, string]> {
    if (!options.includeAbstract) return [];

    const blocks: Array<[string, string]> = [];
    if (record.abstract) {
        blocks.push(['Abstract (EN)', truncate(record.abstract, options.abstractCharLimit)]);
    }
    if (record.abstract_translated) {
        blocks.push([
            `Abstract (${options.targetLang})`,
            truncate(record.abstract_translated, options.abstractCharLimit),
        ]);
    }
    return blocks;
}

// ─── Plain text ───────────────────────────────────────────

function renderTextSection(digest: QueryDigest, options: RenderOptions): string {
    const lines = [`=== Query: "${digest.query}" ===`];
    const hasRecords = digest.records.length > 0;

    if (!hasRecords) {
        lines.push(emptyMessage(digest));
    }
    for (const notice of digest.notices) {
        lines.push(`${noticeLabel(notice, hasRecords)} ${notice.message}`);
    }
    if (hasRecords && digest.notices.length > 0) {
        lines.push('');
    }

    digest.records.forEach((record, i) => {
        lines.push(`[${i + 1}] ${record.title}`);
        lines.push(`    Authors: ${record.authors}`);
        lines.push(`    Journal: ${record.journal}`);
        lines.push(`    Year   : ${record.year}`);
        lines.push(`    Type   : ${classifyArticleType(record)}`);
        lines.push(`    DOI    : ${record.doi}`);
        lines.push(`    Source : ${record.source}`);
        lines.push(`    URL    : ${record.url}`);

        for (const [label, text] of abstractBlocks(record, options)) {
            lines.push(`    ${label}:`);
            for (const line of text.split(/\r?\n/)) {
                lines.push(`        ${line}`);
            }
        }

        lines.push('');
    });

    return lines.join('\n');
}

function renderText(digests: readonly QueryDigest[], runTime: string, options: RenderOptions): string {
    const lines = [`Run time: ${runTime}`, ''];
    if (!options.translationEnabled) {
        lines.push(TRANSLATION_DISABLED_NOTE, '');
    }
    lines.push(digests.map((d) => renderTextSection(d, options)).join(`\n${SECTION_RULE}\n`));
    return lines.join('\n');
}

// ─── HTML ─────────────────────────────────────────────────

function renderHtmlSection(digest: QueryDigest, options: RenderOptions): string {
    const lines = [`<h2>Query: "${escapeHtml(digest.query)}"</h2>`];
    const hasRecords = digest.records.length > 0;

    if (!hasRecords) {
        lines.push(`<p>${escapeHtml(emptyMessage(digest))}</p>`);
    }
    for (const notice of digest.notices) {
        lines.push(`<p><i>${escapeHtml(noticeLabel(notice, hasRecords))} ${escapeHtml(notice.message)}</i></p>`);
    }

    digest.records.forEach((record, i) => {
        const url = escapeHtml(record.url);
        lines.push('<p>');
        lines.push(`<b>[${i + 1}] ${escapeHtml(record.title)}</b><br>`);
        lines.push(`Authors: ${escapeHtml(record.authors)}<br>`);
        lines.push(`Journal: ${escapeHtml(record.journal)}<br>`);
        lines.push(`Year: ${escapeHtml(record.year)}<br>`);
        lines.push(`Type: ${escapeHtml(classifyArticleType(record))}<br>`);
        lines.push(`DOI: ${escapeHtml(record.doi)}<br>`);
        lines.push(`Source: ${escapeHtml(record.source)}<br>`);
        lines.push(record.url.startsWith('http') ? `URL: <a href="${url}">${url}</a><br>` : `URL: ${url}<br>`);

        for (const [label, text] of abstractBlocks(record, options)) {
            lines.push(`<br><b>${escapeHtml(label)}:</b><br>`);
            lines.push(`<div style="white-space: pre-wrap; font-size:90%;">${escapeHtml(text)}</div>`);
        }

        lines.push('</p>');
    });

    return lines.join('\n');
}

function renderHtml(digests: readonly QueryDigest[], runTime: string, options: RenderOptions): string {
    const parts = ['<html><body>', `<p>Run time: ${escapeHtml(runTime)}</p>`];
    if (!options.translationEnabled) {
        parts.push(`<p><i>${escapeHtml(TRANSLATION_DISABLED_NOTE)}</i></p>`);
    }
    parts.push('<hr>');
    parts.push(digests.map((d) => renderHtmlSection(d, options)).join('<hr>'));
    parts.push('</body></html>');
    return parts.join('\n');
}
