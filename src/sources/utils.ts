/**
 * Shared utilities for source adapters.
 */

import { ResponseParseError } from '../utils/http-client.js';
import type { NoticeKind, ProviderName, ProviderNotice } from '../types/index.js';

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string | null | undefined): string | null {
    if (!doi) return null;
    return doi
        .replace(/^https?:\/\/(dx\.)?doi\.org\//i, '')
        .replace(/^doi:\s*/i, '')
        .trim() || null;
}

/**
 * Remove XML/JATS markup from abstract text.
 * "<jats:p>Hello <jats:italic>world</jats:italic></jats:p>" → "Hello world"
 */
export function stripMarkup(text: string | null | undefined): string | null {
    if (!text) return null;
    return text.replace(/<[^>]+>/g, '').trim() || null;
}

/**
 * Pull the first standalone four-digit year out of a free-form date.
 * "2024 Jan 15" → "2024", "2018 Dec" → "2018"
 */
export function extractYear(date: string | null | undefined): string | null {
    if (!date) return null;
    const match = date.match(/\b(\d{4})\b/);
    return match?.[1] ?? null;
}

/**
 * Map an adapter failure onto a notice kind.
 */
export function classifyFailure(error: unknown): NoticeKind {
    return error instanceof ResponseParseError ? 'parse' : 'transport';
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Build a notice for a failed request step, e.g.
 * "PubMed ESearch error: HTTP 503: Service Unavailable".
 */
export function failureNotice(
    provider: ProviderName,
    step: string,
    error: unknown,
    kind: NoticeKind = classifyFailure(error)
): ProviderNotice {
    const label = kind === 'parse' ? 'parse error' : 'error';
    return { provider, kind, message: `${step} ${label}: ${errorMessage(error)}` };
}
