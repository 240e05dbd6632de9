/**
 * Keyword relevance of a title against a search query.
 *
 *   +2  when the whole query occurs in the title
 *   +1  for every whitespace-separated query token found in the title
 *
 * Matching is a case-insensitive substring test: no stemming, no edit distance.
 * "organic electrochemical transistors" against the identical title scores 2 + 3 = 5.
 */
export function scoreTitle(title: string | null | undefined, query: string): number {
    const t = (title ?? '').toLowerCase();
    const q = query.toLowerCase();

    let score = 0;
    if (t.includes(q)) {
        score += 2;
    }

    for (const token of q.split(/\s+/)) {
        if (token && t.includes(token)) {
            score += 1;
        }
    }

    return score;
}

/**
 * Year as an integer for sorting. Sentinels and malformed values sort as 0.
 */
export function yearToInt(year: string | null | undefined): number {
    const trimmed = (year ?? '').trim();
    return /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : 0;
}
