import { UNKNOWN_ARTICLE_TYPE, type PaperRecord } from '../types/index.js';

/**
 * Publication-type rules, strongest evidence first.
 * A record tagged both "Review" and "Meta-Analysis" is labelled a meta-analysis.
 */
const ARTICLE_TYPE_RULES: ReadonlyArray<{ match: string; label: string }> = [
    { match: 'meta-analysis', label: 'Meta-analysis' },
    { match: 'systematic review', label: 'Systematic review' },
    { match: 'review', label: 'Review' },
    { match: 'randomized controlled trial', label: 'Randomized controlled trial' },
    { match: 'clinical trial', label: 'Clinical trial' },
    { match: 'case report', label: 'Case report' },
    { match: 'editorial', label: 'Editorial' },
    { match: 'letter', label: 'Letter' },
    { match: 'comment', label: 'Comment' },
];

/**
 * Display label for a record's article type, derived from its classification tags.
 * Falls back to the first tag verbatim, then to "(unknown)".
 */
export function classifyArticleType(record: Pick<PaperRecord, 'classification_tags'>): string {
    const tags = record.classification_tags ?? [];
    const lowered = tags.map((tag) => tag.toLowerCase());

    for (const rule of ARTICLE_TYPE_RULES) {
        if (lowered.some((tag) => tag.includes(rule.match))) {
            return rule.label;
        }
    }

    return tags[0] ?? UNKNOWN_ARTICLE_TYPE;
}
