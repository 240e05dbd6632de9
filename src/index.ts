/**
 * Library entry point. The CLI lives in ./cli/index.ts.
 */
export * from './types/index.js';
export { scoreTitle, yearToInt } from './pipeline/scoring.js';
export { mergeRecords, dedupKey } from './pipeline/merge.js';
export { rankRecords, scoreRecords, type ScoredRecord } from './pipeline/rank.js';
export { enrichRecords, collectProviderIds, type EnrichmentFetcher } from './pipeline/enrich.js';
export { translateAbstracts } from './pipeline/translate.js';
export { classifyArticleType } from './pipeline/article-type.js';
export {
    runQuery,
    type QueryDigest,
    type QueryPipeline,
    type QueryOptions,
    type QueryStatus,
} from './pipeline/run-query.js';
export { CrossrefAdapter, normalizeCrossrefItem } from './sources/crossref.js';
export { PubMedAdapter, normalizeSummary, parseEFetchXml } from './sources/pubmed.js';
export { DeepLTranslator } from './translation/deepl.js';
export { renderDigest, type RenderOptions, type RenderedDigest } from './digest/render.js';
export { DigestMailer, createSmtpMailer } from './mail/mailer.js';
export { DigestArchive } from './storage/archive.js';
export { runDigest, type DigestDeps, type DigestRun } from './builder/digest-builder.js';
export { resolveConfig } from './utils/config.js';
export { HttpClient, HttpError, ResponseParseError, createHttpClient } from './utils/http-client.js';
export { ConfigError } from './utils/errors.js';
