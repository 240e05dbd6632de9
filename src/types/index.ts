/**
 * Barrel export for all shared types.
 */
export {
    NO_TITLE,
    NO_DOI,
    NO_URL,
    NO_AUTHORS,
    NO_AUTHOR_NAME,
    NO_YEAR,
    NO_JOURNAL,
    UNKNOWN_ARTICLE_TYPE,
    CROSSREF,
    PUBMED,
} from './record.js';
export type { PaperRecord, EnrichmentEntry, ProviderName } from './record.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    AlertConfig,
    LogLevel,
    TranslationConfig,
    MailConfig,
    RunRecord,
    ArchivedRecord,
} from './config.js';
export type {
    SourceAdapter,
    SourceAdapterOptions,
    SourceResult,
    ProviderNotice,
    NoticeKind,
    EnrichmentSource,
} from './source-adapter.js';
export type { Translator } from './translator.js';
