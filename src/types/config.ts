/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Abstract translation settings. The API key itself stays in the environment.
 */
export interface TranslationConfig {
    enabled: boolean;
    targetLang: string;
    apiUrl: string;
}

/**
 * SMTP delivery settings. The password stays in the environment.
 */
export interface MailConfig {
    host: string;
    port: number;
    /** TLS from the first byte (port 465); false upgrades with STARTTLS */
    secure: boolean;
    user?: string;
    from?: string;
    to?: string;
}

/**
 * Full litalert configuration merged from CLI flags, env vars, and config file.
 */
export interface AlertConfig {
    // Input
    queries: string[];

    // Fetch
    crossrefRows: number;
    pubmedRetmax: number;
    yearFrom: number;
    contactEmail?: string;

    // Ranking
    topN: number;

    // Digest
    includeAbstract: boolean;
    /** Truncate abstracts in the digest to this many characters; null keeps them whole */
    abstractCharLimit: number | null;

    // Output
    dryRun: boolean;
    out?: string;
    archive?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    translation: TranslationConfig;
    mail: MailConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AlertConfig = {
    queries: [],
    crossrefRows: 20,
    pubmedRetmax: 20,
    yearFrom: 2010,
    topN: 3,
    includeAbstract: true,
    abstractCharLimit: 500,
    dryRun: false,
    logLevel: 'info',
    jsonLogs: false,
    translation: {
        enabled: true,
        targetLang: 'JA',
        apiUrl: 'https://api-free.deepl.com/v2/translate',
    },
    mail: {
        host: 'smtp.gmail.com',
        port: 587,
        secure: false,
    },
};

/**
 * Run metadata stored in the archive's `runs` table.
 */
export interface RunRecord {
    run_id?: number;
    created_at: string;
    litalert_version: string;
    config_json: string;
    stats_json: string;
}

/**
 * One reported record as stored in the archive's `digest_records` table.
 */
export interface ArchivedRecord {
    run_id: number;
    query: string;
    rank: number;
    dedup_key: string;
    title: string;
    doi: string;
    year: string;
    source: string;
    article_type: string;
}
