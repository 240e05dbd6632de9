import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type {
    AlertConfig,
    ArchivedRecord,
    EnrichmentSource,
    SourceAdapter,
    Translator,
} from '../types/index.js';
import { CROSSREF, PUBMED } from '../types/index.js';
import { CrossrefAdapter } from '../sources/crossref.js';
import { PubMedAdapter } from '../sources/pubmed.js';
import { DeepLTranslator } from '../translation/deepl.js';
import { runQuery, type QueryDigest } from '../pipeline/run-query.js';
import { dedupKey } from '../pipeline/merge.js';
import { classifyArticleType } from '../pipeline/article-type.js';
import { renderDigest, type RenderedDigest } from '../digest/render.js';
import { createSmtpMailer, type DigestMailer } from '../mail/mailer.js';
import { DigestArchive } from '../storage/archive.js';
import { getApiKey } from '../utils/config.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { VERSION } from '../version.js';

/**
 * Collaborators of a run. Anything left out is built from the config.
 */
export interface DigestDeps {
    sources?: readonly [SourceAdapter, SourceAdapter];
    /** null disables enrichment */
    enrichment?: EnrichmentSource | null;
    /** null disables translation */
    translator?: Translator | null;
    mailer?: DigestMailer;
    /** Client for the adapters built here; defaults to the shared one */
    httpClient?: HttpClient;
    now?: () => Date;
    env?: NodeJS.ProcessEnv;
}

export interface DigestRun {
    queries: QueryDigest[];
    digest: RenderedDigest;
    /** Message-ID of the sent mail; null on a dry run */
    messageId: string | null;
    /** Files written under --out */
    files: string[];
    /** Archive run_id, when --archive is set */
    runId: number | null;
}

interface Pipeline {
    sources: readonly [SourceAdapter, SourceAdapter];
    enrichment: EnrichmentSource | null;
    translator: Translator | null;
}

function buildPipeline(config: AlertConfig, deps: DigestDeps, httpClient: HttpClient): Pipeline {
    const env = deps.env ?? process.env;
    const adapterOptions = { email: config.contactEmail, yearFrom: config.yearFrom };

    const crossref = new CrossrefAdapter(adapterOptions);
    const pubmed = new PubMedAdapter({ ...adapterOptions, apiKey: getApiKey('NCBI_API_KEY', env) });
    crossref.setHttpClient(httpClient);
    pubmed.setHttpClient(httpClient);
    const sources: readonly [SourceAdapter, SourceAdapter] = deps.sources ?? [crossref, pubmed];
    const enrichment = deps.enrichment === undefined ? pubmed : deps.enrichment;

    let translator: Translator | null = null;
    if (deps.translator !== undefined) {
        translator = deps.translator;
    } else if (config.translation.enabled) {
        const authKey = getApiKey('DEEPL_AUTH_KEY', env);
        if (authKey) {
            const deepl = new DeepLTranslator({
                authKey,
                apiUrl: config.translation.apiUrl,
                targetLang: config.translation.targetLang,
            });
            deepl.setHttpClient(httpClient);
            translator = deepl;
        } else {
            getLogger().warn('DEEPL_AUTH_KEY not set, abstracts will not be translated');
        }
    }

    return { sources, enrichment, translator };
}

/**
 * Checked before any provider is queried.
 */
function resolveMailer(config: AlertConfig, deps: DigestDeps): DigestMailer | null {
    if (config.dryRun) return null;
    if (deps.mailer) return deps.mailer;

    const password = getApiKey('SMTP_PASS', deps.env);
    if (!password) {
        throw new ConfigError('SMTP password is not configured (set SMTP_PASS, or use --dry-run)');
    }
    return createSmtpMailer(config.mail, password);
}

/**
 * Rows stored for each record a digest reported, in rank order per query.
 */
export function toArchivedRecords(digests: readonly QueryDigest[]): Omit<ArchivedRecord, 'run_id'>[] {
    return digests.flatMap((digest) =>
        digest.records.map((record, i) => ({
            query: digest.query,
            rank: i + 1,
            dedup_key: dedupKey(record),
            title: record.title,
            doi: record.doi,
            year: record.year,
            source: record.source,
            article_type: classifyArticleType(record),
        }))
    );
}

function writeDigestFiles(outDir: string, digest: RenderedDigest): string[] {
    mkdirSync(outDir, { recursive: true });

    const textPath = join(outDir, 'digest.txt');
    const htmlPath = join(outDir, 'digest.html');
    writeFileSync(textPath, `Subject: ${digest.subject}\n\n${digest.text}`, 'utf-8');
    writeFileSync(htmlPath, digest.html, 'utf-8');

    return [textPath, htmlPath];
}

/**
 * Main digest builder: orchestrates one alert run.
 *
 * 1. Run every query through search, merge, rank, enrich and translate
 * 2. Render the digest
 * 3. Write it to --out, if set
 * 4. Mail it, unless this is a dry run
 * 5. Archive what was reported, if --archive is set
 */
export async function runDigest(config: AlertConfig, deps: DigestDeps = {}): Promise<DigestRun> {
    const logger = getLogger();
    const runTime = (deps.now ?? (() => new Date()))();
    const startTime = Date.now();

    const mailer = resolveMailer(config, deps);
    const httpClient = deps.httpClient ?? getHttpClient();
    httpClient.resetCounts();
    const pipeline = buildPipeline(config, deps, httpClient);

    logger.info(
        { queries: config.queries.length, topN: config.topN, dryRun: config.dryRun, translate: pipeline.translator !== null },
        'Starting digest run'
    );

    const queries: QueryDigest[] = [];
    for (const query of config.queries) {
        const digest = await runQuery(
            query,
            {
                sources: pipeline.sources,
                enrichment: pipeline.enrichment ?? undefined,
                translator: pipeline.translator ?? undefined,
            },
            {
                topN: config.topN,
                limits: { [CROSSREF]: config.crossrefRows, [PUBMED]: config.pubmedRetmax },
            }
        );
        logger.info({ query, status: digest.status, records: digest.records.length }, 'Query done');
        queries.push(digest);
    }

    const digest = renderDigest(queries, {
        runTime,
        includeAbstract: config.includeAbstract,
        abstractCharLimit: config.abstractCharLimit,
        translationEnabled: pipeline.translator !== null,
        targetLang: config.translation.targetLang,
    });

    const files = config.out ? writeDigestFiles(config.out, digest) : [];
    if (files.length > 0) {
        logger.info({ files }, 'Digest written');
    }

    let messageId: string | null = null;
    if (mailer) {
        messageId = await mailer.send(digest);
    } else {
        logger.info({ subject: digest.subject }, 'Dry run, digest not sent');
    }

    let runId: number | null = null;
    if (config.archive) {
        const archive = new DigestArchive(config.archive);
        try {
            runId = archive.recordRun(
                {
                    created_at: runTime.toISOString(),
                    litalert_version: VERSION,
                    config_json: JSON.stringify(config),
                    stats_json: JSON.stringify({
                        statuses: Object.fromEntries(queries.map((q) => [q.query, q.status])),
                        candidates: queries.reduce((sum, q) => sum + q.candidates, 0),
                        sent: messageId !== null,
                        requests: httpClient.getAllRequestCounts(),
                    }),
                },
                toArchivedRecords(queries)
            );
        } finally {
            archive.close();
        }
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info(
        {
            queries: queries.length,
            records: queries.reduce((sum, q) => sum + q.records.length, 0),
            requests: httpClient.getAllRequestCounts(),
            elapsed: `${elapsed}s`,
        },
        'Digest run complete'
    );

    return { queries, digest, messageId, files, runId };
}
