#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getHttpClient } from '../utils/http-client.js';
import { runDigest } from '../builder/digest-builder.js';
import { DigestArchive } from '../storage/archive.js';
import type { LogLevel } from '../types/index.js';
import { VERSION } from '../version.js';

interface RunOptions {
    query?: string[];
    config?: string;
    topN?: number;
    crossrefRows?: number;
    pubmedRetmax?: number;
    yearFrom?: number;
    abstractLimit?: number;
    abstract: boolean;
    translate: boolean;
    targetLang?: string;
    contactEmail?: string;
    mailTo?: string;
    out?: string;
    archive?: string;
    dryRun?: boolean;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

interface HistoryOptions {
    input: string;
    limit: number;
}

function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError('Not an integer.');
    }
    return parsed;
}

/**
 * Only flags the user actually passed, so they never mask file or env values.
 */
function toConfigOverrides(opts: RunOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (opts.query && opts.query.length > 0) overrides.queries = opts.query;
    if (opts.topN !== undefined) overrides.topN = opts.topN;
    if (opts.crossrefRows !== undefined) overrides.crossrefRows = opts.crossrefRows;
    if (opts.pubmedRetmax !== undefined) overrides.pubmedRetmax = opts.pubmedRetmax;
    if (opts.yearFrom !== undefined) overrides.yearFrom = opts.yearFrom;
    if (opts.abstractLimit !== undefined) overrides.abstractCharLimit = opts.abstractLimit > 0 ? opts.abstractLimit : null;
    if (!opts.abstract) overrides.includeAbstract = false;
    if (opts.contactEmail) overrides.contactEmail = opts.contactEmail;
    if (opts.out) overrides.out = opts.out;
    if (opts.archive) overrides.archive = opts.archive;
    if (opts.dryRun) overrides.dryRun = true;
    if (opts.logLevel) overrides.logLevel = opts.logLevel;
    if (opts.jsonLogs) overrides.jsonLogs = true;

    const translation: ConfigOverrides['translation'] = {};
    if (!opts.translate) translation.enabled = false;
    if (opts.targetLang) translation.targetLang = opts.targetLang.toUpperCase();
    if (Object.keys(translation).length > 0) overrides.translation = translation;

    if (opts.mailTo) overrides.mail = { to: opts.mailTo };

    return overrides;
}

const program = new Command();

program
    .name('litalert')
    .description('Literature alerts: search Crossref and PubMed, rank the hits and mail a digest.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Fetch, rank and render the digest, then mail it')
    .option('-q, --query <queries...>', 'Search queries (overrides the config file)')
    .option('-c, --config <path>', 'Config file (default: search for litalert.config.json)')
    .option('-n, --top-n <n>', 'Papers per query in the digest', parseInteger)
    .option('--crossref-rows <n>', 'Crossref results per query', parseInteger)
    .option('--pubmed-retmax <n>', 'PubMed results per query', parseInteger)
    .option('--year-from <year>', 'Only papers published from this year', parseInteger)
    .option('--abstract-limit <n>', 'Truncate abstracts to n characters (0 = no limit)', parseInteger)
    .option('--no-abstract', 'Leave abstracts out of the digest')
    .option('--no-translate', 'Skip abstract translation')
    .option('--target-lang <lang>', 'DeepL target language, e.g. JA')
    .option('--contact-email <email>', 'mailto contact sent to Crossref and PubMed')
    .option('--mail-to <address>', 'Digest recipient (default: MAIL_TO or the sender)')
    .option('-o, --out <dir>', 'Also write digest.txt and digest.html to this directory')
    .option('--archive <dbPath>', 'Record the run in this SQLite archive')
    .option('--dry-run', 'Render the digest without sending it')
    .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        const config = await resolveConfig(toConfigOverrides(opts), { configPath: opts.config });
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getHttpClient({ timeout: 30000, version: VERSION, email: config.contactEmail });

        const result = await runDigest(config);

        const logger = getLogger();
        logger.info(
            { subject: result.digest.subject, messageId: result.messageId, files: result.files, runId: result.runId },
            'Run complete'
        );
        if (result.queries.every((q) => q.status !== 'ok')) {
            logger.warn('No query returned any papers');
        }
    });

// ─── HISTORY command ──────────────────────────────────────

program
    .command('history')
    .description('List recent runs recorded in an archive')
    .requiredOption('-i, --input <dbPath>', 'Archive database path')
    .option('-n, --limit <n>', 'Number of runs to show', parseInteger, 10)
    .action((opts: HistoryOptions) => {
        const archive = new DigestArchive(opts.input);
        try {
            const stats = archive.getStats();
            const runs = archive.getRecentRuns(opts.limit);

            console.log('\nlitalert archive\n');
            console.log(`  Runs:         ${stats.runs}`);
            console.log(`  Records:      ${stats.records}`);
            console.log(`  Unique works: ${stats.uniqueWorks}`);

            if (runs.length > 0) {
                console.log('\n  Recent runs:');
                for (const run of runs) {
                    console.log(`    #${run.run_id}  ${run.created_at}  ${run.record_count} records  (v${run.litalert_version})`);
                }
            }

            console.log('');
        } finally {
            archive.close();
        }
    });

program.parseAsync().catch((error: unknown) => {
    if (error instanceof ConfigError) {
        getLogger().error(error.message);
    } else {
        getLogger().error({ err: error }, 'Command failed');
    }
    process.exitCode = 1;
});
