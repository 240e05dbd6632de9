import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    DEFAULT_CONFIG,
    type AlertConfig,
    type MailConfig,
    type TranslationConfig,
} from '../types/index.js';
import { ConfigError } from './errors.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration from any one layer (file, environment, CLI).
 */
export type ConfigOverrides = Omit<Partial<AlertConfig>, 'translation' | 'mail'> & {
    translation?: Partial<TranslationConfig>;
    mail?: Partial<MailConfig>;
};

/**
 * Shape of litalert.config.json. Unknown keys are rejected so typos surface.
 */
const fileConfigSchema = z.object({
    queries: z.array(z.string().trim().min(1)).optional(),
    crossrefRows: z.number().int().min(1).max(1000).optional(),
    pubmedRetmax: z.number().int().min(1).max(10000).optional(),
    yearFrom: z.number().int().min(1800).max(3000).optional(),
    contactEmail: z.string().email().optional(),
    topN: z.number().int().min(0).optional(),
    includeAbstract: z.boolean().optional(),
    abstractCharLimit: z.number().int().min(1).nullable().optional(),
    dryRun: z.boolean().optional(),
    out: z.string().min(1).optional(),
    archive: z.string().min(1).optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
    jsonLogs: z.boolean().optional(),
    translation: z.object({
        enabled: z.boolean(),
        targetLang: z.string().min(2),
        apiUrl: z.string().url(),
    }).partial().strict().optional(),
    mail: z.object({
        host: z.string().min(1),
        port: z.number().int().min(1).max(65535),
        secure: z.boolean(),
        user: z.string().min(1),
        from: z.string().min(1),
        to: z.string().min(1),
    }).partial().strict().optional(),
}).strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

/**
 * Validate a parsed config file, throwing ConfigError with one line per problem.
 */
export function parseFileConfig(raw: unknown, filepath = 'litalert.config.json'): FileConfig {
    const result = fileConfigSchema.safeParse(raw);
    if (!result.success) {
        throw new ConfigError(
            `Invalid config file ${filepath}`,
            result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return result.data;
}

/**
 * Load litalert.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults are used).
 */
async function loadConfigFile(options: { configPath?: string; searchFrom?: string }): Promise<FileConfig | null> {
    const explorer = cosmiconfig('litalert', {
        searchPlaces: ['litalert.config.json', 'package.json'],
    });

    const result = options.configPath
        ? await explorer.load(options.configPath)
        : await explorer.search(options.searchFrom);

    if (!result || result.isEmpty) {
        return null;
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parseFileConfig(result.config, result.filepath);
}

/**
 * Read non-secret settings from environment variables.
 * Secrets (SMTP_PASS, DEEPL_AUTH_KEY, NCBI_API_KEY) are read where they are used.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const mail: Partial<MailConfig> = {};
    const translation: Partial<TranslationConfig> = {};

    if (env['SMTP_USER']) mail.user = env['SMTP_USER'];
    if (env['SMTP_HOST']) mail.host = env['SMTP_HOST'];
    if (env['MAIL_FROM']) mail.from = env['MAIL_FROM'];
    if (env['MAIL_TO']) mail.to = env['MAIL_TO'];
    if (env['CONTACT_EMAIL']) overrides.contactEmail = env['CONTACT_EMAIL'];
    if (env['DEEPL_API_URL']) translation.apiUrl = env['DEEPL_API_URL'];

    if (Object.keys(mail).length > 0) overrides.mail = mail;
    if (Object.keys(translation).length > 0) overrides.translation = translation;

    return overrides;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { configPath?: string; searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<AlertConfig> {
    const fileConfig = await loadConfigFile(options);
    const envConfig = loadEnvVars(options.env);

    const merged: AlertConfig = {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        translation: {
            ...DEFAULT_CONFIG.translation,
            ...fileConfig?.translation,
            ...envConfig.translation,
            ...cliFlags.translation,
        },
        mail: {
            ...DEFAULT_CONFIG.mail,
            ...fileConfig?.mail,
            ...envConfig.mail,
            ...cliFlags.mail,
        },
    };

    // Providers get the sender address as contact unless one is set explicitly
    merged.contactEmail ??= merged.mail.user;

    validateConfig(merged);
    return merged;
}

/**
 * Cross-field checks that no single layer can make on its own.
 */
export function validateConfig(config: AlertConfig): void {
    const issues: string[] = [];

    if (config.queries.length === 0) {
        issues.push('queries: at least one query is required (--query or "queries" in litalert.config.json)');
    }
    if (!Number.isInteger(config.topN) || config.topN < 0) {
        issues.push(`topN: expected a non-negative integer, got ${config.topN}`);
    }
    for (const [name, value] of [['crossrefRows', config.crossrefRows], ['pubmedRetmax', config.pubmedRetmax]] as const) {
        if (!Number.isInteger(value) || value < 1) {
            issues.push(`${name}: expected a positive integer, got ${value}`);
        }
    }
    if (!Number.isInteger(config.yearFrom)) {
        issues.push(`yearFrom: expected a year, got ${config.yearFrom}`);
    }

    if (issues.length > 0) {
        throw new ConfigError('Invalid configuration', issues);
    }
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env[name] || undefined;
}
