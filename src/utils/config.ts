import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type ClassifierConfig, type FetcherConfig } from '../types/index.js';
import { getLogger, parseLogLevel } from './logger.js';

export const CONFIG_MODULE_NAME = 'pubmedfetcher';
export const CONFIG_SEARCH_PLACES = ['pubmed-fetcher.config.json', '.pubmedfetcherrc.json'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate a config file's contents field by field.
 * Mistyped or unknown fields are dropped with a warning.
 */
export function validateFileConfig(raw: unknown): Partial<FetcherConfig> {
    const logger = getLogger();
    if (!isRecord(raw)) {
        logger.warn('Config file is not a JSON object, ignoring it');
        return {};
    }

    const config: Partial<FetcherConfig> = {};
    const reject = (field: string) => logger.warn({ field }, 'Ignoring invalid config field');

    for (const [field, value] of Object.entries(raw)) {
        switch (field) {
            case 'email':
            case 'file':
            case 'toolName':
                if (typeof value === 'string' && value.trim()) config[field] = value.trim();
                else reject(field);
                break;
            case 'maxResults':
            case 'timeout':
                if (isPositiveInteger(value)) config[field] = value;
                else reject(field);
                break;
            case 'maxRetries':
                if (typeof value === 'number' && Number.isInteger(value) && value >= 0) config.maxRetries = value;
                else reject(field);
                break;
            case 'logLevel': {
                const level = typeof value === 'string' ? parseLogLevel(value) : undefined;
                if (level) config.logLevel = level;
                else reject(field);
                break;
            }
            case 'jsonLogs':
                if (typeof value === 'boolean') config.jsonLogs = value;
                else reject(field);
                break;
            case 'classifier': {
                const classifier = validateClassifier(value);
                if (classifier) config.classifier = classifier;
                else reject(field);
                break;
            }
            default:
                reject(field);
        }
    }

    return config;
}

function validateClassifier(value: unknown): ClassifierConfig | undefined {
    if (!isRecord(value)) return undefined;
    const academic = value['academicKeywords'] ?? [];
    const commercial = value['commercialKeywords'] ?? [];
    if (!isStringArray(academic) || !isStringArray(commercial)) return undefined;
    return { academicKeywords: academic, commercialKeywords: commercial };
}

/**
 * Load configuration from pubmed-fetcher.config.json using cosmiconfig.
 * Returns null if no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<FetcherConfig> | null> {
    const explorer = cosmiconfig(CONFIG_MODULE_NAME, {
        searchPlaces: CONFIG_SEARCH_PLACES,
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return validateFileConfig(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<FetcherConfig> {
    const config: Partial<FetcherConfig> = {};

    const email = env['NCBI_EMAIL']?.trim();
    if (email) config.email = email;

    const level = parseLogLevel(env['LOG_LEVEL']);
    if (level) config.logLevel = level;

    // The API key is read where it is used, not stored in config
    if (env['NCBI_API_KEY']) {
        getLogger().debug('NCBI_API_KEY detected in environment');
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 * CLI flags must leave out options the user did not pass.
 */
export async function resolveConfig(
    cliFlags: Partial<FetcherConfig>,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<FetcherConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        // Keyword lists accumulate across layers
        classifier: {
            academicKeywords: [
                ...DEFAULT_CONFIG.classifier.academicKeywords,
                ...(fileConfig?.classifier?.academicKeywords ?? []),
                ...(cliFlags.classifier?.academicKeywords ?? []),
            ],
            commercialKeywords: [
                ...DEFAULT_CONFIG.classifier.commercialKeywords,
                ...(fileConfig?.classifier?.commercialKeywords ?? []),
                ...(cliFlags.classifier?.commercialKeywords ?? []),
            ],
        },
    };
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 * @returns The API key or undefined
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}
