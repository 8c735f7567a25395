/**
 * Log level options. `silent` turns logging off entirely (used by the tests).
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug', 'silent'];

/**
 * Extra keywords for the affiliation classifier. Added to the built-in lists.
 */
export interface ClassifierConfig {
    academicKeywords: string[];
    commercialKeywords: string[];
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface FetcherConfig {
    // Input
    query?: string;

    /** Contact e-mail sent to NCBI with every request */
    email?: string;

    // Retrieval
    maxResults: number;
    timeout: number;
    maxRetries: number;

    /** `tool` parameter sent to NCBI */
    toolName: string;

    // Output
    /** CSV output path; results go to stdout when unset */
    file?: string;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    // Classification
    classifier: ClassifierConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: FetcherConfig = {
    maxResults: 100,
    timeout: 30000,
    maxRetries: 3,
    toolName: 'pubmed-company-papers',
    logLevel: 'info',
    jsonLogs: false,
    classifier: {
        academicKeywords: [],
        commercialKeywords: [],
    },
};

/**
 * ESearch will not return more than this many IDs in one page.
 */
export const MAX_RESULTS_CAP = 10000;
