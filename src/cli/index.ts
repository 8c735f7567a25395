import { Command, InvalidArgumentError } from 'commander';
import { resolveConfig, getApiKey } from '../utils/config.js';
import { initLogger, getLogger, parseLogLevel } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { findCompanyPapers } from '../pipeline/pipeline.js';
import { RetrievalError } from '../pipeline/errors.js';
import { PubMedClient } from '../sources/pubmed.js';
import { buildAffiliationRules } from '../classifier/affiliation.js';
import { exportCSV, exportResults, exportTable, type ExportFormat } from '../exporters/export.js';
import type { FetcherConfig, LogLevel } from '../types/index.js';

const VERSION = '1.0.0';

interface CliOptions {
    email?: string;
    file?: string;
    format?: ExportFormat;
    debug?: boolean;
    maxResults?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

function parsePositiveInt(value: string): number {
    const n = parseInt(value, 10);
    if (isNaN(n) || n <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return n;
}

function parseLevel(value: string): LogLevel {
    const level = parseLogLevel(value);
    if (!level) {
        throw new InvalidArgumentError('Must be one of: debug, info, warn, error, silent.');
    }
    return level;
}

function parseFormat(value: string): ExportFormat {
    const format = value.toLowerCase();
    if (format !== 'csv' && format !== 'table') {
        throw new InvalidArgumentError('Must be csv or table.');
    }
    return format;
}

/**
 * Only options the user actually passed, so config file and env values survive.
 */
function toCliConfig(query: string, opts: CliOptions): Partial<FetcherConfig> {
    const config: Partial<FetcherConfig> = { query };
    if (opts.email) config.email = opts.email;
    if (opts.file) config.file = opts.file;
    if (opts.maxResults) config.maxResults = opts.maxResults;
    if (opts.debug) config.logLevel = 'debug';
    else if (opts.logLevel) config.logLevel = opts.logLevel;
    if (opts.jsonLogs) config.jsonLogs = true;
    return config;
}

const program = new Command();

program
    .name('get-papers-list')
    .description('Fetch PubMed papers with at least one author affiliated with a pharmaceutical or biotech company.')
    .version(VERSION)
    .argument('<query>', 'PubMed search query (full PubMed query syntax)')
    .option('-e, --email <address>', 'Contact e-mail sent to NCBI (or set NCBI_EMAIL)')
    .option('-f, --file <path>', 'Write results to this CSV file instead of the console')
    .option('--format <format>', 'Output format: csv | table (default: csv for files, table for the console)', parseFormat)
    .option('-d, --debug', 'Print debug information during execution', false)
    .option('-m, --max-results <n>', 'Maximum number of PubMed records to retrieve', parsePositiveInt)
    .option('--log-level <level>', 'Log level: debug | info | warn | error | silent', parseLevel)
    .option('--json-logs', 'Output JSON logs', false)
    .addHelpText('after', `
Examples:
  $ get-papers-list "CAR-T cell therapy" -e you@example.com
  $ get-papers-list "alzheimer's disease therapeutics" -e you@example.com -f results.csv -d`)
    .action(async (query: string, opts: CliOptions) => {
        const config = await resolveConfig(toCliConfig(query, opts));
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        getHttpClient({ timeout: config.timeout, maxRetries: config.maxRetries, version: VERSION, email: config.email });

        const logger = getLogger();
        logger.debug({ config }, 'Resolved configuration');

        if (!config.email) {
            logger.error('A contact e-mail is required: pass --email or set NCBI_EMAIL');
            process.exitCode = 1;
            return;
        }

        try {
            const source = new PubMedClient({
                apiKey: getApiKey('NCBI_API_KEY'),
                maxResults: config.maxResults,
                toolName: config.toolName,
            });
            const rules = buildAffiliationRules(config.classifier);
            const results = await findCompanyPapers(query, config.email, { source, rules });

            if (results.length === 0) {
                logger.info('No papers with non-academic authors were found');
                return;
            }

            if (config.file) {
                exportResults(results, config.file, opts.format ?? 'csv');
            } else {
                const format = opts.format ?? 'table';
                process.stdout.write(format === 'csv' ? exportCSV(results) : exportTable(results));
            }
        } catch (error) {
            if (error instanceof RetrievalError) {
                logger.error({ stage: error.stage, cause: error.cause }, error.message);
            } else {
                logger.error({ error }, 'Search failed');
            }
            process.exitCode = 1;
        }
    });

await program.parseAsync();
