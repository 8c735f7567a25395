/**
 * Barrel export for all shared types.
 */
export type {
    RecordIdentifier,
    RawRecordDocument,
    Author,
    ParsedPaper,
    PaperRecord,
    ResultSet,
    ParseSkip,
    ResultRow,
} from './paper.js';
export { DEFAULT_CONFIG, LOG_LEVELS, MAX_RESULTS_CAP } from './config.js';
export type { FetcherConfig, ClassifierConfig, LogLevel } from './config.js';
export type { LiteratureSource, SourceAdapterOptions } from './source-adapter.js';
