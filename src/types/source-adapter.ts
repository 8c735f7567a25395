import type { RawRecordDocument, RecordIdentifier } from './paper.js';

/**
 * A literature database the pipeline can search and fetch from.
 * PubMed is the only implementation; tests substitute in-memory stubs.
 */
export interface LiteratureSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Search for records matching a free-text query.
     * Returns identifiers in the upstream ranking order.
     */
    search(query: string, contactId: string): Promise<RecordIdentifier[]>;

    /**
     * Fetch the detailed records for a batch of identifiers in one request.
     * An empty batch yields an empty document without touching the network.
     */
    fetchRecords(ids: readonly RecordIdentifier[], contactId: string): Promise<RawRecordDocument>;
}

/**
 * Options for source initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Maximum identifiers returned by one search */
    maxResults?: number;

    /** Tool name reported to the upstream service */
    toolName?: string;
}
