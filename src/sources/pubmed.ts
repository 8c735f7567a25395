import { XMLValidator } from 'fast-xml-parser';
import type {
    LiteratureSource,
    RawRecordDocument,
    RecordIdentifier,
    SourceAdapterOptions,
} from '../types/index.js';
import { DEFAULT_CONFIG, MAX_RESULTS_CAP } from '../types/index.js';
import { RetrievalError } from '../pipeline/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

export const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/**
 * PubMed source over NCBI E-utilities: ESearch for PMIDs, one batched EFetch
 * for the full records.
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedClient implements LiteratureSource {
    readonly name = 'PubMed';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly maxResults: number;
    private readonly toolName: string;

    constructor(options?: SourceAdapterOptions) {
        this.apiKey = options?.apiKey ?? process.env['NCBI_API_KEY'];
        this.maxResults = Math.min(Math.max(1, options?.maxResults ?? DEFAULT_CONFIG.maxResults), MAX_RESULTS_CAP);
        this.toolName = options?.toolName ?? DEFAULT_CONFIG.toolName;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    async search(query: string, contactId: string): Promise<RecordIdentifier[]> {
        const params = new URLSearchParams({
            db: 'pubmed',
            term: query,
            retmode: 'json',
            retmax: String(this.maxResults),
        });
        this.addIdentityParams(params, contactId);

        const url = `${EUTILS_BASE}/esearch.fcgi?${params.toString()}`;
        getLogger().debug({ query, retmax: this.maxResults }, 'PubMed ESearch');

        let body: string;
        try {
            const response = await this.httpClient.get<string>(url, {
                source: this.rateLimitSource,
                responseType: 'text',
            });
            body = response.data;
        } catch (error) {
            throw new RetrievalError('search', error);
        }

        const ids = parseSearchResponse(body);
        getLogger().info({ found: ids.length }, 'PubMed search complete');
        return ids;
    }

    async fetchRecords(ids: readonly RecordIdentifier[], contactId: string): Promise<RawRecordDocument> {
        if (ids.length === 0) {
            getLogger().debug('No identifiers to fetch, skipping EFetch');
            return '';
        }

        // POST keeps long ID lists out of the URL
        const form = new URLSearchParams({
            db: 'pubmed',
            id: ids.join(','),
            retmode: 'xml',
        });
        this.addIdentityParams(form, contactId);

        getLogger().debug({ count: ids.length }, 'PubMed EFetch');

        let xml: string;
        try {
            const response = await this.httpClient.post<string>(`${EUTILS_BASE}/efetch.fcgi`, form.toString(), {
                source: this.rateLimitSource,
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                responseType: 'text',
            });
            xml = response.data;
        } catch (error) {
            throw new RetrievalError('fetch', error);
        }

        checkFetchResponse(xml);
        getLogger().info({ requested: ids.length, bytes: xml.length }, 'PubMed records fetched');
        return xml;
    }

    private get rateLimitSource(): string {
        return this.apiKey ? 'pubmed-key' : 'pubmed';
    }

    private addIdentityParams(params: URLSearchParams, contactId: string): void {
        params.set('tool', this.toolName);
        params.set('email', contactId);
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
    }
}

/**
 * Pull the ID list out of an ESearch JSON body.
 * A well-formed response without `idlist` means no hits.
 */
export function parseSearchResponse(body: string): RecordIdentifier[] {
    let data: unknown;
    try {
        data = JSON.parse(body);
    } catch (error) {
        throw new RetrievalError('search', error);
    }

    if (!isRecord(data)) {
        throw new RetrievalError('search', new Error('response is not a JSON object'));
    }
    if (typeof data['error'] === 'string' && data['error']) {
        throw new RetrievalError('search', new Error(data['error']));
    }

    const result = data['esearchresult'];
    if (!isRecord(result)) {
        throw new RetrievalError('search', new Error("response has no 'esearchresult'"));
    }
    if (typeof result['ERROR'] === 'string' && result['ERROR']) {
        throw new RetrievalError('search', new Error(result['ERROR']));
    }

    const idList = result['idlist'] ?? [];
    if (!Array.isArray(idList)) {
        throw new RetrievalError('search', new Error("'idlist' is not an array"));
    }

    return idList
        .filter((id): id is string | number => typeof id === 'string' || typeof id === 'number')
        .map((id) => String(id));
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reject bodies that are not a record set: malformed XML or an error payload.
 */
export function checkFetchResponse(xml: string): void {
    if (!xml.trim()) {
        throw new RetrievalError('fetch', new Error('empty response body'));
    }

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { msg, line } = validation.err;
        throw new RetrievalError('fetch', new Error(`malformed XML at line ${line}: ${msg}`));
    }

    const upstreamError = xml.match(/<ERROR>([\s\S]*?)<\/ERROR>/);
    if (upstreamError) {
        throw new RetrievalError('fetch', new Error(upstreamError[1]?.trim() || 'upstream error'));
    }
}
