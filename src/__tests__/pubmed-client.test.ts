import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { PubMedClient, EUTILS_BASE, checkFetchResponse, parseSearchResponse } from '../sources/pubmed.js';
import { RetrievalError } from '../pipeline/errors.js';
import { createHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { articleSetXml, articleXml } from './helpers/pubmed-xml.js';

type FetchMock = (url: string, init?: RequestInit) => Promise<Response>;

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

function xmlResponse(body: string, status = 200): Response {
    return new Response(body, { status, headers: { 'content-type': 'text/xml' } });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (error) {
        return error;
    }
    throw new Error('Expected the promise to reject');
}

describe('PubMedClient', () => {
    let fetchMock: Mock<FetchMock>;
    let http: HttpClient;

    function makeClient(options: ConstructorParameters<typeof PubMedClient>[0] = {}): PubMedClient {
        const client = new PubMedClient(options);
        client.setHttpClient(http);
        return client;
    }

    function requestAt(index: number): { url: URL; init: RequestInit | undefined } {
        const call = fetchMock.mock.calls[index];
        if (!call) throw new Error(`No request #${index}`);
        return { url: new URL(call[0]), init: call[1] };
    }

    beforeEach(() => {
        vi.stubEnv('NCBI_API_KEY', '');
        fetchMock = vi.fn<FetchMock>();
        vi.stubGlobal('fetch', fetchMock);
        http = createHttpClient({ maxRetries: 0 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
        vi.unstubAllEnvs();
    });

    describe('search', () => {
        it('should send the query and identity parameters to ESearch', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { count: '2', idlist: ['38000001', '38000002'] } }));

            const ids = await makeClient({ maxResults: 25 }).search('CAR-T cell therapy', 'test@example.com');

            expect(ids).toEqual(['38000001', '38000002']);
            const { url, init } = requestAt(0);
            expect(`${url.origin}${url.pathname}`).toBe(`${EUTILS_BASE}/esearch.fcgi`);
            expect(url.searchParams.get('db')).toBe('pubmed');
            expect(url.searchParams.get('term')).toBe('CAR-T cell therapy');
            expect(url.searchParams.get('retmode')).toBe('json');
            expect(url.searchParams.get('retmax')).toBe('25');
            expect(url.searchParams.get('tool')).toBe('pubmed-company-papers');
            expect(url.searchParams.get('email')).toBe('test@example.com');
            expect(url.searchParams.has('api_key')).toBe(false);
            expect(init?.method).toBe('GET');
        });

        it('should return an empty list when idlist is missing', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { count: '0' } }));

            await expect(makeClient().search('nothing matches this', 'test@example.com')).resolves.toEqual([]);
        });

        it('should wrap HTTP failures in a search RetrievalError', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'internal' }, 500));

            const error = await captureError(makeClient().search('cancer', 'test@example.com'));

            expect(error).toBeInstanceOf(RetrievalError);
            if (!(error instanceof RetrievalError)) return;
            expect(error.stage).toBe('search');
            expect(error.cause).toBeInstanceOf(HttpError);
            expect(error.cause).toMatchObject({ status: 500 });
        });

        it('should reject a body that is not JSON', async () => {
            fetchMock.mockResolvedValueOnce(xmlResponse('<html>Service unavailable</html>'));

            const error = await captureError(makeClient().search('cancer', 'test@example.com'));

            expect(error).toBeInstanceOf(RetrievalError);
            expect(error).toMatchObject({ stage: 'search' });
            expect(error).toHaveProperty('cause', expect.any(SyntaxError));
        });

        it('should surface an upstream ERROR field', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { ERROR: 'Invalid query syntax' } }));

            await expect(makeClient().search('((', 'test@example.com')).rejects.toThrow(
                'search request failed: Invalid query syntax'
            );
        });

        it('should cap retmax at the ESearch page limit', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { idlist: [] } }));

            await makeClient({ maxResults: 50000 }).search('cancer', 'test@example.com');

            expect(requestAt(0).url.searchParams.get('retmax')).toBe('10000');
        });

        it('should send the API key and use the faster rate limit', async () => {
            fetchMock.mockResolvedValueOnce(jsonResponse({ esearchresult: { idlist: ['1'] } }));

            await makeClient({ apiKey: 'test-key' }).search('cancer', 'test@example.com');

            expect(requestAt(0).url.searchParams.get('api_key')).toBe('test-key');
            expect(http.getRequestCount('pubmed-key')).toBe(1);
            expect(http.getRequestCount('pubmed')).toBe(0);
        });
    });

    describe('fetchRecords', () => {
        it('should not call the network for an empty id list', async () => {
            await expect(makeClient().fetchRecords([], 'test@example.com')).resolves.toBe('');
            expect(fetchMock).not.toHaveBeenCalled();
        });

        it('should POST all ids in one EFetch request', async () => {
            const document = articleSetXml(articleXml({ pmid: '1', title: 'One' }));
            fetchMock.mockResolvedValueOnce(xmlResponse(document));

            const xml = await makeClient().fetchRecords(['1', '2', '3'], 'test@example.com');

            expect(xml).toBe(document);
            expect(fetchMock).toHaveBeenCalledTimes(1);
            const { url, init } = requestAt(0);
            expect(url.toString()).toBe(`${EUTILS_BASE}/efetch.fcgi`);
            expect(init?.method).toBe('POST');
            expect(new Headers(init?.headers).get('content-type')).toBe('application/x-www-form-urlencoded');

            const form = new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
            expect(form.get('db')).toBe('pubmed');
            expect(form.get('id')).toBe('1,2,3');
            expect(form.get('retmode')).toBe('xml');
            expect(form.get('email')).toBe('test@example.com');
        });

        it('should reject an error payload', async () => {
            fetchMock.mockResolvedValueOnce(xmlResponse('<eFetchResult><ERROR>Cannot retrieve records</ERROR></eFetchResult>'));

            const error = await captureError(makeClient().fetchRecords(['1'], 'test@example.com'));

            expect(error).toBeInstanceOf(RetrievalError);
            expect(error).toMatchObject({ stage: 'fetch', message: 'fetch request failed: Cannot retrieve records' });
        });

        it('should wrap HTTP failures in a fetch RetrievalError', async () => {
            fetchMock.mockResolvedValueOnce(xmlResponse('Bad Gateway', 502));

            const error = await captureError(makeClient().fetchRecords(['1'], 'test@example.com'));

            expect(error).toMatchObject({ stage: 'fetch' });
            expect(error).toHaveProperty('cause', expect.any(HttpError));
        });
    });
});

describe('parseSearchResponse', () => {
    it('should stringify numeric ids', () => {
        expect(parseSearchResponse('{"esearchresult":{"idlist":[123,"456"]}}')).toEqual(['123', '456']);
    });

    it('should reject responses without esearchresult', () => {
        expect(() => parseSearchResponse('{"header":{}}')).toThrow("search request failed: response has no 'esearchresult'");
        expect(() => parseSearchResponse('[]')).toThrow('search request failed: response is not a JSON object');
    });

    it('should reject a non-array idlist', () => {
        expect(() => parseSearchResponse('{"esearchresult":{"idlist":"1,2"}}')).toThrow(RetrievalError);
    });

    it('should surface a top-level error', () => {
        expect(() => parseSearchResponse('{"error":"API key invalid"}')).toThrow('search request failed: API key invalid');
    });
});

describe('checkFetchResponse', () => {
    it('should accept a record set', () => {
        expect(() => checkFetchResponse(articleSetXml(articleXml({ pmid: '1' })))).not.toThrow();
    });

    it('should reject an empty body', () => {
        expect(() => checkFetchResponse('  ')).toThrow('fetch request failed: empty response body');
    });

    it('should reject malformed XML', () => {
        expect(() => checkFetchResponse('<PubmedArticleSet><PubmedArticle></PubmedArticleSet>')).toThrow(
            /^fetch request failed: malformed XML at line 1:/
        );
    });
});
