import type { ArticleSource, ArticleSourceOptions, RawArticle } from '../types/index.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from '../utils/logger.js';
import { parsePubMedXml } from './pubmed-xml.js';
import { SourceError, isNode } from './utils.js';

const EUTILS_BASE = 'https://eutils.ncbi.nlm.nih.gov/entrez/eutils';

/** esearch caps retmax at 10,000 for PubMed */
const MAX_SEARCH_RESULTS = 10000;

/** IDs per efetch request; keeps GET URLs well under server limits */
const FETCH_BATCH_SIZE = 200;

const TOOL_NAME = 'pharma-papers';

export interface PubMedSourceOptions extends ArticleSourceOptions {
    cache?: ResponseCache;
}

/**
 * PubMed source backed by NCBI E-utilities (esearch + efetch).
 *
 * @see https://www.ncbi.nlm.nih.gov/books/NBK25499/
 */
export class PubMedSource implements ArticleSource {
    readonly name = 'PubMed';
    private httpClient: HttpClient;
    private readonly apiKey?: string;
    private readonly email?: string;
    private readonly tool: string;
    private readonly cache?: ResponseCache;

    constructor(options: PubMedSourceOptions = {}) {
        this.apiKey = options.apiKey;
        this.email = options.email;
        this.tool = options.tool ?? TOOL_NAME;
        this.cache = options.cache;
        this.httpClient = getHttpClient();
    }

    /**
     * For dependency injection in tests.
     */
    setHttpClient(client: HttpClient): void {
        this.httpClient = client;
    }

    /**
     * Search PubMed and return PMIDs in relevance order.
     */
    async search(query: string, maxResults: number): Promise<string[]> {
        const retmax = Math.min(Math.max(Math.floor(maxResults), 0), MAX_SEARCH_RESULTS);
        if (retmax === 0 || !query.trim()) return [];

        const params = new URLSearchParams({
            db: 'pubmed',
            term: query,
            retmax: String(retmax),
            sort: 'relevance',
            retmode: 'json',
        });

        getLogger().debug({ query, retmax }, 'PubMed esearch');
        const body = await this.getCached('esearch.fcgi', params);
        const ids = parseSearchResult(body);
        getLogger().debug({ found: ids.length }, 'PubMed esearch complete');
        return ids;
    }

    /**
     * Fetch article records, returned in the order of `ids`.
     * IDs PubMed has no record for are left out.
     */
    async fetchArticles(ids: string[]): Promise<RawArticle[]> {
        if (ids.length === 0) return [];

        const byId = new Map<string, RawArticle>();

        for (let i = 0; i < ids.length; i += FETCH_BATCH_SIZE) {
            const batch = ids.slice(i, i + FETCH_BATCH_SIZE);
            const params = new URLSearchParams({
                db: 'pubmed',
                id: batch.join(','),
                retmode: 'xml',
            });

            getLogger().debug({ batchIndex: i / FETCH_BATCH_SIZE, size: batch.length }, 'PubMed efetch');
            const body = await this.getCached('efetch.fcgi', params);
            if (typeof body !== 'string') {
                throw new SourceError('Expected XML from efetch', 'pubmed');
            }

            for (const article of parsePubMedXml(body)) {
                byId.set(article.id, article);
            }
        }

        return ids
            .map((id) => byId.get(id))
            .filter((article): article is RawArticle => article !== undefined);
    }

    // ─── Private helpers ──────────────────────────────────────

    /**
     * GET an E-utilities endpoint, going through the response cache.
     * The cache key leaves out credentials.
     */
    private async getCached(endpoint: string, params: URLSearchParams): Promise<unknown> {
        const key = `${EUTILS_BASE}/${endpoint}?${params.toString()}`;
        const cached = this.cache?.get<unknown>(key);
        if (cached !== undefined && cached !== null) return cached;

        const authed = new URLSearchParams(params);
        this.addAuthParams(authed);

        const response = await this.httpClient.get<unknown>(`${EUTILS_BASE}/${endpoint}?${authed.toString()}`, {
            source: this.apiKey ? 'eutils-keyed' : 'eutils',
        });

        this.cache?.set(key, response.data);
        return response.data;
    }

    private addAuthParams(params: URLSearchParams): void {
        params.set('tool', this.tool);
        if (this.email) {
            params.set('email', this.email);
        }
        if (this.apiKey) {
            params.set('api_key', this.apiKey);
        }
    }
}

/**
 * Extract the ID list from an esearch JSON body (parsed or still text).
 */
export function parseSearchResult(body: unknown): string[] {
    let payload = body;
    if (typeof body === 'string') {
        try {
            payload = JSON.parse(body);
        } catch (error) {
            throw new SourceError('Malformed esearch response', 'pubmed', error);
        }
    }

    const result = isNode(payload) ? payload['esearchresult'] : undefined;
    if (!isNode(result)) {
        throw new SourceError('esearch response has no esearchresult', 'pubmed');
    }

    const error = result['ERROR'];
    if (typeof error === 'string' && error) {
        throw new SourceError(`PubMed search failed: ${error}`, 'pubmed');
    }

    const idList = result['idlist'];
    if (!Array.isArray(idList)) return [];
    return idList.filter((id): id is string => typeof id === 'string');
}
