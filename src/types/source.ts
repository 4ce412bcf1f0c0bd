import type { RawArticle } from './article.js';

/**
 * Interface for bibliographic sources (PubMed E-utilities).
 * A source turns a query into raw article records; classification happens downstream.
 */
export interface ArticleSource {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Search for article identifiers matching a query.
     * @param maxResults - Upper bound on the number of identifiers returned
     */
    search(query: string, maxResults: number): Promise<string[]>;

    /**
     * Fetch full records for the given identifiers, in the order the source returns them.
     */
    fetchArticles(ids: string[]): Promise<RawArticle[]>;
}

/**
 * Options for source initialization.
 */
export interface ArticleSourceOptions {
    /** NCBI API key (raises the rate limit from 3 to 10 requests/s) */
    apiKey?: string;

    /** Contact email sent with every E-utilities request */
    email?: string;

    /** Tool name sent with every E-utilities request */
    tool?: string;
}
