import type { ArticleSource, PharmaPapersConfig, RawArticle, ReportRow } from '../types/index.js';
import { createAffiliationClassifier, type AffiliationClassifier } from '../classify/affiliation-classifier.js';
import { createLexicon, loadDefaultLexicon } from '../classify/lexicon.js';
import { PubMedSource } from '../sources/pubmed.js';
import { ResponseCache } from '../cache/response-cache.js';
import { getLogger } from '../utils/logger.js';
import { normalizeArticle } from './normalizer.js';

export interface ReportResult {
    rows: ReportRow[];
    /** IDs returned by the search */
    searched: number;
    /** Records actually fetched */
    fetched: number;
}

/**
 * Normalize articles one at a time, in delivery order.
 * Articles without a company-affiliated author produce no row.
 */
export function collectReportRows(
    articles: Iterable<RawArticle>,
    classify: AffiliationClassifier = createAffiliationClassifier()
): ReportRow[] {
    const logger = getLogger();
    const rows: ReportRow[] = [];

    let index = 0;
    for (const article of articles) {
        index++;
        const row = normalizeArticle(article, classify);
        if (row) {
            rows.push(row);
            logger.debug({ index, id: row.id, companies: row.companyAffiliations }, 'Article has company affiliation');
        } else {
            logger.debug({ index, id: article.id }, 'No company-affiliated author, skipping');
        }
    }

    return rows;
}

/**
 * Build the classifier for a run: bundled lexicon plus any entries from config.
 */
export function classifierFromConfig(config: Pick<PharmaPapersConfig, 'lexicon'>): AffiliationClassifier {
    return createAffiliationClassifier(createLexicon(loadDefaultLexicon(), config.lexicon));
}

/**
 * Full run:
 *
 * 1. Search the source for the query
 * 2. Fetch records for the matching IDs
 * 3. Classify authors and keep articles with company affiliations
 */
export async function buildReport(config: PharmaPapersConfig, source?: ArticleSource): Promise<ReportResult> {
    const logger = getLogger();
    const articleSource = source ?? new PubMedSource({
        apiKey: config.apiKey,
        email: config.email,
        cache: new ResponseCache({ cacheDir: config.cacheDir, enabled: !config.noCache }),
    });

    logger.info({ query: config.query, maxResults: config.maxResults, source: articleSource.name }, 'Searching');
    const startTime = Date.now();

    const ids = await articleSource.search(config.query, config.maxResults);
    logger.info({ found: ids.length }, 'Search complete');

    if (ids.length === 0) {
        return { rows: [], searched: 0, fetched: 0 };
    }

    const articles = await articleSource.fetchArticles(ids);
    logger.info({ fetched: articles.length }, 'Records fetched');

    const rows = collectReportRows(articles, classifierFromConfig(config));

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    logger.info({ rows: rows.length, elapsed: `${elapsed}s` }, 'Report built');

    return { rows, searched: ids.length, fetched: articles.length };
}
