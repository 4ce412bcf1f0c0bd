/**
 * Barrel export for all shared types.
 */
export type {
    RawAuthor,
    RawArticle,
    AffiliationClassification,
    ClassifiedAuthor,
    ReportRow,
} from './article.js';
export { DEFAULT_CONFIG } from './config.js';
export type { PharmaPapersConfig, LogLevel, ReportFormat, LexiconInput } from './config.js';
export type { ArticleSource, ArticleSourceOptions } from './source.js';
