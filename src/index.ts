/**
 * Library entry point. The CLI lives in cli/index.ts.
 */
export {
    classifyAffiliation,
    createAffiliationClassifier,
    AFFILIATION_RULES,
    type AffiliationClassifier,
    type AffiliationRule,
} from './classify/affiliation-classifier.js';
export { extractEmail } from './classify/email.js';
export { createLexicon, loadDefaultLexicon, parseLexiconInput, type Lexicon } from './classify/lexicon.js';
export { normalizeArticle, classifyAuthors, UNKNOWN_DATE, UNTITLED } from './pipeline/normalizer.js';
export { collectReportRows, buildReport, classifierFromConfig, type ReportResult } from './pipeline/report-builder.js';
export { PubMedSource, type PubMedSourceOptions } from './sources/pubmed.js';
export { parsePubMedXml } from './sources/pubmed-xml.js';
export { SourceError } from './sources/utils.js';
export { HttpError } from './utils/http-client.js';
export { renderReport, writeReport, REPORT_COLUMNS } from './exporters/report.js';
export * from './types/index.js';
