/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Report output formats.
 */
export type ReportFormat = 'csv' | 'json';

/**
 * Keyword lists used by the affiliation classifier.
 * Entries are matched case-insensitively.
 */
export interface LexiconInput {
    knownCompanies: string[];
    academicKeywords: string[];
    industryKeywords: string[];
    corporateSuffixes: string[];
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PharmaPapersConfig {
    // Input
    query: string;
    maxResults: number;

    // Output
    file?: string;
    format: ReportFormat;

    // PubMed
    email?: string;
    apiKey?: string;

    // Cache
    cacheDir: string;
    noCache: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    /** Entries added on top of the bundled lexicon */
    lexicon: Partial<LexiconInput>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: Omit<PharmaPapersConfig, 'query'> = {
    maxResults: 100,
    format: 'csv',
    cacheDir: '.pharma-papers-cache',
    noCache: false,
    logLevel: 'info',
    jsonLogs: false,
    lexicon: {},
};
