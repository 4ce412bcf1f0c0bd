#!/usr/bin/env node
import { Command } from 'commander';
import { resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { buildReport } from '../pipeline/report-builder.js';
import { isReportFormat, renderReport, writeReport, REPORT_FORMATS } from '../exporters/report.js';
import { clearCacheDir, inspectCacheDir } from '../cache/response-cache.js';
import { DEFAULT_CONFIG, type LogLevel, type PharmaPapersConfig } from '../types/index.js';

const VERSION = '1.0.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface SearchOptions {
    file?: string;
    max?: string;
    debug?: boolean;
    format?: string;
    email?: string;
    logLevel?: string;
    jsonLogs?: boolean;
    cache: boolean;
    cacheDir?: string;
}

function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

const program: Command = new Command();

program
    .name('pharma-papers')
    .description('Find PubMed papers with at least one author affiliated with a pharmaceutical or biotech company.')
    .version(VERSION);

// ─── SEARCH (default command) ─────────────────────────────

program
    .argument('<query>', 'PubMed search query (full PubMed query syntax)')
    .option('-f, --file <path>', 'Save results to this file instead of printing them')
    .option('-m, --max <n>', `Maximum number of papers to retrieve (default: ${DEFAULT_CONFIG.maxResults})`)
    .option('-d, --debug', 'Print debug information during execution')
    .option('--format <format>', `Output format: ${REPORT_FORMATS.join(' | ')}`)
    .option('--email <address>', 'Contact email sent to NCBI (or NCBI_EMAIL)')
    .option('--log-level <level>', `Log level: ${LOG_LEVELS.join(' | ')}`)
    .option('--json-logs', 'Output JSON logs')
    .option('--cache-dir <path>', 'Response cache directory')
    .option('--no-cache', 'Disable response caching')
    .action(async (query: string, opts: SearchOptions) => {
        const cliConfig: Partial<PharmaPapersConfig> & Pick<PharmaPapersConfig, 'query'> = { query };

        if (opts.max !== undefined) {
            const max = Number(opts.max);
            if (!Number.isInteger(max) || max < 1) {
                program.error(`Invalid --max: ${opts.max}. Expected a positive integer.`);
            }
            cliConfig.maxResults = max;
        }
        if (opts.format !== undefined) {
            const format = opts.format.toLowerCase();
            if (!isReportFormat(format)) {
                program.error(`Invalid format: ${opts.format}. Valid: ${REPORT_FORMATS.join(', ')}`);
            }
            cliConfig.format = format;
        }
        if (opts.logLevel !== undefined) {
            if (!isLogLevel(opts.logLevel)) {
                program.error(`Invalid log level: ${opts.logLevel}. Valid: ${LOG_LEVELS.join(', ')}`);
            }
            cliConfig.logLevel = opts.logLevel;
        }
        if (opts.debug) cliConfig.logLevel = 'debug';
        if (opts.file !== undefined) cliConfig.file = opts.file;
        if (opts.email !== undefined) cliConfig.email = opts.email;
        if (opts.jsonLogs) cliConfig.jsonLogs = true;
        if (opts.cacheDir !== undefined) cliConfig.cacheDir = opts.cacheDir;
        if (!opts.cache) cliConfig.noCache = true;

        const config = await resolveConfig(cliConfig);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const httpClient = getHttpClient({ timeout: 30000, version: VERSION, email: config.email });

        const logger = getLogger();

        try {
            const { rows } = await buildReport(config);

            if (rows.length === 0) {
                console.log('No papers with pharmaceutical/biotech company affiliations found.');
                return;
            }

            if (config.file) {
                writeReport(rows, config.file, config.format);
                console.log(`Results saved to ${config.file} (${rows.length} papers)`);
            } else {
                process.stdout.write(renderReport(rows, config.format));
                logger.info({ papers: rows.length }, 'Total papers with pharmaceutical/biotech company affiliations');
            }
        } catch (error) {
            logger.error({ error }, 'Search failed');
            process.exitCode = 1;
        } finally {
            logger.debug({ requests: httpClient.getAllRequestCounts() }, 'HTTP requests made');
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the response cache')
    .argument('<action>', 'Action: clear | stats')
    .option('--cache-dir <path>', 'Response cache directory', DEFAULT_CONFIG.cacheDir)
    .action((action: string, opts: { cacheDir: string }) => {
        switch (action) {
            case 'clear':
                console.log(clearCacheDir(opts.cacheDir) ? 'Cache cleared.' : 'No cache to clear.');
                break;
            case 'stats': {
                const stats = inspectCacheDir(opts.cacheDir);
                console.log(stats
                    ? `Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`
                    : 'No cache found.');
                break;
            }
            default:
                program.error(`Unknown action: ${action}. Valid: clear, stats`);
        }
    });

await program.parseAsync();
