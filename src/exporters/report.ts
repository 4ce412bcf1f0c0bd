import { writeFileSync } from 'node:fs';
import type { ReportFormat, ReportRow } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

export const REPORT_FORMATS: readonly ReportFormat[] = ['csv', 'json'];

/**
 * Fixed column order of the report.
 */
export const REPORT_COLUMNS = [
    'PubmedID',
    'Title',
    'Publication Date',
    'Non-academic Author(s)',
    'Company Affiliation(s)',
    'Corresponding Author Email',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

const LIST_SEPARATOR = '; ';

export function isReportFormat(value: string): value is ReportFormat {
    return (REPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * Flatten a row into column → cell text.
 */
export function toRecord(row: ReportRow): Record<ReportColumn, string> {
    return {
        'PubmedID': row.id,
        'Title': row.title,
        'Publication Date': row.publicationDate,
        'Non-academic Author(s)': row.nonAcademicAuthors.join(LIST_SEPARATOR),
        'Company Affiliation(s)': row.companyAffiliations.join(LIST_SEPARATOR),
        'Corresponding Author Email': row.correspondingEmail ?? '',
    };
}

/**
 * Quote a CSV cell only when it contains a comma, quote, or line break.
 */
export function csvCell(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function renderCsv(rows: readonly ReportRow[]): string {
    const lines = [REPORT_COLUMNS.map(csvCell).join(',')];
    for (const row of rows) {
        const record = toRecord(row);
        lines.push(REPORT_COLUMNS.map((column) => csvCell(record[column])).join(','));
    }
    return lines.join('\n') + '\n';
}

function renderJson(rows: readonly ReportRow[]): string {
    return JSON.stringify({
        exported_at: new Date().toISOString(),
        count: rows.length,
        papers: rows.map((row) => ({
            pubmed_id: row.id,
            title: row.title,
            publication_date: row.publicationDate,
            non_academic_authors: row.nonAcademicAuthors,
            company_affiliations: row.companyAffiliations,
            corresponding_email: row.correspondingEmail,
        })),
    }, null, 2) + '\n';
}

export function renderReport(rows: readonly ReportRow[], format: ReportFormat): string {
    switch (format) {
        case 'csv':
            return renderCsv(rows);
        case 'json':
            return renderJson(rows);
    }
}

/**
 * Write the report to a file.
 */
export function writeReport(rows: readonly ReportRow[], outputPath: string, format: ReportFormat): void {
    writeFileSync(outputPath, renderReport(rows, format), 'utf-8');
    getLogger().info({ format, outputPath, papers: rows.length }, 'Report written');
}
