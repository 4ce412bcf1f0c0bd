import type { ClassifiedAuthor, RawArticle, ReportRow } from '../types/index.js';
import { createAffiliationClassifier, type AffiliationClassifier } from '../classify/affiliation-classifier.js';
import { extractEmail } from '../classify/email.js';

export const UNKNOWN_DATE = 'Unknown';
export const UNTITLED = 'Untitled';

function stringField(record: object, key: string): string {
    const value: unknown = Reflect.get(record, key);
    return typeof value === 'string' ? value : '';
}

/**
 * Split a multi-affiliation string ("A, Boston; B, Basel") into its affiliations.
 */
export function splitAffiliations(affiliation: string): string[] {
    return affiliation
        .split(';')
        .map((part) => part.trim())
        .filter((part) => part.length > 0);
}

/**
 * Classify each of an author's affiliations on its own; the first company
 * affiliation found decides. An academic affiliation listed alongside a
 * company one does not mask it.
 *
 * Entries that are not objects yield null. A missing or non-string name or
 * affiliation reads as "".
 */
export function classifyAuthor(author: unknown, classify: AffiliationClassifier): ClassifiedAuthor | null {
    if (typeof author !== 'object' || author === null) return null;

    const name = stringField(author, 'name');
    const affiliation = stringField(author, 'affiliation');

    for (const part of splitAffiliations(affiliation)) {
        const result = classify(part);
        if (result.isCompany) {
            return { name, affiliation, ...result };
        }
    }

    return { name, affiliation, isCompany: false, companyName: null };
}

/**
 * Run the classifier on each author, keeping author order.
 * Malformed entries are skipped.
 */
export function classifyAuthors(
    authors: readonly unknown[],
    classify: AffiliationClassifier = createAffiliationClassifier()
): ClassifiedAuthor[] {
    return authors.flatMap((author) => classifyAuthor(author, classify) ?? []);
}

/**
 * Turn one raw article into a report row.
 *
 * Returns null when no author is company-affiliated, including when the
 * record has no author list at all. Fields of the wrong type fall back to
 * defaults. The first email found, scanning authors in order, becomes the
 * corresponding email.
 */
export function normalizeArticle(
    article: RawArticle,
    classify: AffiliationClassifier = createAffiliationClassifier()
): ReportRow | null {
    if (!Array.isArray(article.authors)) return null;

    const nonAcademicAuthors = new Set<string>();
    const companyAffiliations = new Set<string>();
    let hasCompanyAuthor = false;
    let correspondingEmail: string | null = null;

    for (const author of classifyAuthors(article.authors, classify)) {
        if (author.isCompany) {
            hasCompanyAuthor = true;
            if (author.name) nonAcademicAuthors.add(author.name);
            if (author.companyName) companyAffiliations.add(author.companyName);
        }

        if (correspondingEmail === null) {
            correspondingEmail = extractEmail(author.affiliation);
        }
    }

    if (!hasCompanyAuthor) return null;

    return {
        id: String(article.id),
        title: stringField(article, 'title') || UNTITLED,
        publicationDate: stringField(article, 'publicationDate').trim() || UNKNOWN_DATE,
        nonAcademicAuthors: [...nonAcademicAuthors],
        companyAffiliations: [...companyAffiliations],
        correspondingEmail,
    };
}
