/**
 * Article records as delivered by a source, before classification.
 * Fields a source could not find are left absent rather than guessed.
 */
export interface RawAuthor {
    /** Display name, e.g. "Iafusco, Fernanda" */
    name: string;

    /** Free-text affiliation. Multiple affiliations are joined with "; ". */
    affiliation?: string | null;
}

export interface RawArticle {
    /** Source identifier (PubMed PMID as text) */
    id: string;

    title: string;

    /** Partial dates such as "2022 Mar" are kept as-is */
    publicationDate?: string | null;

    /** Absent when the record carries no author list at all */
    authors?: RawAuthor[] | null;
}

/**
 * Result of running the affiliation classifier on one string.
 */
export interface AffiliationClassification {
    isCompany: boolean;
    companyName: string | null;
}

export interface ClassifiedAuthor extends AffiliationClassification {
    name: string;
    affiliation: string;
}

/**
 * One report line per article with at least one company-affiliated author.
 */
export interface ReportRow {
    id: string;
    title: string;
    publicationDate: string;

    /** Unique, in order of first appearance */
    nonAcademicAuthors: string[];

    /** Unique, in order of first appearance */
    companyAffiliations: string[];

    correspondingEmail: string | null;
}
