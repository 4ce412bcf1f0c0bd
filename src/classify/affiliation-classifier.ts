import type { AffiliationClassification } from '../types/index.js';
import { loadDefaultLexicon, type Lexicon } from './lexicon.js';

/**
 * An affiliation string alongside its case-folded form.
 * Both have the same length so indices found in `lower` slice `original`.
 */
export interface AffiliationText {
    original: string;
    lower: string;
}

export type AffiliationRuleName = 'known-company' | 'academic' | 'industry-keyword';

/**
 * One step of the classification pipeline.
 * `match` returns an outcome when the rule fires, or null to fall through to the next rule.
 */
export interface AffiliationRule {
    readonly name: AffiliationRuleName;
    match(text: AffiliationText, lexicon: Lexicon): AffiliationClassification | null;
}

export type AffiliationClassifier = (affiliation: unknown) => AffiliationClassification;

const SEGMENT_DELIMITER = /[,;]/;

function notCompany(): AffiliationClassification {
    return { isCompany: false, companyName: null };
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercase without changing string length, so match offsets stay valid
 * for the original text.
 */
export function foldCase(text: string): string {
    return Array.from(text, (ch) => {
        const lower = ch.toLowerCase();
        return lower.length === ch.length ? lower : ch;
    }).join('');
}

/**
 * Return the comma/semicolon-delimited segment of `text` that contains `index`, trimmed.
 */
export function segmentAt(text: string, index: number): string {
    const start = Math.max(text.lastIndexOf(',', index), text.lastIndexOf(';', index)) + 1;
    const offset = text.slice(index).search(SEGMENT_DELIMITER);
    const end = offset === -1 ? text.length : index + offset;
    return text.slice(start, end).trim();
}

/**
 * Leftmost plain substring hit of any entry, or -1.
 */
export function findSubstring(lower: string, entries: readonly string[]): number {
    let best = -1;
    for (const entry of entries) {
        const index = lower.indexOf(entry);
        if (index !== -1 && (best === -1 || index < best)) {
            best = index;
        }
    }
    return best;
}

// Compiled pattern per frozen lexicon list
const wholeWordPatterns = new WeakMap<readonly string[], RegExp>();

function compile(entries: readonly string[]): RegExp | null {
    const cached = wholeWordPatterns.get(entries);
    if (cached) return cached;
    if (entries.length === 0) return null;

    const alternatives = [...entries]
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join('|');
    const pattern = new RegExp(`(?<![\\p{L}\\p{N}])(?:${alternatives})(?![\\p{L}\\p{N}])`, 'u');
    wholeWordPatterns.set(entries, pattern);
    return pattern;
}

/**
 * Leftmost hit of an entry standing as a whole word, or -1.
 */
export function findWholeWord(lower: string, entries: readonly string[]): number {
    const pattern = compile(entries);
    return pattern ? lower.search(pattern) : -1;
}

const knownCompanyRule: AffiliationRule = {
    name: 'known-company',
    match({ original, lower }, lexicon) {
        const index = findSubstring(lower, lexicon.knownCompanies);
        if (index === -1) return null;
        return { isCompany: true, companyName: segmentAt(original, index) };
    },
};

// Runs before the industry keywords: "University Biotech Center" stays academic.
const academicRule: AffiliationRule = {
    name: 'academic',
    match({ lower }, lexicon) {
        return findSubstring(lower, lexicon.academicKeywords) === -1 ? null : notCompany();
    },
};

const industryKeywordRule: AffiliationRule = {
    name: 'industry-keyword',
    match({ original, lower }, lexicon) {
        const hits = [
            findSubstring(lower, lexicon.industryKeywords),
            // Whole words only: "inc" must not fire inside "Princeton"
            findWholeWord(lower, lexicon.corporateSuffixes),
        ].filter((index) => index !== -1);
        if (hits.length === 0) return null;
        return { isCompany: true, companyName: segmentAt(original, Math.min(...hits)) };
    },
};

/**
 * Classification rules in precedence order. The first rule that fires decides.
 */
export const AFFILIATION_RULES: readonly AffiliationRule[] = Object.freeze([
    knownCompanyRule,
    academicRule,
    industryKeywordRule,
]);

/**
 * Decide whether an affiliation belongs to a pharmaceutical/biotech company
 * and pull out the segment naming it.
 *
 * Anything that is not a non-blank string is treated as an empty affiliation.
 */
export function classifyAffiliation(
    affiliation: unknown,
    lexicon: Lexicon = loadDefaultLexicon(),
    rules: readonly AffiliationRule[] = AFFILIATION_RULES
): AffiliationClassification {
    const original = typeof affiliation === 'string' ? affiliation : '';
    if (!original.trim()) return notCompany();

    const text: AffiliationText = { original, lower: foldCase(original) };
    for (const rule of rules) {
        const outcome = rule.match(text, lexicon);
        if (outcome) return outcome;
    }

    return notCompany();
}

/**
 * Bind a lexicon once and reuse it for every author of a run.
 */
export function createAffiliationClassifier(lexicon: Lexicon = loadDefaultLexicon()): AffiliationClassifier {
    return (affiliation) => classifyAffiliation(affiliation, lexicon);
}
