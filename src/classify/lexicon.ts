import { readFileSync } from 'node:fs';
import type { LexiconInput } from '../types/index.js';

/**
 * Immutable keyword configuration for the affiliation classifier.
 * All entries are lowercase, trimmed and unique.
 */
export interface Lexicon {
    readonly knownCompanies: readonly string[];
    readonly academicKeywords: readonly string[];
    readonly industryKeywords: readonly string[];
    readonly corporateSuffixes: readonly string[];
}

/**
 * Anything shaped like a lexicon, possibly partial: config input or an existing Lexicon.
 */
export type LexiconEntries = { readonly [K in keyof LexiconInput]?: readonly string[] };

const LEXICON_KEYS = ['knownCompanies', 'academicKeywords', 'industryKeywords', 'corporateSuffixes'] as const;

const DEFAULT_LEXICON_URL = new URL('../../data/lexicon.json', import.meta.url);

let defaultLexicon: Lexicon | null = null;

function cleanEntries(...lists: Array<readonly string[] | undefined>): readonly string[] {
    const seen = new Set<string>();
    for (const list of lists) {
        for (const entry of list ?? []) {
            const cleaned = entry.trim().toLowerCase();
            if (cleaned) seen.add(cleaned);
        }
    }
    return Object.freeze([...seen]);
}

/**
 * Build a lexicon from keyword lists. Entries in `extra` are appended to `base`.
 */
export function createLexicon(base: LexiconEntries, extra: LexiconEntries = {}): Lexicon {
    return Object.freeze({
        knownCompanies: cleanEntries(base.knownCompanies, extra.knownCompanies),
        academicKeywords: cleanEntries(base.academicKeywords, extra.academicKeywords),
        industryKeywords: cleanEntries(base.industryKeywords, extra.industryKeywords),
        corporateSuffixes: cleanEntries(base.corporateSuffixes, extra.corporateSuffixes),
    });
}

/**
 * Validate parsed JSON against the lexicon shape. Missing keys become empty lists.
 */
export function parseLexiconInput(value: unknown): Partial<LexiconInput> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new TypeError('Lexicon must be a JSON object');
    }

    const input: Partial<LexiconInput> = {};
    for (const key of LEXICON_KEYS) {
        const list: unknown = Reflect.get(value, key);
        if (list === undefined) continue;
        if (!Array.isArray(list) || !list.every((item): item is string => typeof item === 'string')) {
            throw new TypeError(`Lexicon field "${key}" must be an array of strings`);
        }
        input[key] = list;
    }
    return input;
}

/**
 * The bundled lexicon from data/lexicon.json, read once per process.
 */
export function loadDefaultLexicon(): Lexicon {
    if (!defaultLexicon) {
        const raw: unknown = JSON.parse(readFileSync(DEFAULT_LEXICON_URL, 'utf-8'));
        defaultLexicon = createLexicon(parseLexiconInput(raw));
    }
    return defaultLexicon;
}
