/**
 * Shared utilities for sources.
 */

/**
 * Raised when a source answers with a payload we cannot interpret.
 */
export class SourceError extends Error {
    constructor(
        message: string,
        public readonly source: string,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'SourceError';
    }
}

export type XmlNode = Record<string, unknown>;

export function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Child element of a parsed XML node, or undefined.
 */
export function child(node: unknown, key: string): unknown {
    return isNode(node) ? node[key] : undefined;
}

/**
 * Normalize a parsed element that may occur once or many times into a list.
 */
export function asList(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
};

function fromCodePoint(codePoint: number): string | null {
    const valid = Number.isInteger(codePoint)
        && codePoint >= 0 && codePoint <= 0x10ffff
        && !(codePoint >= 0xd800 && codePoint <= 0xdfff);
    return valid ? String.fromCodePoint(codePoint) : null;
}

/**
 * Decode the XML predefined entities and numeric character references.
 * References that name no character are left as written.
 */
export function decodeEntities(text: string): string {
    return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, ref: string) => {
        if (ref.startsWith('#x') || ref.startsWith('#X')) {
            return fromCodePoint(parseInt(ref.slice(2), 16)) ?? match;
        }
        if (ref.startsWith('#')) {
            return fromCodePoint(parseInt(ref.slice(1), 10)) ?? match;
        }
        return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
    });
}

/**
 * Flatten raw element content to plain text.
 * "Role of <i>TP53</i> in\n  cancer" → "Role of TP53 in cancer"
 */
export function cleanText(raw: string): string {
    return collapseWhitespace(decodeEntities(raw.replace(/<[^>]*>/g, '')));
}

function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}

function rawText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number') return String(value);
    if (isNode(value)) return rawText(value['#text']);
    return '';
}

/**
 * Text content of a parsed element: plain strings as-is, attributed elements via `#text`.
 * The parser has already decoded entities here.
 */
export function textOf(value: unknown): string {
    return collapseWhitespace(rawText(value));
}

/**
 * Text content of a stop node, whose content the parser leaves raw:
 * inline markup is stripped and entities decoded.
 */
export function markupTextOf(value: unknown): string {
    return cleanText(rawText(value));
}

/**
 * Format a PubMed author name the way citations list it: "Last, Fore".
 * Falls back to initials, then to the last name alone.
 */
export function formatAuthorName(lastName: string, foreName: string, initials: string): string {
    if (!lastName) return foreName || initials;
    if (foreName) return `${lastName}, ${foreName}`;
    if (initials) return `${lastName}, ${initials}`;
    return lastName;
}
