/**
 * local@domain.tld with at least one dot after the @ and an alphabetic TLD.
 * The lookbehind keeps a match from starting in the middle of a token.
 */
const EMAIL_PATTERN = /(?<![A-Za-z0-9._%+-])[A-Za-z0-9_%+-][A-Za-z0-9._%+-]*@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}\b/;

/**
 * Return the first email address in `text`, scanning left to right, or null.
 * Case is preserved; trailing sentence punctuation is not part of the match.
 */
export function extractEmail(text: unknown): string | null {
    if (typeof text !== 'string' || !text.includes('@')) return null;
    return text.match(EMAIL_PATTERN)?.[0] ?? null;
}
