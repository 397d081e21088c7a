/**
 * Word pattern: letters and digits, with apostrophes or hyphens allowed
 * between them (`Ankara'da`, `e-posta`).
 */
const WORD_PATTERN = /[\p{L}\p{N}]+(?:['’-][\p{L}\p{N}]+)*/gu;

/**
 * Tokenize text into word tokens.
 * - Split on whitespace and punctuation
 * - Keep original casing (stopword checks normalize on their own)
 * - Deterministic, no stemming
 */
export function tokenize(text: string | null | undefined): string[] {
    if (!text) return [];
    return text.match(WORD_PATTERN) ?? [];
}
