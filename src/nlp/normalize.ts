import { ConfigurationError } from '../utils/errors.js';

/**
 * Letters whose default Unicode case mapping is wrong for Turkish.
 * `İ`.toLowerCase() yields `i` plus a combining dot, and `I` must become `ı`.
 */
const TURKISH_LOWER: ReadonlyArray<[string, string]> = [
    ['I', 'ı'],
    ['İ', 'i'],
    ['Â', 'â'],
    ['Î', 'î'],
    ['Û', 'û'],
];

const TURKISH_UPPER: ReadonlyArray<[string, string]> = [
    ['i', 'İ'],
    ['ı', 'I'],
    ['â', 'Â'],
    ['î', 'Î'],
    ['û', 'Û'],
];

function replacePairs(text: string, pairs: ReadonlyArray<[string, string]>): string {
    let result = text;
    for (const [from, to] of pairs) {
        result = result.replaceAll(from, to);
    }
    return result;
}

/**
 * Change the case of text with Turkish dotted/undotted I handling.
 */
export function normalizeCase(text: string, mode: string = 'lower'): string {
    if (!text || mode === 'none') return text;

    switch (mode) {
        case 'lower':
            return replacePairs(text, TURKISH_LOWER).toLowerCase();
        case 'upper':
            return replacePairs(text, TURKISH_UPPER).toUpperCase();
        default:
            throw new ConfigurationError(
                `Unsupported case mode '${mode}'. Expected 'lower', 'upper', or 'none'.`
            );
    }
}

/**
 * Normalize a word for stopword comparison: verbatim when case-sensitive,
 * otherwise Turkish-aware lowercase.
 */
export function normalizeWord(word: string, caseSensitive: boolean): string {
    return caseSensitive ? word : normalizeCase(word, 'lower');
}
