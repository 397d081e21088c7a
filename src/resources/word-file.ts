import { readFileSync } from 'node:fs';
import { normalizeWord } from '../nlp/normalize.js';
import { MissingFileError } from '../utils/errors.js';

/**
 * Load a newline-delimited word file. `\r\n`, a lone `\r` and the other
 * Unicode line breaks all end a line.
 *
 * Lines that are blank after trimming or start with `#` are skipped.
 * Every other line is trimmed and, unless `caseSensitive` is set,
 * lowercased with Turkish I handling.
 */
export function loadWordFile(
    path: string,
    options: { caseSensitive?: boolean } = {}
): Set<string> {
    const { caseSensitive = false } = options;

    let raw: string;
    try {
        raw = readFileSync(path, 'utf-8');
    } catch (error) {
        throw new MissingFileError(path, { cause: error });
    }

    const words = new Set<string>();
    for (const line of raw.split(/\r\n|[\n\r\u2028\u2029\x85\v\f]/)) {
        const stripped = line.trim();
        if (!stripped || stripped.startsWith('#')) continue;
        words.add(normalizeWord(stripped, caseSensitive));
    }
    return words;
}
