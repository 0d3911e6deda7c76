/**
 * Splits a TOON tabular row into its fields.
 *
 * IMPORTANT: All row and field-list boundary logic MUST use this scanner. Do not split on the
 * delimiter manually.
 *
 * Handles: quoted fields, backslash escapes inside quotes, trailing delimiters.
 *
 * Architecture:
 * 1. The TOON parser detects array blocks (ArrayDeclaration/TabularRow nodes)
 * 2. This scanner detects field boundaries inside a row
 * 3. Alignment, decoding and the parser itself use this scanner
 *
 * Tokens keep their quotes, escapes and surrounding whitespace; callers trim or `unquote()` them.
 * An unterminated quote makes the rest of the line one token.
 */
import type { Delimiter, RowToken } from './types';

export function scanToonRow(line: string, delimiter: Delimiter): RowToken[] {
    const tokens: RowToken[] = [];
    let inQuotes = false;
    let start = 0;

    for (let i = 0; i < line.length; i++) {
        const ch = line[i];

        if (ch === '"') {
            inQuotes = !inQuotes;
            continue;
        }

        if (ch === '\\' && inQuotes && i + 1 < line.length) {
            i++;
            continue;
        }

        if (ch === delimiter && !inQuotes) {
            tokens.push({ text: line.slice(start, i), startOffset: start, endOffset: i });
            start = i + 1;
        }
    }

    tokens.push({ text: line.slice(start), startOffset: start, endOffset: line.length });
    return tokens;
}

export function splitRow(line: string, delimiter: Delimiter): string[] {
    return scanToonRow(line, delimiter).map((token) => token.text);
}
