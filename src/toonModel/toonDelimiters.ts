import type { Delimiter, StructuredValue } from './types';

const PIPE_MARKER = /\[\d+\|\]/;
const TAB_MARKER = /\[\d+\t\]/;

/**
 * Picks the delimiter for a set of values about to be written on one line
 * or one tabular region. Comma unless a string value contains one, then pipe,
 * and tab when both are taken.
 */
export function chooseDelimiter(values: Iterable<StructuredValue>): Delimiter {
    let hasComma = false;
    let hasPipe = false;

    for (const value of values) {
        if (value.kind !== 'string') continue;
        if (value.value.includes(',')) hasComma = true;
        if (value.value.includes('|')) hasPipe = true;
    }

    if (!hasComma) return ',';
    if (!hasPipe) return '|';
    return '\t';
}

/**
 * Marker written inside an array's length brackets. Comma is implicit.
 */
export function delimiterMarker(delimiter: Delimiter): string {
    return delimiter === ',' ? '' : delimiter;
}

/**
 * Separator between values in rendered rows and inline arrays.
 */
export function rowSeparator(delimiter: Delimiter): string {
    return delimiter === '\t' ? '\t' : `${delimiter} `;
}

/**
 * Separator with no padding, used by header field lists and shrunk rows.
 */
export function compactSeparator(delimiter: Delimiter): string {
    return delimiter;
}

/**
 * Guesses the delimiter of one line from the characters it contains.
 */
export function detectDelimiter(line: string): Delimiter {
    if (line.includes('|')) return '|';
    if (line.includes('\t')) return '\t';
    return ',';
}

/**
 * Delimiter of an array header line. A `[N|]` or `[N<TAB>]` marker wins over
 * whatever characters the rest of the header happens to contain.
 */
export function detectHeaderDelimiter(headerLine: string): Delimiter {
    if (PIPE_MARKER.test(headerLine)) return '|';
    if (TAB_MARKER.test(headerLine)) return '\t';
    return detectDelimiter(headerLine);
}
