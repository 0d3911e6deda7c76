/**
 * Shared types for TOON values, delimiters and tabular regions.
 */

export type Delimiter = ',' | '|' | '\t';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type StructuredScalar =
    | { kind: 'null' }
    | { kind: 'boolean'; value: boolean }
    | { kind: 'number'; value: number }
    | { kind: 'string'; value: string };

export interface StructuredMapping {
    kind: 'mapping';
    entries: Map<string, StructuredValue>;
}

export interface StructuredSequence {
    kind: 'sequence';
    items: StructuredValue[];
}

/**
 * Tree-structured data value, as produced by decoding a JSON document.
 */
export type StructuredValue = StructuredScalar | StructuredMapping | StructuredSequence;

export function isScalar(value: StructuredValue): value is StructuredScalar {
    return value.kind !== 'mapping' && value.kind !== 'sequence';
}

/**
 * Builds a StructuredValue from the output of `JSON.parse`.
 * Values JSON cannot carry (undefined, functions, symbols) become null.
 */
export function fromJsonValue(input: unknown): StructuredValue {
    if (input === null || input === undefined) {
        return { kind: 'null' };
    }
    if (typeof input === 'boolean') {
        return { kind: 'boolean', value: input };
    }
    if (typeof input === 'number') {
        return { kind: 'number', value: input };
    }
    if (typeof input === 'string') {
        return { kind: 'string', value: input };
    }
    if (Array.isArray(input)) {
        return { kind: 'sequence', items: input.map(fromJsonValue) };
    }
    if (typeof input === 'object') {
        const entries = new Map<string, StructuredValue>();
        for (const [key, value] of Object.entries(input)) {
            entries.set(key, fromJsonValue(value));
        }
        return { kind: 'mapping', entries };
    }
    return { kind: 'null' };
}

export function toJsonValue(value: StructuredValue): JsonValue {
    switch (value.kind) {
        case 'null':
            return null;
        case 'boolean':
        case 'number':
        case 'string':
            return value.value;
        case 'sequence':
            return value.items.map(toJsonValue);
        case 'mapping':
            // Defines own properties, so a `__proto__` key stays an ordinary entry.
            return Object.fromEntries(
                [...value.entries].map(([key, entry]): [string, JsonValue] => [key, toJsonValue(entry)])
            );
    }
}

/**
 * A contiguous tabular array found in a document.
 *
 * Line numbers are 1-based (CodeMirror `Line.number`); `endLine` is exclusive.
 * `rowLines` is sorted ascending and every entry lies in `[startLine, endLine)`.
 */
export interface TabularRegion {
    startLine: number;
    endLine: number;
    delimiter: Delimiter;
    declaredFieldCount?: number;
    rowLines: number[];
}

/**
 * One field of a tabular row. Offsets index into the source line;
 * `endOffset` is exclusive and points at the following delimiter, if any.
 */
export interface RowToken {
    readonly text: string;
    readonly startOffset: number;
    readonly endOffset: number;
}
