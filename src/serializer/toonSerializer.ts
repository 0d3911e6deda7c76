/**
 * Renders a StructuredValue as TOON text.
 *
 * Each sequence picks one of three encodings, in this order:
 * 1. tabular: a `{fields}` header followed by one delimited row per item
 * 2. inline: scalar-only sequences up to `inlineArrayMaxLength` items on one line
 * 3. list: one `- ` entry per item
 *
 * Mapping keys and tabular fields are sorted so equal inputs always print the same way.
 */
import { analyzeTabular } from '../toonModel/tabularShape';
import { chooseDelimiter, compactSeparator, delimiterMarker, rowSeparator } from '../toonModel/toonDelimiters';
import { formatKey, quote } from '../toonModel/toonQuoting';
import {
    isScalar,
    type StructuredMapping,
    type StructuredScalar,
    type StructuredValue,
} from '../toonModel/types';

export const DEFAULT_INLINE_ARRAY_MAX_LENGTH = 5;

const INDENT = '  ';

export interface SerializeOptions {
    /** Longest scalar sequence still written on a single line. */
    inlineArrayMaxLength?: number;
}

interface SerializeContext {
    inlineArrayMaxLength: number;
}

function indentFor(depth: number): string {
    return INDENT.repeat(depth);
}

function compareKeys(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

export function renderNumber(value: number): string {
    // JSON has no NaN/Infinity; String() already gives the shortest round-trip form.
    return Number.isFinite(value) ? String(value) : 'null';
}

export function renderScalar(value: StructuredScalar): string {
    switch (value.kind) {
        case 'null':
            return 'null';
        case 'boolean':
            return value.value ? 'true' : 'false';
        case 'number':
            return renderNumber(value.value);
        case 'string':
            return quote(value.value);
    }
}

function renderField(mapping: StructuredMapping, field: string): string {
    const value = mapping.entries.get(field);
    return value !== undefined && isScalar(value) ? renderScalar(value) : 'null';
}

function mappingLines(mapping: StructuredMapping, depth: number, ctx: SerializeContext): string[] {
    const prefix = indentFor(depth);
    const lines: string[] = [];
    const keys = [...mapping.entries.keys()].sort(compareKeys);

    for (const key of keys) {
        const value = mapping.entries.get(key);
        if (value === undefined) continue;
        const label = formatKey(key);

        switch (value.kind) {
            case 'mapping':
                lines.push(`${prefix}${label}:`);
                lines.push(...mappingLines(value, depth + 1, ctx));
                break;
            case 'sequence':
                lines.push(...sequenceLines(label, value.items, depth, ctx));
                break;
            default:
                lines.push(`${prefix}${label}: ${renderScalar(value)}`);
        }
    }

    return lines;
}

function listItemLines(item: StructuredValue, depth: number, ctx: SerializeContext): string[] {
    const prefix = indentFor(depth);

    switch (item.kind) {
        case 'mapping': {
            // One level below the dash: continuation lines line up with the text after "- ".
            const fieldLines = mappingLines(item, depth + 1, ctx);
            if (fieldLines.length === 0) {
                return [`${prefix}-`];
            }
            const [first, ...rest] = fieldLines;
            return [`${prefix}- ${first.trimStart()}`, ...rest];
        }
        case 'sequence':
            return [`${prefix}-`, ...sequenceLines('', item.items, depth + 1, ctx)];
        default:
            return [`${prefix}- ${renderScalar(item)}`];
    }
}

/**
 * Lines for a sequence. `label` is the formatted key, or '' for a sequence with no key.
 */
function sequenceLines(label: string, items: StructuredValue[], depth: number, ctx: SerializeContext): string[] {
    const prefix = indentFor(depth);
    const count = items.length;

    if (count === 0) {
        return [`${prefix}${label}[0]:`];
    }

    const shape = analyzeTabular(items);
    if (shape.isTabular && shape.isFlat) {
        const { fields, rows } = shape;
        const cells: StructuredValue[] = [];
        for (const row of rows) {
            for (const field of fields) {
                const value = row.entries.get(field);
                if (value !== undefined) cells.push(value);
            }
        }

        const delimiter = chooseDelimiter(cells);
        const fieldList = fields.map(formatKey).join(compactSeparator(delimiter));
        const rowPrefix = indentFor(depth + 1);
        const separator = rowSeparator(delimiter);

        return [
            `${prefix}${label}[${count}${delimiterMarker(delimiter)}]{${fieldList}}:`,
            ...rows.map((row) => rowPrefix + fields.map((field) => renderField(row, field)).join(separator)),
        ];
    }

    const scalars = items.filter(isScalar);
    if (scalars.length === count && count <= ctx.inlineArrayMaxLength) {
        const delimiter = chooseDelimiter(scalars);
        const values = scalars.map(renderScalar).join(rowSeparator(delimiter));
        return [`${prefix}${label}[${count}${delimiterMarker(delimiter)}]: ${values}`];
    }

    const lines = [`${prefix}${label}[${count}]:`];
    for (const item of items) {
        lines.push(...listItemLines(item, depth + 1, ctx));
    }
    return lines;
}

export function serializeLines(value: StructuredValue, options: SerializeOptions = {}): string[] {
    const ctx: SerializeContext = {
        inlineArrayMaxLength: options.inlineArrayMaxLength ?? DEFAULT_INLINE_ARRAY_MAX_LENGTH,
    };

    switch (value.kind) {
        case 'mapping':
            return mappingLines(value, 0, ctx);
        case 'sequence':
            return sequenceLines('', value.items, 0, ctx);
        default:
            return [renderScalar(value)];
    }
}

export function serialize(value: StructuredValue, options: SerializeOptions = {}): string {
    return serializeLines(value, options).join('\n');
}
