/**
 * Reads tabular arrays of a TOON document back into records.
 *
 * Uses the same syntax tree and row scanner as alignment, so the values read here are
 * exactly the fields alignment pads and trims.
 */
import { ensureSyntaxTree } from '@codemirror/language';
import type { EditorState, Text } from '@codemirror/state';
import type { SyntaxNode } from '@lezer/common';
import { isArrayNode, tabularRegionForNode, TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS } from './tabularRegions';
import { unquote } from './toonQuoting';
import { splitRow } from './toonRowScanner';
import type { Delimiter, JsonPrimitive, TabularRegion } from './types';

export type TabularRecord = Record<string, JsonPrimitive>;

export interface DecodedTabularArray {
    /** Unquoted array key; null for arrays without one. */
    key: string | null;
    fields: string[];
    rows: TabularRecord[];
    region: TabularRegion;
}

const JSON_NUMBER = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

export function decodeScalar(token: string): JsonPrimitive {
    const text = token.trim();
    if (text.startsWith('"')) return unquote(text);
    if (text === 'null') return null;
    if (text === 'true') return true;
    if (text === 'false') return false;
    if (JSON_NUMBER.test(text)) return Number(text);
    return text;
}

/**
 * Missing trailing fields read as null; extra values are ignored.
 */
export function decodeTabularRow(line: string, delimiter: Delimiter, fields: readonly string[]): TabularRecord {
    const values = splitRow(line, delimiter);
    const record: TabularRecord = {};
    fields.forEach((field, index) => {
        record[field] = index < values.length ? decodeScalar(values[index]) : null;
    });
    return record;
}

export function decodeTabularRegion(doc: Text, region: TabularRegion, fields: readonly string[]): TabularRecord[] {
    return region.rowLines.map((lineNumber) => decodeTabularRow(doc.line(lineNumber).text, region.delimiter, fields));
}

function fieldNames(doc: Text, header: SyntaxNode): string[] {
    const fieldList = header.getChild('FieldList');
    if (!fieldList) {
        return [];
    }
    return fieldList.getChildren('Field').map((field) => unquote(doc.sliceString(field.from, field.to)));
}

/**
 * Decode every tabular array in the document. Returns an empty list when no
 * complete syntax tree is available within `timeoutMs`.
 */
export function readTabularArrays(
    state: EditorState,
    timeoutMs: number = TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS
): DecodedTabularArray[] {
    const doc = state.doc;
    const tree = ensureSyntaxTree(state, doc.length, timeoutMs);
    if (!tree) {
        return [];
    }

    const arrays: DecodedTabularArray[] = [];
    tree.iterate({
        enter: (ref) => {
            if (!isArrayNode(ref.name)) {
                return;
            }
            const region = tabularRegionForNode(doc, ref.node);
            const header = ref.node.getChild('ArrayHeader');
            if (!region || !header) {
                return;
            }
            const key = header.getChild('Key');
            const fields = fieldNames(doc, header);
            arrays.push({
                key: key ? unquote(doc.sliceString(key.from, key.to)) : null,
                fields,
                rows: decodeTabularRegion(doc, region, fields),
                region,
            });
        },
    });

    return arrays;
}
