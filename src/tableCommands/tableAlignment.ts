/**
 * Column alignment and shrinking for tabular TOON rows.
 *
 * Both rewrites keep the line count and each row's leading indentation; only the text
 * between the indentation and the end of the line changes. Field boundaries come from
 * `scanToonRow()`, so quoted delimiters are never split.
 */
import type { EditorState, Text } from '@codemirror/state';
import { findTabularRegions, TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS } from '../toonModel/tabularRegions';
import { displayWidth, padToDisplayWidth } from '../toonModel/displayWidth';
import { compactSeparator, rowSeparator } from '../toonModel/toonDelimiters';
import { splitRow } from '../toonModel/toonRowScanner';
import type { Delimiter, TabularRegion } from '../toonModel/types';

export type RewriteMode = 'align' | 'shrink';

export interface LineChange {
    from: number;
    to: number;
    insert: string;
}

export interface RegionRewrite {
    /** Changes against the document the region was located in; unchanged rows are omitted. */
    changes: LineChange[];
    rowCount: number;
}

export interface DocumentRewrite extends RegionRewrite {
    regionCount: number;
}

/**
 * Leading whitespace kept verbatim by both rewrites. In tab-delimited rows a leading
 * tab separates an empty first value, so only spaces count there.
 */
function leadingIndent(line: string, delimiter: Delimiter): string {
    const match = (delimiter === '\t' ? /^ */ : /^[ \t]*/).exec(line);
    return match ? match[0] : '';
}

/**
 * Maximum display width of each column's trimmed values. Index 0 is the first column.
 */
export function computeColumnWidths(lines: readonly string[], delimiter: Delimiter): number[] {
    const widths: number[] = [];

    for (const line of lines) {
        splitRow(line, delimiter).forEach((value, index) => {
            const width = displayWidth(value.trim());
            widths[index] = index < widths.length ? Math.max(widths[index], width) : width;
        });
    }

    return widths;
}

/**
 * Pads every column but the last to its width. The last column is never padded.
 */
export function alignRow(line: string, delimiter: Delimiter, widths: readonly number[]): string {
    const values = splitRow(line, delimiter);
    const aligned = values.map((value, index) => {
        const trimmed = value.trim();
        if (index === values.length - 1) {
            return trimmed;
        }
        return padToDisplayWidth(trimmed, index < widths.length ? widths[index] : 0);
    });

    return leadingIndent(line, delimiter) + aligned.join(rowSeparator(delimiter));
}

export function shrinkRow(line: string, delimiter: Delimiter): string {
    const values = splitRow(line, delimiter).map((value) => value.trim());
    return leadingIndent(line, delimiter) + values.join(compactSeparator(delimiter));
}

function rewriteRegion(doc: Text, region: TabularRegion, mode: RewriteMode): RegionRewrite {
    const lines = region.rowLines.map((lineNumber) => doc.line(lineNumber));
    const widths =
        mode === 'align'
            ? computeColumnWidths(
                  lines.map((line) => line.text),
                  region.delimiter
              )
            : [];

    const changes: LineChange[] = [];
    for (const line of lines) {
        const text =
            mode === 'align' ? alignRow(line.text, region.delimiter, widths) : shrinkRow(line.text, region.delimiter);
        if (text !== line.text) {
            changes.push({ from: line.from, to: line.to, insert: text });
        }
    }

    return { changes, rowCount: lines.length };
}

export function alignRegion(doc: Text, region: TabularRegion): RegionRewrite {
    return rewriteRegion(doc, region, 'align');
}

export function shrinkRegion(doc: Text, region: TabularRegion): RegionRewrite {
    return rewriteRegion(doc, region, 'shrink');
}

/**
 * Rewrites every tabular region of the document. Regions are handled from the last
 * to the first so that a rewrite never moves a region that is still pending.
 */
export function rewriteDocument(
    state: EditorState,
    mode: RewriteMode,
    timeoutMs: number = TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS
): DocumentRewrite {
    const regions = findTabularRegions(state, timeoutMs).sort((a, b) => b.startLine - a.startLine);

    const result: DocumentRewrite = { changes: [], rowCount: 0, regionCount: 0 };
    for (const region of regions) {
        if (region.rowLines.length === 0) {
            continue;
        }
        const rewrite = rewriteRegion(state.doc, region, mode);
        result.changes.push(...rewrite.changes);
        result.rowCount += rewrite.rowCount;
        result.regionCount += 1;
    }

    return result;
}

export function alignDocument(state: EditorState, timeoutMs?: number): DocumentRewrite {
    return rewriteDocument(state, 'align', timeoutMs);
}

export function shrinkDocument(state: EditorState, timeoutMs?: number): DocumentRewrite {
    return rewriteDocument(state, 'shrink', timeoutMs);
}
