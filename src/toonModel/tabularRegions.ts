import { ensureSyntaxTree } from '@codemirror/language';
import type { EditorState, Text } from '@codemirror/state';
import type { SyntaxNode, Tree } from '@lezer/common';
import { logger } from '../logger';
import { detectHeaderDelimiter } from './toonDelimiters';
import type { TabularRegion } from './types';

export const TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS = 500;

export function isArrayNode(name: string): boolean {
    return name === 'ArrayDeclaration' || name === 'RootArray';
}

/**
 * Builds the region for an `ArrayDeclaration`/`RootArray` node, or null when it has no
 * tabular rows.
 */
export function tabularRegionForNode(doc: Text, array: SyntaxNode): TabularRegion | null {
    const header = array.getChild('ArrayHeader');
    const content = array.getChild('ArrayContent');
    if (!header || !content) {
        return null;
    }

    const rows = content.getChildren('TabularRow');
    if (rows.length === 0) {
        return null;
    }

    const headerLine = doc.lineAt(header.from);
    const region: TabularRegion = {
        startLine: headerLine.number,
        endLine: doc.lineAt(array.to).number + 1,
        delimiter: detectHeaderDelimiter(headerLine.text),
        rowLines: rows.map((row) => doc.lineAt(row.from).number),
    };

    // Field and delimiter nodes alternate inside FieldList; only the Field nodes count.
    const fieldList = header.getChild('FieldList');
    if (fieldList) {
        region.declaredFieldCount = fieldList.getChildren('Field').length;
    }

    return region;
}

/**
 * Find all tabular array regions of `doc` in document order.
 */
export function findTabularRegionsInTree(tree: Tree, doc: Text): TabularRegion[] {
    const regions: TabularRegion[] = [];

    tree.iterate({
        enter: (node) => {
            if (!isArrayNode(node.name)) {
                return;
            }
            const region = tabularRegionForNode(doc, node.node);
            if (region) {
                regions.push(region);
            }
        },
    });

    return regions;
}

/**
 * Find all tabular array regions in the document using the syntax tree.
 * Returns an empty list when no complete tree is available within `timeoutMs`.
 */
export function findTabularRegions(
    state: EditorState,
    timeoutMs: number = TABULAR_SYNTAX_TREE_SCAN_TIMEOUT_MS
): TabularRegion[] {
    const tree = ensureSyntaxTree(state, state.doc.length, timeoutMs);
    if (!tree) {
        logger.debug('No syntax tree available, skipping tabular regions');
        return [];
    }

    return findTabularRegionsInTree(tree, state.doc);
}
