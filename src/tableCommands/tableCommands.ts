import { EditorState, type StateCommand, type Transaction } from '@codemirror/state';
import { toon } from '../language/toonLanguage';
import { logger } from '../logger';
import { rewriteDocument, type RewriteMode } from './tableAlignment';

export interface TextRewriteResult {
    text: string;
    rowCount: number;
    regionCount: number;
}

const SUMMARY_VERB: Record<RewriteMode, string> = {
    align: 'Aligned',
    shrink: 'Shrunk',
};

function runRewriteCommand(
    state: EditorState,
    dispatch: (transaction: Transaction) => void,
    mode: RewriteMode
): boolean {
    const { changes, rowCount, regionCount } = rewriteDocument(state, mode);
    if (regionCount === 0) {
        return false;
    }

    if (changes.length > 0) {
        dispatch(state.update({ changes, userEvent: `format.${mode}` }));
    }

    logger.info(`${SUMMARY_VERB[mode]} ${rowCount} rows in ${regionCount} tables`);
    return true;
}

/**
 * Pads the columns of every tabular array. Returns false when the document has none.
 */
export const alignToonTables: StateCommand = ({ state, dispatch }) => runRewriteCommand(state, dispatch, 'align');

/**
 * Removes column padding from every tabular array. Returns false when the document has none.
 */
export const shrinkToonTables: StateCommand = ({ state, dispatch }) => runRewriteCommand(state, dispatch, 'shrink');

function rewriteText(text: string, mode: RewriteMode, timeoutMs?: number): TextRewriteResult {
    // Without an explicit separator the document would be written back with `\n` endings.
    const lineEnding = text.includes('\r\n') ? [EditorState.lineSeparator.of('\r\n')] : [];
    const state = EditorState.create({ doc: text, extensions: [toon(), ...lineEnding] });
    const { changes, rowCount, regionCount } = rewriteDocument(state, mode, timeoutMs);
    const next = changes.length > 0 ? state.update({ changes }).state : state;
    return { text: next.doc.toString(), rowCount, regionCount };
}

export function alignToonText(text: string, timeoutMs?: number): TextRewriteResult {
    return rewriteText(text, 'align', timeoutMs);
}

export function shrinkToonText(text: string, timeoutMs?: number): TextRewriteResult {
    return rewriteText(text, 'shrink', timeoutMs);
}
