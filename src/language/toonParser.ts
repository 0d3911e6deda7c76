/**
 * Line-oriented TOON parser producing a Lezer syntax tree.
 *
 * It recovers document structure (pairs, objects, arrays, rows, list items) from
 * indentation and array headers so that editor features can walk a typed tree. It does
 * not validate counts or scalar syntax.
 */
import { NodeSet, NodeType, Parser, Tree, type Input, type PartialParse } from '@lezer/common';
import { scanToonRow } from '../toonModel/toonRowScanner';
import type { Delimiter } from '../toonModel/types';

export const TOON_NODE_NAMES = [
    'Document',
    'Pair',
    'Object',
    'Key',
    'Value',
    'ArrayDeclaration',
    'RootArray',
    'ArrayHeader',
    'FieldList',
    'Field',
    'FieldDelimiter',
    'ArrayContent',
    'InlineValues',
    'TabularRow',
    'RowValue',
    'RowDelimiter',
    'ListItem',
] as const;

export type ToonNodeName = (typeof TOON_NODE_NAMES)[number];

export const toonNodeSet = new NodeSet(
    TOON_NODE_NAMES.map((name, id) => NodeType.define({ id, name, top: name === 'Document' }))
);

interface SourceLine {
    /** Offset of the first character after the indentation. */
    contentFrom: number;
    /** End of the line, excluding the newline and a trailing `\r`. */
    to: number;
    /** Leading spaces. */
    indent: number;
    content: string;
}

interface NodeSpec {
    name: ToonNodeName;
    from: number;
    to: number;
    children: NodeSpec[];
}

interface ArrayHeaderMatch {
    keyLength: number;
    delimiter: Delimiter;
    /** Offsets below are relative to the line content. */
    fieldsFrom: number | null;
    fieldsText: string;
    colon: number;
}

const QUOTED_KEY = /^"(?:[^"\\]|\\.)*"/;
const BARE_KEY = /^[^\s:[\]{}",|]+/;
const ARRAY_HEADER = /^\[(\d+)([|\t])?\](?:\{((?:"(?:[^"\\]|\\.)*"|[^}"])*)\})?:/;

function splitLines(text: string): SourceLine[] {
    const lines: SourceLine[] = [];
    let from = 0;

    for (const raw of text.split('\n')) {
        const content = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
        const indent = content.length - content.replace(/^ +/, '').length;
        if (content.trim().length > 0) {
            lines.push({
                contentFrom: from + indent,
                to: from + content.length,
                indent,
                content: content.slice(indent),
            });
        }
        from += raw.length + 1;
    }

    return lines;
}

function keyLength(content: string): number {
    const match = QUOTED_KEY.exec(content) ?? BARE_KEY.exec(content);
    return match ? match[0].length : 0;
}

function matchArrayHeader(content: string): ArrayHeaderMatch | null {
    const keyLen = keyLength(content);
    const match = ARRAY_HEADER.exec(content.slice(keyLen));
    if (!match) {
        return null;
    }

    const whole = match[0];
    const count = match[1];
    const marker: string | undefined = match[2];
    const fields: string | undefined = match[3];
    const delimiter: Delimiter = marker === '|' || marker === '\t' ? marker : ',';
    const bracketLength = count.length + (marker ? 3 : 2);

    return {
        keyLength: keyLen,
        delimiter,
        fieldsFrom: fields === undefined ? null : keyLen + bracketLength + 1,
        fieldsText: fields ?? '',
        colon: keyLen + whole.length - 1,
    };
}

function node(name: ToonNodeName, from: number, to: number, children: NodeSpec[] = []): NodeSpec {
    return { name, from, to, children };
}

function lastLineEnd(line: SourceLine, body: SourceLine[]): number {
    return body.length > 0 ? body[body.length - 1].to : line.to;
}

/**
 * Nodes for the delimited values of one line segment: `valueName` nodes at the trimmed
 * ranges of each field, `delimiterName` nodes at each delimiter.
 */
function delimitedNodes(
    text: string,
    offset: number,
    delimiter: Delimiter,
    valueName: ToonNodeName,
    delimiterName: ToonNodeName
): NodeSpec[] {
    const nodes: NodeSpec[] = [];
    const tokens = scanToonRow(text, delimiter);

    tokens.forEach((token, index) => {
        const leading = token.text.length - token.text.trimStart().length;
        const trimmedLength = token.text.trim().length;
        const from = offset + token.startOffset + leading;
        nodes.push(node(valueName, from, from + trimmedLength));
        if (index < tokens.length - 1) {
            nodes.push(node(delimiterName, offset + token.endOffset, offset + token.endOffset + 1));
        }
    });

    return nodes;
}

function parseBlock(lines: SourceLine[]): NodeSpec[] {
    const nodes: NodeSpec[] = [];
    let i = 0;

    while (i < lines.length) {
        const line = lines[i];
        let j = i + 1;
        while (j < lines.length && lines[j].indent > line.indent) {
            j++;
        }
        nodes.push(parseEntry(line, lines.slice(i + 1, j)));
        i = j;
    }

    return nodes;
}

function parseListItem(line: SourceLine, body: SourceLine[]): NodeSpec {
    const rest = line.content.slice(1);
    const gap = rest.length - rest.trimStart().length;
    const inline = rest.trim();

    // The text after "- " behaves like a line indented to where it starts.
    const lines =
        inline.length === 0
            ? body
            : [
                  {
                      contentFrom: line.contentFrom + 1 + gap,
                      to: line.to,
                      indent: line.indent + 1 + gap,
                      content: rest.slice(gap),
                  },
                  ...body,
              ];

    return node('ListItem', line.contentFrom, lastLineEnd(line, body), parseBlock(lines));
}

function parseArray(line: SourceLine, body: SourceLine[], header: ArrayHeaderMatch): NodeSpec {
    const base = line.contentFrom;
    const headerChildren: NodeSpec[] = [];

    if (header.keyLength > 0) {
        headerChildren.push(node('Key', base, base + header.keyLength));
    }
    if (header.fieldsFrom !== null) {
        const fieldsFrom = base + header.fieldsFrom;
        const fields =
            header.fieldsText.trim().length === 0
                ? []
                : delimitedNodes(header.fieldsText, fieldsFrom, header.delimiter, 'Field', 'FieldDelimiter');
        headerChildren.push(node('FieldList', fieldsFrom, fieldsFrom + header.fieldsText.length, fields));
    }

    const children = [node('ArrayHeader', base, base + header.colon + 1, headerChildren)];

    const inlineText = line.content.slice(header.colon + 1);
    if (inlineText.trim().length > 0) {
        const inlineFrom = base + header.colon + 1;
        children.push(
            node(
                'InlineValues',
                inlineFrom,
                line.to,
                delimitedNodes(inlineText, inlineFrom, header.delimiter, 'Value', 'RowDelimiter')
            )
        );
    }

    if (body.length > 0) {
        const content =
            header.fieldsFrom !== null
                ? body.map((row) =>
                      node(
                          'TabularRow',
                          row.contentFrom,
                          row.to,
                          delimitedNodes(row.content, row.contentFrom, header.delimiter, 'RowValue', 'RowDelimiter')
                      )
                  )
                : parseBlock(body);
        children.push(node('ArrayContent', body[0].contentFrom, lastLineEnd(line, body), content));
    }

    const name = header.keyLength > 0 ? 'ArrayDeclaration' : 'RootArray';
    return node(name, base, lastLineEnd(line, body), children);
}

function parseEntry(line: SourceLine, body: SourceLine[]): NodeSpec {
    const { content, contentFrom } = line;
    const end = lastLineEnd(line, body);

    if (content === '-' || content.startsWith('- ')) {
        return parseListItem(line, body);
    }

    const header = matchArrayHeader(content);
    if (header) {
        return parseArray(line, body, header);
    }

    const keyLen = keyLength(content);
    if (keyLen > 0 && content[keyLen] === ':') {
        const key = node('Key', contentFrom, contentFrom + keyLen);
        const rest = content.slice(keyLen + 1);
        if (rest.trim().length === 0) {
            return node('Object', contentFrom, end, [key, ...parseBlock(body)]);
        }
        const valueFrom = contentFrom + keyLen + 1 + (rest.length - rest.trimStart().length);
        const value = node('Value', valueFrom, valueFrom + rest.trim().length);
        return node('Pair', contentFrom, end, [key, value, ...parseBlock(body)]);
    }

    return node('Value', contentFrom, end, parseBlock(body));
}

function buildTree(parsed: NodeSpec, nodeSet: NodeSet): Tree {
    return new Tree(
        nodeSet.types[TOON_NODE_NAMES.indexOf(parsed.name)],
        parsed.children.map((child) => buildTree(child, nodeSet)),
        parsed.children.map((child) => child.from - parsed.from),
        parsed.to - parsed.from
    );
}

export function buildToonTree(text: string, nodeSet: NodeSet = toonNodeSet): Tree {
    const document = node('Document', 0, text.length, parseBlock(splitLines(text)));
    return buildTree(document, nodeSet);
}

/**
 * Lezer parser for TOON documents. The whole input is parsed in one step;
 * incremental fragments are not reused.
 */
export class ToonParser extends Parser {
    constructor(readonly nodeSet: NodeSet = toonNodeSet) {
        super();
    }

    createParse(input: Input): PartialParse {
        const tree = buildToonTree(input.read(0, input.length), this.nodeSet);
        return {
            advance: () => tree,
            parsedPos: input.length,
            stopAt: () => undefined,
            stoppedAt: null,
        };
    }
}
