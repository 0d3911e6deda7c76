import { serialize } from '../serializer/toonSerializer';
import { fromJsonValue } from '../toonModel/types';

function toToon(json: unknown, inlineArrayMaxLength?: number): string {
    return serialize(fromJsonValue(json), { inlineArrayMaxLength });
}

describe('serialize', () => {
    describe('tabular arrays', () => {
        it('writes uniform records as a header and one row per record', () => {
            const toon = toToon({
                users: [
                    { id: 1, name: 'Alice', role: 'admin', active: true },
                    { id: 2, name: 'Bob', role: 'developer', active: true },
                ],
            });

            expect(toon).toBe(
                ['users[2]{active,id,name,role}:', '  true, 1, Alice, admin', '  true, 2, Bob, developer'].join('\n')
            );
        });

        it('writes root record arrays without a key', () => {
            expect(toToon([{ b: 'x', a: 1 }])).toBe('[1]{a,b}:\n  1, x');
        });

        it('switches to pipes when a value contains a comma', () => {
            const toon = toToon([
                { name: 'Doe, Jane', id: 1 },
                { name: 'Roe', id: 2 },
            ]);

            expect(toon).toBe(['[2|]{id|name}:', '  1| "Doe, Jane"', '  2| Roe'].join('\n'));
        });

        it('switches to tabs when values contain commas and pipes', () => {
            const toon = toToon({
                rows: [
                    { a: 'x,y', b: 1 },
                    { a: 'p|q', b: 2 },
                ],
            });

            expect(toon).toBe(['rows[2\t]{a\tb}:', '  "x,y"\t1', '  "p|q"\t2'].join('\n'));
        });

        it('quotes field names that are not identifiers', () => {
            const toon = toToon({
                people: [
                    { 'first name': 'Ada', id: 1 },
                    { 'first name': 'Alan', id: 2 },
                ],
            });

            expect(toon).toBe(['people[2]{"first name",id}:', '  Ada, 1', '  Alan, 2'].join('\n'));
        });

        it('falls back to a list for records with nested values', () => {
            const toon = toToon({
                items: [
                    { id: 1, meta: { x: 1 } },
                    { id: 2, meta: { x: 2 } },
                ],
            });

            expect(toon).toBe(
                [
                    'items[2]:',
                    '  - id: 1',
                    '    meta:',
                    '      x: 1',
                    '  - id: 2',
                    '    meta:',
                    '      x: 2',
                ].join('\n')
            );
        });
    });

    describe('scalar arrays', () => {
        it('writes short arrays inline', () => {
            expect(toToon({ tags: ['a', 'b', 'c'] })).toBe('tags[3]: a, b, c');
        });

        it('marks the delimiter of inline arrays', () => {
            expect(toToon({ tags: ['x,y', 'z'] })).toBe('tags[2|]: "x,y"| z');
            expect(toToon({ tags: ['a,b', 'c|d'] })).toBe('tags[2\t]: "a,b"\t"c|d"');
        });

        it('writes arrays above the inline limit as lists', () => {
            expect(toToon({ n: [1, 2, 3, 4, 5, 6] })).toBe(
                ['n[6]:', '  - 1', '  - 2', '  - 3', '  - 4', '  - 5', '  - 6'].join('\n')
            );
        });

        it('honours a custom inline limit', () => {
            expect(toToon({ n: [1, 2, 3, 4, 5, 6] }, 10)).toBe('n[6]: 1, 2, 3, 4, 5, 6');
            expect(toToon({ n: [1] }, 0)).toBe('n[1]:\n  - 1');
        });

        it('writes empty arrays with a zero count', () => {
            expect(toToon({ items: [] })).toBe('items[0]:');
            expect(toToon([])).toBe('[0]:');
        });
    });

    describe('lists', () => {
        it('writes nested arrays as bare dash items', () => {
            expect(toToon({ matrix: [[1, 2], [3, 4]] })).toBe(
                ['matrix[2]:', '  -', '    [2]: 1, 2', '  -', '    [2]: 3, 4'].join('\n')
            );
        });

        it('writes an empty record in a list as a bare dash', () => {
            expect(toToon([{}, 1])).toBe(['[2]:', '  -', '  - 1'].join('\n'));
        });

        it('keeps nested tabular arrays under their list item', () => {
            const toon = toToon({
                items: [
                    {
                        name: 'x',
                        rows: [
                            { a: 1, b: 2 },
                            { a: 3, b: 4 },
                        ],
                    },
                ],
            });

            expect(toon).toBe(
                ['items[1]:', '  - name: x', '    rows[2]{a,b}:', '      1, 2', '      3, 4'].join('\n')
            );
        });
    });

    describe('mappings and scalars', () => {
        it('sorts keys and indents nested mappings', () => {
            expect(toToon({ server: { port: 8080, host: 'localhost' }, debug: false })).toBe(
                ['debug: false', 'server:', '  host: localhost', '  port: 8080'].join('\n')
            );
        });

        it('quotes keys that are not identifiers', () => {
            expect(toToon({ 'first name': 'Ada', '9': 1 })).toBe(['"9": 1', '"first name": Ada'].join('\n'));
        });

        it('renders numbers in their shortest form', () => {
            expect(toToon({ a: 1.5, b: -0.25, c: 1e21, d: 100 })).toBe(
                ['a: 1.5', 'b: -0.25', 'c: 1e+21', 'd: 100'].join('\n')
            );
        });

        it('renders non-finite numbers as null', () => {
            expect(serialize({ kind: 'number', value: Number.NaN })).toBe('null');
            expect(serialize({ kind: 'number', value: Number.POSITIVE_INFINITY })).toBe('null');
        });

        it('renders root scalars on their own', () => {
            expect(toToon('hello')).toBe('hello');
            expect(toToon(42)).toBe('42');
            expect(toToon(null)).toBe('null');
            expect(toToon('true')).toBe('"true"');
        });

        it('renders an empty root mapping as empty text', () => {
            expect(toToon({})).toBe('');
        });

        it('does not reorder the input', () => {
            const value = fromJsonValue({ b: 1, a: 2 });
            serialize(value);
            expect(value.kind === 'mapping' && [...value.entries.keys()]).toEqual(['b', 'a']);
        });
    });
});
