import { analyzeTabular } from '../toonModel/tabularShape';
import { fromJsonValue, toJsonValue, type StructuredValue } from '../toonModel/types';

function items(json: unknown): StructuredValue[] {
    const value = fromJsonValue(json);
    if (value.kind !== 'sequence') {
        throw new Error('expected a sequence');
    }
    return value.items;
}

describe('analyzeTabular', () => {
    it('accepts records sharing one key set', () => {
        const shape = analyzeTabular(items([{ a: 1, b: 2 }, { a: 3, b: 4 }]));
        expect(shape.isTabular).toBe(true);
        expect(shape.isFlat).toBe(true);
        expect(shape.isTabular && shape.fields).toEqual(['a', 'b']);
    });

    it('rejects differing key sets', () => {
        expect(analyzeTabular(items([{ a: 1 }, { b: 2 }])).isTabular).toBe(false);
        expect(analyzeTabular(items([{ a: 1 }, { a: 2, b: 3 }])).isTabular).toBe(false);
    });

    it('sorts fields regardless of insertion order', () => {
        const shape = analyzeTabular(items([{ b: 1, a: 2 }, { a: 3, b: 4 }]));
        expect(shape.isTabular && shape.fields).toEqual(['a', 'b']);
    });

    it('marks nested values as not flat', () => {
        const shape = analyzeTabular(
            items([
                { a: 1, b: { c: 1 } },
                { a: 2, b: { c: 2 } },
            ])
        );
        expect(shape.isTabular).toBe(true);
        expect(shape.isFlat).toBe(false);

        expect(analyzeTabular(items([{ a: [1] }, { a: 2 }])).isFlat).toBe(false);
    });

    it('rejects empty sequences, scalars and empty records', () => {
        expect(analyzeTabular([]).isTabular).toBe(false);
        expect(analyzeTabular(items([1, 2])).isTabular).toBe(false);
        expect(analyzeTabular(items([{}, {}])).isTabular).toBe(false);
        expect(analyzeTabular(items([{ a: 1 }, [1]])).isTabular).toBe(false);
    });
});

describe('fromJsonValue', () => {
    it('converts decoded JSON and back', () => {
        const json = { a: [1, 'x', null, true], b: { c: -2.5 } };
        expect(toJsonValue(fromJsonValue(json))).toEqual(json);
    });

    it('keeps a __proto__ key as an ordinary entry', () => {
        const json = toJsonValue(fromJsonValue(JSON.parse('{"__proto__":{"x":1}}')));

        expect(json !== null && typeof json === 'object' && Object.keys(json)).toEqual(['__proto__']);
        expect(Object.getPrototypeOf(json)).toBe(Object.prototype);
    });

    it('reads values JSON cannot carry as null', () => {
        expect(fromJsonValue(undefined)).toEqual({ kind: 'null' });
    });
});
