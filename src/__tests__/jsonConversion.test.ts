import { convertJsonDocument, jsonToToon } from '../serializer/jsonConversion';

describe('jsonToToon', () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        warnSpy.mockRestore();
    });

    it('converts JSON text', () => {
        expect(jsonToToon('{"name":"Ada","tags":["x","y"]}')).toEqual({
            ok: true,
            toon: 'name: Ada\ntags[2]: x, y',
        });
    });

    it('passes serializer options through', () => {
        expect(jsonToToon('[1,2,3]', { inlineArrayMaxLength: 2 })).toEqual({
            ok: true,
            toon: '[3]:\n  - 1\n  - 2\n  - 3',
        });
    });

    it('reports malformed JSON as a decode failure', () => {
        const result = jsonToToon('{"a":');

        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error.kind).toBe('decode-failure');
        expect(result.error.message.startsWith('Failed to parse JSON: ')).toBe(true);
        expect(warnSpy).toHaveBeenCalledWith('[ToonTools]', result.error.message);
    });
});

describe('convertJsonDocument', () => {
    it('names the output after the source file', () => {
        expect(convertJsonDocument({ fileName: '/tmp/data.json', text: '{"a":1}' })).toEqual({
            ok: true,
            toon: 'a: 1',
            fileName: '/tmp/data.toon',
        });
        expect(convertJsonDocument({ fileName: 'DATA.JSON', text: '1' })).toEqual({
            ok: true,
            toon: '1',
            fileName: 'DATA.toon',
        });
    });

    it('rejects files that are not JSON', () => {
        expect(convertJsonDocument({ fileName: 'data.toon', text: '{}' })).toEqual({
            ok: false,
            error: { kind: 'unsupported-source', message: 'data.toon is not a JSON file' },
        });
    });
});
