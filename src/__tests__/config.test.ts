import { defaultConfig, resolveConfig } from '../config';
import { createToonTools } from '../toonTools';

describe('resolveConfig', () => {
    it('fills in defaults', () => {
        expect(resolveConfig()).toEqual({
            ok: true,
            config: {
                serializer: { inlineArrayMaxLength: 5 },
                syntaxTree: { timeoutMs: 500 },
                tokenCounter: {
                    enabled: false,
                    debounceMs: 500,
                    format: '%d tokens',
                    countingFormat: '... tokens',
                },
            },
        });
    });

    it('keeps defaults next to partial overrides', () => {
        const result = resolveConfig({ tokenCounter: { debounceMs: 100 } });

        expect(result.ok && result.config.tokenCounter).toEqual({ ...defaultConfig.tokenCounter, debounceMs: 100 });
        expect(result.ok && result.config.serializer).toEqual(defaultConfig.serializer);
    });

    it('names the invalid setting', () => {
        const result = resolveConfig({ serializer: { inlineArrayMaxLength: -1 } });

        expect(result.ok).toBe(false);
        expect(!result.ok && result.error).toMatch(/^serializer\.inlineArrayMaxLength: /);
    });

    it('requires a count placeholder in the status format', () => {
        expect(resolveConfig({ tokenCounter: { format: 'tokens' } })).toEqual({
            ok: false,
            error: 'tokenCounter.format: must contain %d',
        });
    });

    it('rejects a zero syntax tree timeout', () => {
        const result = resolveConfig({ syntaxTree: { timeoutMs: 0 } });
        expect(!result.ok && result.error).toMatch(/^syntaxTree\.timeoutMs: /);
    });
});

describe('createToonTools', () => {
    it('binds operations to the configuration', () => {
        const result = createToonTools({ serializer: { inlineArrayMaxLength: 10 } });
        if (!result.ok) {
            throw new Error(result.error);
        }

        expect(result.tools.jsonToToon('{"n":[1,2,3,4,5,6]}')).toEqual({ ok: true, toon: 'n[6]: 1, 2, 3, 4, 5, 6' });
        expect(result.tools.alignText('t[2]{a,b}:\n  10,x\n  2,y').text).toBe('t[2]{a,b}:\n  10, x\n  2 , y');
    });

    it('passes token counter settings to new registries', () => {
        const result = createToonTools({ tokenCounter: { enabled: true, format: 'tokens: %d' } });
        if (!result.ok) {
            throw new Error(result.error);
        }

        const backend = { count: (text: string) => Promise.resolve(text.length) };
        const counters = result.tools.createTokenCounters(backend);
        expect(counters.openDocument('doc', 'text')).not.toBeNull();
        expect(counters.statusText('doc')).toBe('... tokens');
        counters.disposeAll();
    });

    it('reports invalid configuration', () => {
        expect(createToonTools({ tokenCounter: { enabled: 'yes' } }).ok).toBe(false);
    });
});
