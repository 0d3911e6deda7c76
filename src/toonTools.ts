import { resolveConfig, type ConfigResult, type ToonToolsConfig } from './config';
import { convertJsonDocument, jsonToToon, type ConversionResult, type DocumentConversionResult, type SourceDocument } from './serializer/jsonConversion';
import { alignToonText, shrinkToonText, type TextRewriteResult } from './tableCommands/tableCommands';
import { createGptTokenizerBackend } from './tokenCounter/gptTokenizerBackend';
import { TokenCounterRegistry } from './tokenCounter/tokenCounterRegistry';
import type { TokenCountBackend } from './tokenCounter/tokenCounterSession';

/**
 * Library operations bound to one validated configuration.
 */
export interface ToonTools {
    readonly config: ToonToolsConfig;
    jsonToToon(jsonText: string): ConversionResult;
    convertJsonDocument(source: SourceDocument): DocumentConversionResult;
    alignText(text: string): TextRewriteResult;
    shrinkText(text: string): TextRewriteResult;
    createTokenCounters(backend?: TokenCountBackend): TokenCounterRegistry;
}

export type ToonToolsResult = { ok: true; tools: ToonTools } | { ok: false; error: string };

export function bindToonTools(config: ToonToolsConfig): ToonTools {
    return {
        config,
        jsonToToon: (jsonText) => jsonToToon(jsonText, config.serializer),
        convertJsonDocument: (source) => convertJsonDocument(source, config.serializer),
        alignText: (text) => alignToonText(text, config.syntaxTree.timeoutMs),
        shrinkText: (text) => shrinkToonText(text, config.syntaxTree.timeoutMs),
        createTokenCounters: (backend = createGptTokenizerBackend()) =>
            new TokenCounterRegistry(backend, config.tokenCounter),
    };
}

export function createToonTools(overrides: unknown = {}): ToonToolsResult {
    const resolved: ConfigResult = resolveConfig(overrides);
    if (!resolved.ok) {
        return resolved;
    }
    return { ok: true, tools: bindToonTools(resolved.config) };
}
