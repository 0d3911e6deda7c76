import { logger } from '../logger';
import { fromJsonValue } from '../toonModel/types';
import { serialize, type SerializeOptions } from './toonSerializer';

export type ConversionErrorKind = 'decode-failure' | 'unsupported-source';

export interface ConversionError {
    kind: ConversionErrorKind;
    message: string;
}

export type ConversionResult = { ok: true; toon: string } | { ok: false; error: ConversionError };

export interface SourceDocument {
    fileName: string;
    text: string;
}

export type DocumentConversionResult =
    | { ok: true; toon: string; fileName: string }
    | { ok: false; error: ConversionError };

const JSON_EXTENSION = /\.json$/i;

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Converts complete JSON text into complete TOON text.
 * Malformed JSON is reported as a `decode-failure`; the serializer never sees it.
 */
export function jsonToToon(jsonText: string, options: SerializeOptions = {}): ConversionResult {
    let decoded: unknown;
    try {
        decoded = JSON.parse(jsonText);
    } catch (error) {
        const message = `Failed to parse JSON: ${errorMessage(error)}`;
        logger.warn(message);
        return { ok: false, error: { kind: 'decode-failure', message } };
    }

    return { ok: true, toon: serialize(fromJsonValue(decoded), options) };
}

/**
 * Converts a `.json` document and names its `.toon` counterpart.
 * Other file kinds are rejected before anything is decoded.
 */
export function convertJsonDocument(source: SourceDocument, options: SerializeOptions = {}): DocumentConversionResult {
    if (!JSON_EXTENSION.test(source.fileName)) {
        return {
            ok: false,
            error: { kind: 'unsupported-source', message: `${source.fileName} is not a JSON file` },
        };
    }

    const result = jsonToToon(source.text, options);
    if (!result.ok) {
        return result;
    }

    return { ok: true, toon: result.toon, fileName: source.fileName.replace(JSON_EXTENSION, '.toon') };
}
