export {
    fromJsonValue,
    toJsonValue,
    isScalar,
    type Delimiter,
    type JsonPrimitive,
    type JsonValue,
    type StructuredValue,
    type StructuredScalar,
    type StructuredMapping,
    type StructuredSequence,
    type TabularRegion,
    type RowToken,
} from './toonModel/types';

export { needsQuoting, quote, unescape, unquote, formatKey, isValidIdentifier } from './toonModel/toonQuoting';

export {
    chooseDelimiter,
    delimiterMarker,
    rowSeparator,
    compactSeparator,
    detectDelimiter,
    detectHeaderDelimiter,
} from './toonModel/toonDelimiters';

export { analyzeTabular, type TabularShape } from './toonModel/tabularShape';
export { scanToonRow, splitRow } from './toonModel/toonRowScanner';
export { displayWidth, padToDisplayWidth } from './toonModel/displayWidth';
export { findTabularRegions, findTabularRegionsInTree } from './toonModel/tabularRegions';
export {
    decodeScalar,
    decodeTabularRow,
    decodeTabularRegion,
    readTabularArrays,
    type DecodedTabularArray,
    type TabularRecord,
} from './toonModel/tabularDecoding';

export {
    serialize,
    serializeLines,
    renderScalar,
    DEFAULT_INLINE_ARRAY_MAX_LENGTH,
    type SerializeOptions,
} from './serializer/toonSerializer';
export {
    jsonToToon,
    convertJsonDocument,
    type ConversionResult,
    type ConversionError,
    type DocumentConversionResult,
    type SourceDocument,
} from './serializer/jsonConversion';

export { toon, toonLanguage } from './language/toonLanguage';
export { buildToonTree, ToonParser, TOON_NODE_NAMES, type ToonNodeName } from './language/toonParser';

export {
    computeColumnWidths,
    alignRow,
    shrinkRow,
    alignRegion,
    shrinkRegion,
    alignDocument,
    shrinkDocument,
    type RegionRewrite,
    type DocumentRewrite,
    type LineChange,
} from './tableCommands/tableAlignment';
export {
    alignToonTables,
    shrinkToonTables,
    alignToonText,
    shrinkToonText,
    type TextRewriteResult,
} from './tableCommands/tableCommands';

export {
    TokenCounterSession,
    type TokenCountBackend,
    type TokenCounterSettings,
    type TokenCountListener,
} from './tokenCounter/tokenCounterSession';
export { TokenCounterRegistry, type TokenCounterRegistrySettings } from './tokenCounter/tokenCounterRegistry';
export { createGptTokenizerBackend } from './tokenCounter/gptTokenizerBackend';

export { resolveConfig, defaultConfig, toonToolsConfigSchema, type ToonToolsConfig, type ConfigResult } from './config';
export { createToonTools, bindToonTools, type ToonTools, type ToonToolsResult } from './toonTools';
export { logger } from './logger';
