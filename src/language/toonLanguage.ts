import { defineLanguageFacet, Language, languageDataProp, LanguageSupport } from '@codemirror/language';
import { ToonParser, toonNodeSet } from './toonParser';

const toonLanguageData = defineLanguageFacet();

/**
 * CodeMirror language for TOON documents. Provides the syntax tree that
 * `ensureSyntaxTree()` returns for states using `toon()`.
 */
export const toonLanguage = new Language(
    toonLanguageData,
    new ToonParser(toonNodeSet.extend(languageDataProp.add({ Document: toonLanguageData }))),
    [],
    'toon'
);

export function toon(): LanguageSupport {
    return new LanguageSupport(toonLanguage);
}
