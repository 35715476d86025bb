/**
 * Grammar loading and parsing.
 *
 * One parser per language is created lazily and reused. A grammar that
 * cannot be installed into a parser is a GrammarError and is never absorbed.
 */

import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import JavaScript from 'tree-sitter-javascript';
import Java from 'tree-sitter-java';
import C from 'tree-sitter-c';
import type { LanguageId } from '../types.js';
import { GrammarError } from '../../utils/errors.js';

type Grammar = Parameters<Parser['setLanguage']>[0];

const GRAMMARS: Record<LanguageId, Grammar> = {
  python: Python as unknown as Grammar,
  javascript: JavaScript as unknown as Grammar,
  java: Java as unknown as Grammar,
  c: C as unknown as Grammar,
};

const parsers = new Map<LanguageId, Parser>();

/**
 * Creates a parser with the grammar for `language` installed.
 */
export function createParser(language: LanguageId): Parser {
  const parser = new Parser();
  try {
    parser.setLanguage(GRAMMARS[language]);
  } catch (error) {
    throw new GrammarError(
      `Error loading the ${language} grammar into the parser; check that tree-sitter and the grammar packages are compatible versions`,
      { language, error: error instanceof Error ? error.message : String(error) }
    );
  }
  return parser;
}

function getParser(language: LanguageId): Parser {
  let parser = parsers.get(language);
  if (!parser) {
    parser = createParser(language);
    parsers.set(language, parser);
  }
  return parser;
}

/**
 * Result of parsing one fragment. `error` is set when the parser declined.
 */
export type ParseOutcome =
  | { ok: true; tree: Parser.Tree }
  | { ok: false; error: string };

/**
 * Parses `source` as `language`.
 * Parser failures are reported as an outcome; grammar failures throw.
 */
export function parseSource(source: string, language: LanguageId): ParseOutcome {
  const parser = getParser(language);
  try {
    // The binding's default input buffer rejects sources past 32K code units.
    const tree = parser.parse(source, undefined, { bufferSize: source.length * 2 + 1 });
    return { ok: true, tree };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}
