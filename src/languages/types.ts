/**
 * Language adapter types.
 *
 * An adapter describes how interop calls are shaped in one language's
 * concrete syntax tree. Adapters are plain data; the behaviour that depends
 * on a language's grammar is dispatched on `id` in adapters.ts.
 */
import type Parser from 'tree-sitter';

/** Languages a polyglot tree can be built for. */
export type LanguageId = 'python' | 'javascript' | 'java' | 'c';

/** The three interop call families. */
export type InteropCallKind = 'eval' | 'import' | 'export';

/** Literal spellings of the interop callees in one language. */
export interface InteropCallees {
  eval: readonly string[];
  import: readonly string[];
  export: readonly string[];
}

interface AdapterBase {
  id: LanguageId;
  displayName: string;
  /** Node kind of a call expression */
  callNodeKind: string;
  /** Child position of the callee inside a call node */
  calleeIndex: number;
  /** Node kind expected at `calleeIndex` */
  calleeKind: string;
  callees: InteropCallees;
  /** Node kinds of string literals (used for binding names) */
  stringLiteralKinds: readonly string[];
}

/**
 * Arguments are read by position: target language first, payload second.
 * `callForms` is present when inline code and files use different callees.
 */
export interface PositionalAdapter extends AdapterBase {
  argumentStyle: 'positional';
  callForms: { inline: string; file: string } | null;
}

/**
 * Arguments are `name = value` pairs whose role is known only from the name.
 */
export interface NamedAdapter extends AdapterBase {
  argumentStyle: 'named';
  argumentNames: { code: string; path: string; language: string };
}

export type LanguageAdapter = PositionalAdapter | NamedAdapter;

/**
 * Argument nodes of an evaluate call, as laid out by the adapter.
 */
export type CallArguments =
  | {
      style: 'positional';
      language: Parser.SyntaxNode;
      payload: Parser.SyntaxNode;
      /** Node naming the call form, for adapters with `callForms` */
      callForm: Parser.SyntaxNode | null;
    }
  | {
      style: 'named';
      /** Name tokens of the two keyword arguments */
      first: Parser.SyntaxNode;
      second: Parser.SyntaxNode;
    };
