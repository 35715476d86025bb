/**
 * Built-in language adapters and the functions that interpret them.
 *
 * Every structural lookup fails soft: a missing child at an expected offset
 * means "not a call of this kind" and yields null.
 */
import type Parser from 'tree-sitter';
import { getNodeText } from './tree-sitter/TreeSitterUtils.js';
import { stripQuotes } from '../utils/string.js';
import type {
  CallArguments,
  InteropCallKind,
  LanguageAdapter,
  LanguageId,
  NamedAdapter,
  PositionalAdapter,
} from './types.js';

export const PYTHON_ADAPTER: NamedAdapter = {
  id: 'python',
  displayName: 'Python',
  callNodeKind: 'call',
  calleeIndex: 0,
  calleeKind: 'attribute',
  callees: {
    eval: ['polyglot.eval'],
    import: ['polyglot.import_value'],
    export: ['polyglot.export_value'],
  },
  stringLiteralKinds: ['string'],
  argumentStyle: 'named',
  argumentNames: { code: 'string', path: 'path', language: 'language' },
};

export const JAVASCRIPT_ADAPTER: PositionalAdapter = {
  id: 'javascript',
  displayName: 'JavaScript',
  callNodeKind: 'call_expression',
  calleeIndex: 0,
  calleeKind: 'member_expression',
  callees: {
    eval: ['Polyglot.eval', 'Polyglot.evalFile'],
    import: ['Polyglot.import'],
    export: ['Polyglot.export'],
  },
  stringLiteralKinds: ['string', 'template_string'],
  argumentStyle: 'positional',
  callForms: { inline: 'eval', file: 'evalFile' },
};

/** Java support covers string literal arguments only. */
export const JAVA_ADAPTER: PositionalAdapter = {
  id: 'java',
  displayName: 'Java',
  callNodeKind: 'method_invocation',
  calleeIndex: 2,
  calleeKind: 'identifier',
  callees: {
    eval: ['eval'],
    import: ['getMember'],
    export: ['putMember'],
  },
  stringLiteralKinds: ['string_literal'],
  argumentStyle: 'positional',
  callForms: null,
};

export const C_ADAPTER: PositionalAdapter = {
  id: 'c',
  displayName: 'C',
  callNodeKind: 'call_expression',
  calleeIndex: 0,
  calleeKind: 'identifier',
  callees: {
    eval: ['polyglot_eval', 'polyglot_eval_file'],
    import: ['polyglot_import'],
    export: ['polyglot_export'],
  },
  stringLiteralKinds: ['string_literal'],
  argumentStyle: 'positional',
  callForms: { inline: 'polyglot_eval', file: 'polyglot_eval_file' },
};

export const LANGUAGE_ADAPTERS: Record<LanguageId, LanguageAdapter> = {
  python: PYTHON_ADAPTER,
  javascript: JAVASCRIPT_ADAPTER,
  java: JAVA_ADAPTER,
  c: C_ADAPTER,
};

export function getAdapter(language: LanguageId): LanguageAdapter {
  return LANGUAGE_ADAPTERS[language];
}

/**
 * Returns the callee node when `node` has the adapter's call shape.
 */
export function getCalleeNode(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode
): Parser.SyntaxNode | null {
  if (node.type !== adapter.callNodeKind) {
    return null;
  }
  const callee = node.child(adapter.calleeIndex);
  if (!callee || callee.type !== adapter.calleeKind) {
    return null;
  }
  return callee;
}

/**
 * Classifies a callee's source text into an interop call family.
 */
export function classifyCallee(
  adapter: LanguageAdapter,
  calleeText: string
): InteropCallKind | null {
  if (adapter.callees.eval.includes(calleeText)) return 'eval';
  if (adapter.callees.import.includes(calleeText)) return 'import';
  if (adapter.callees.export.includes(calleeText)) return 'export';
  return null;
}

/**
 * Classifies a node, or returns null when it is not an interop call.
 */
export function classifyCall(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode,
  source: string
): InteropCallKind | null {
  const callee = getCalleeNode(adapter, node);
  if (!callee) {
    return null;
  }
  return classifyCallee(adapter, getNodeText(callee, source));
}

/**
 * Extracts the argument nodes of an evaluate call.
 */
export function getCallArguments(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode
): CallArguments | null {
  const id = adapter.id;
  switch (id) {
    case 'python': {
      const first = node.child(1)?.child(1)?.child(0);
      const second = node.child(1)?.child(3)?.child(0);
      if (!first || !second) return null;
      return { style: 'named', first, second };
    }
    case 'javascript': {
      // Polyglot.eval / Polyglot.evalFile: the property names the call form
      const callForm = node.child(0)?.child(2);
      const language = node.child(1)?.child(1);
      const payload = node.child(1)?.child(3);
      if (!callForm || !language || !payload) return null;
      return { style: 'positional', language, payload, callForm };
    }
    case 'java': {
      const language = node.child(3)?.child(1);
      const payload = node.child(3)?.child(3);
      if (!language || !payload) return null;
      return { style: 'positional', language, payload, callForm: null };
    }
    case 'c': {
      const callForm = node.child(0);
      const language = node.child(1)?.child(1);
      const payload = node.child(1)?.child(3);
      if (!callForm || !language || !payload) return null;
      return { style: 'positional', language, payload, callForm };
    }
    default: {
      const unreachable: never = id;
      return unreachable;
    }
  }
}

/**
 * Extracts the binding name of an import or export call.
 * Returns null when the name is not a string literal.
 */
export function getBindingName(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode,
  source: string
): string | null {
  const id = adapter.id;
  switch (id) {
    case 'python':
      return getPythonBindingName(adapter, node, source);
    case 'javascript':
    case 'c':
      return literalText(adapter, node.child(1)?.child(1), source);
    case 'java':
      return literalText(adapter, node.child(3)?.child(1), source);
    default: {
      const unreachable: never = id;
      return unreachable;
    }
  }
}

/**
 * `polyglot.import_value(name="x")`, `polyglot.export_value(value, name="x")`
 * or the positional form with the name first.
 */
function getPythonBindingName(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode,
  source: string
): string | null {
  const args = node.child(1);
  if (!args) return null;

  for (const arg of args.namedChildren) {
    if (arg.type !== 'keyword_argument') continue;
    const name = arg.child(0);
    if (name && getNodeText(name, source) === 'name') {
      return literalText(adapter, arg.child(2), source);
    }
  }

  return literalText(adapter, args.namedChildren[0], source);
}

function literalText(
  adapter: LanguageAdapter,
  node: Parser.SyntaxNode | null | undefined,
  source: string
): string | null {
  if (!node || !adapter.stringLiteralKinds.includes(node.type)) {
    return null;
  }
  return stripQuotes(getNodeText(node, source));
}
