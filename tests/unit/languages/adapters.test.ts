/**
 * Tests for the built-in language adapters.
 * Parses real snippets with each grammar and checks the call-shape lookups.
 */
import { describe, it, expect } from 'vitest';
import type Parser from 'tree-sitter';
import {
  C_ADAPTER,
  JAVASCRIPT_ADAPTER,
  JAVA_ADAPTER,
  PYTHON_ADAPTER,
  classifyCall,
  classifyCallee,
  getAdapter,
  getBindingName,
  getCallArguments,
  getCalleeNode,
} from '../../../src/languages/adapters.js';
import { createParser } from '../../../src/languages/tree-sitter/grammars.js';
import { getNodeText } from '../../../src/languages/tree-sitter/TreeSitterUtils.js';
import type { LanguageAdapter, LanguageId } from '../../../src/languages/types.js';

function findFirst(node: Parser.SyntaxNode, type: string): Parser.SyntaxNode | null {
  if (node.type === type) return node;
  for (const child of node.children) {
    const found = findFirst(child, type);
    if (found) return found;
  }
  return null;
}

/**
 * Parses `source` and returns the first call node of the adapter's kind.
 */
function firstCall(language: LanguageId, source: string): Parser.SyntaxNode {
  const adapter = getAdapter(language);
  const tree = createParser(language).parse(source);
  const call = findFirst(tree.rootNode, adapter.callNodeKind);
  if (!call) throw new Error(`no ${adapter.callNodeKind} in ${source}`);
  return call;
}

function text(source: string, node: Parser.SyntaxNode | null | undefined): string | null {
  return node ? getNodeText(node, source) : null;
}

describe('getAdapter', () => {
  it('should return the adapter for each language', () => {
    expect(getAdapter('python')).toBe(PYTHON_ADAPTER);
    expect(getAdapter('javascript')).toBe(JAVASCRIPT_ADAPTER);
    expect(getAdapter('java')).toBe(JAVA_ADAPTER);
    expect(getAdapter('c')).toBe(C_ADAPTER);
  });

  it('should mark python as the only named-argument language', () => {
    const styles = (['python', 'javascript', 'java', 'c'] as const).map(
      (id) => getAdapter(id).argumentStyle
    );
    expect(styles).toEqual(['named', 'positional', 'positional', 'positional']);
  });
});

describe('classifyCallee', () => {
  const cases: Array<[LanguageAdapter, string, string | null]> = [
    [PYTHON_ADAPTER, 'polyglot.eval', 'eval'],
    [PYTHON_ADAPTER, 'polyglot.import_value', 'import'],
    [PYTHON_ADAPTER, 'polyglot.export_value', 'export'],
    [PYTHON_ADAPTER, 'polyglot.evaluate', null],
    [JAVASCRIPT_ADAPTER, 'Polyglot.eval', 'eval'],
    [JAVASCRIPT_ADAPTER, 'Polyglot.evalFile', 'eval'],
    [JAVASCRIPT_ADAPTER, 'Polyglot.import', 'import'],
    [JAVASCRIPT_ADAPTER, 'Polyglot.export', 'export'],
    [JAVASCRIPT_ADAPTER, 'polyglot.eval', null],
    [JAVA_ADAPTER, 'eval', 'eval'],
    [JAVA_ADAPTER, 'getMember', 'import'],
    [JAVA_ADAPTER, 'putMember', 'export'],
    [C_ADAPTER, 'polyglot_eval', 'eval'],
    [C_ADAPTER, 'polyglot_eval_file', 'eval'],
    [C_ADAPTER, 'polyglot_import', 'import'],
    [C_ADAPTER, 'polyglot_export', 'export'],
    [C_ADAPTER, 'printf', null],
  ];

  it.each(cases)('%# classifies %s', (adapter, callee, expected) => {
    expect(classifyCallee(adapter, callee)).toBe(expected);
  });
});

describe('getCalleeNode', () => {
  it('should return the attribute of a python call', () => {
    const source = 'polyglot.eval(language="js", string="1")';
    const callee = getCalleeNode(PYTHON_ADAPTER, firstCall('python', source));
    expect(text(source, callee)).toBe('polyglot.eval');
  });

  it('should reject a python call whose callee is a bare identifier', () => {
    const source = 'print(42)';
    expect(getCalleeNode(PYTHON_ADAPTER, firstCall('python', source))).toBeNull();
  });

  it('should return the method name of a java invocation', () => {
    const source = 'class A { void f() { context.eval("js", "1"); } }';
    const callee = getCalleeNode(JAVA_ADAPTER, firstCall('java', source));
    expect(text(source, callee)).toBe('eval');
  });

  it('should reject a node of another kind', () => {
    const tree = createParser('c').parse('int x = 1;');
    expect(getCalleeNode(C_ADAPTER, tree.rootNode)).toBeNull();
  });
});

describe('classifyCall', () => {
  it('should classify a javascript member call', () => {
    const source = 'Polyglot.import("answer");';
    expect(classifyCall(JAVASCRIPT_ADAPTER, firstCall('javascript', source), source)).toBe('import');
  });

  it('should return null for an ordinary call', () => {
    const source = 'console.log(42);';
    expect(classifyCall(JAVASCRIPT_ADAPTER, firstCall('javascript', source), source)).toBeNull();
  });
});

describe('getCallArguments', () => {
  it('should return the keyword names of a python call', () => {
    const source = 'polyglot.eval(language="js", string="console.log(1)")';
    const args = getCallArguments(PYTHON_ADAPTER, firstCall('python', source));

    expect(args?.style).toBe('named');
    if (args?.style !== 'named') return;
    expect(text(source, args.first)).toBe('language');
    expect(text(source, args.second)).toBe('string');
  });

  it('should return language, payload and call form for javascript', () => {
    const source = 'Polyglot.evalFile("python", "guest.py");';
    const args = getCallArguments(JAVASCRIPT_ADAPTER, firstCall('javascript', source));

    expect(args?.style).toBe('positional');
    if (args?.style !== 'positional') return;
    expect(text(source, args.language)).toBe('"python"');
    expect(text(source, args.payload)).toBe('"guest.py"');
    expect(text(source, args.callForm)).toBe('evalFile');
  });

  it('should return no call form for java', () => {
    const source = 'class A { void f() { context.eval("python", "print(1)"); } }';
    const args = getCallArguments(JAVA_ADAPTER, firstCall('java', source));

    expect(args?.style).toBe('positional');
    if (args?.style !== 'positional') return;
    expect(text(source, args.language)).toBe('"python"');
    expect(text(source, args.payload)).toBe('"print(1)"');
    expect(args.callForm).toBeNull();
  });

  it('should use the callee identifier as the call form for c', () => {
    const source = 'void main() { polyglot_eval("python", "print(1)"); }';
    const args = getCallArguments(C_ADAPTER, firstCall('c', source));

    expect(args?.style).toBe('positional');
    if (args?.style !== 'positional') return;
    expect(text(source, args.callForm)).toBe('polyglot_eval');
    expect(text(source, args.language)).toBe('"python"');
    expect(text(source, args.payload)).toBe('"print(1)"');
  });

  it('should fail soft when an argument is missing', () => {
    const source = 'Polyglot.eval("python");';
    expect(getCallArguments(JAVASCRIPT_ADAPTER, firstCall('javascript', source))).toBeNull();
  });

  it('should fail soft when a python call has a single argument', () => {
    const source = 'polyglot.eval(language="js")';
    expect(getCallArguments(PYTHON_ADAPTER, firstCall('python', source))).toBeNull();
  });
});

describe('getBindingName', () => {
  it('should read a javascript import name', () => {
    const source = 'Polyglot.import("answer");';
    expect(getBindingName(JAVASCRIPT_ADAPTER, firstCall('javascript', source), source)).toBe('answer');
  });

  it('should return null for a javascript binding held in a variable', () => {
    const source = 'Polyglot.import(name);';
    expect(getBindingName(JAVASCRIPT_ADAPTER, firstCall('javascript', source), source)).toBeNull();
  });

  it('should read a c export name', () => {
    const source = 'void main() { polyglot_export("x", x); }';
    expect(getBindingName(C_ADAPTER, firstCall('c', source), source)).toBe('x');
  });

  it('should read a java member name', () => {
    const source = 'class A { void f() { bindings.getMember("x"); } }';
    expect(getBindingName(JAVA_ADAPTER, firstCall('java', source), source)).toBe('x');
  });

  it('should prefer the python name keyword', () => {
    const source = 'polyglot.export_value(x, name="answer")';
    expect(getBindingName(PYTHON_ADAPTER, firstCall('python', source), source)).toBe('answer');
  });

  it('should fall back to the first positional python argument', () => {
    const source = "polyglot.import_value('answer')";
    expect(getBindingName(PYTHON_ADAPTER, firstCall('python', source), source)).toBe('answer');
  });

  it('should return null when the python name is not a literal', () => {
    const source = 'polyglot.import_value(key)';
    expect(getBindingName(PYTHON_ADAPTER, firstCall('python', source), source)).toBeNull();
  });
});
