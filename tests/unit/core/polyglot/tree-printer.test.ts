/**
 * Tests for the outline printer.
 */
import { describe, it, expect } from 'vitest';
import { TreePrinter } from '../../../../src/core/polyglot/tree-printer.js';
import { buildTree } from '../../../helpers/polyglot.js';

describe('TreePrinter', () => {
  it('should print leaves with their source text', () => {
    const { tree } = buildTree('print(x)', 'python');
    const printer = new TreePrinter();

    tree.apply(printer);

    expect(printer.getResult().split('\n')).toEqual([
      'module',
      '  expression_statement',
      '    call',
      '      identifier "print"',
      '      argument_list',
      '        ( "("',
      '        identifier "x"',
      '        ) ")"',
    ]);
  });

  it('should continue into the subtree of an evaluate call', () => {
    const { tree } = buildTree('Polyglot.eval("python", "x");', 'javascript');
    const printer = new TreePrinter();

    tree.apply(printer);

    expect(printer.getResult().split('\n')).toEqual([
      'program',
      '  expression_statement',
      '    interop-evaluate-call',
      '      module',
      '        expression_statement',
      '          identifier "x"',
      '    ; ";"',
    ]);
  });

  it('should use a custom indent', () => {
    const { tree } = buildTree('a;', 'javascript');
    const printer = new TreePrinter({ indent: '.' });

    tree.apply(printer);

    expect(printer.getResult()).toBe('program\n.expression_statement\n..identifier "a"\n..; ";"');
  });

  it('should start over on each run', () => {
    const { tree } = buildTree('a;', 'javascript');
    const printer = new TreePrinter();

    tree.apply(printer);
    const first = printer.getResult();
    tree.apply(printer);

    expect(printer.getResult()).toBe(first);
  });
});
