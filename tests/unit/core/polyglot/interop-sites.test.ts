/**
 * Tests for the interop call site collector.
 */
import { describe, it, expect } from 'vitest';
import { InteropSiteCollector } from '../../../../src/core/polyglot/interop-sites.js';
import { buildTree } from '../../../helpers/polyglot.js';

describe('InteropSiteCollector', () => {
  it('should list call sites in source order across languages', () => {
    const { tree } = buildTree(
      [
        'Polyglot.export("k", 1);',
        'Polyglot.eval("python", "polyglot.import_value(name=\'k\')");',
        'Polyglot.eval("ruby", "1");',
      ].join('\n'),
      'javascript'
    );
    const collector = new InteropSiteCollector();

    tree.apply(collector);

    expect(collector.getResult()).toEqual([
      {
        kind: 'export',
        language: 'javascript',
        file: null,
        location: { line: 1, column: 1 },
        code: 'Polyglot.export("k", 1)',
        bindingName: 'k',
        target: null,
        depth: 0,
      },
      {
        kind: 'eval',
        language: 'javascript',
        file: null,
        location: { line: 2, column: 1 },
        code: 'Polyglot.eval("python", "polyglot.import_value(name=\'k\')")',
        bindingName: null,
        target: 'python',
        depth: 0,
      },
      {
        kind: 'import',
        language: 'python',
        file: null,
        location: { line: 1, column: 1 },
        code: "polyglot.import_value(name='k')",
        bindingName: 'k',
        target: null,
        depth: 1,
      },
      {
        kind: 'eval',
        language: 'javascript',
        file: null,
        location: { line: 3, column: 1 },
        code: 'Polyglot.eval("ruby", "1")',
        bindingName: null,
        target: null,
        depth: 0,
      },
    ]);
  });

  it('should return nothing for code without interop calls', () => {
    const { tree } = buildTree('int main() { return 0; }', 'c');
    const collector = new InteropSiteCollector();

    tree.apply(collector);

    expect(collector.getResult()).toEqual([]);
  });

  it('should count each boundary crossed', () => {
    const { tree } = buildTree(
      'Polyglot.eval("python", "polyglot.eval(language=\'c\', string=\'int x = 42;\')");',
      'javascript'
    );
    const collector = new InteropSiteCollector();

    tree.apply(collector);

    expect(collector.getResult().map((site) => [site.language, site.target, site.depth])).toEqual([
      ['javascript', 'python', 0],
      ['python', 'c', 1],
    ]);
  });
});
