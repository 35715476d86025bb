/**
 * A syntax tree spanning several languages.
 *
 * Each PolyglotTree owns one parsed fragment in one language, plus the
 * subtrees built for every evaluate call found in it. Subtrees are
 * PolyglotTrees themselves, so a build produces an ownership forest that is
 * fully materialized before the entry point returns.
 */
import type Parser from 'tree-sitter';
import {
  classifyCall,
  getAdapter,
  getBindingName,
  getCallArguments,
} from '../../languages/adapters.js';
import { resolveLanguage } from '../../languages/registry.js';
import { parseSource } from '../../languages/tree-sitter/grammars.js';
import {
  getLocation,
  getNodeId,
  getNodeText,
  type NodeId,
} from '../../languages/tree-sitter/TreeSitterUtils.js';
import type { InteropCallKind, LanguageAdapter, LanguageId } from '../../languages/types.js';
import { InvalidArgumentError } from '../../utils/errors.js';
import { dirname, readFileSync, resolvePath } from '../../utils/file-system.js';
import { resolveEvalTarget } from './argument-resolver.js';
import { buildLinks } from './builder.js';
import {
  DiagnosticCodes,
  DiagnosticsCollector,
  type DiagnosticCode,
} from './diagnostics.js';
import type { PolyglotProcessor } from './processor.js';
import { PolyglotZipper } from './zipper.js';

export const DEFAULT_MAX_DEPTH = 32;

export interface BuildOptions {
  /**
   * Directory that relative file payloads are resolved against.
   * Defaults to the process working directory; trees built from a file
   * always use that file's directory instead.
   */
  workingDir?: string;
  /** Maximum nesting depth of evaluate links (default 32) */
  maxDepth?: number;
  /** Omit file links that point back to a file being built (default true) */
  detectCycles?: boolean;
  /** Extra target-language spellings */
  aliases?: Record<string, LanguageId>;
  /** Collector shared by the whole build; one is created if omitted */
  diagnostics?: DiagnosticsCollector;
}

export interface BuildResult {
  tree: PolyglotTree | null;
  diagnostics: DiagnosticsCollector;
}

interface BuildState {
  maxDepth: number;
  detectCycles: boolean;
  aliases: Readonly<Record<string, LanguageId>>;
  diagnostics: DiagnosticsCollector;
  depth: number;
  /** Files on the construction path from the root to the current fragment */
  fileStack: readonly string[];
}

function initialState(options: BuildOptions): BuildState {
  return {
    maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
    detectCycles: options.detectCycles ?? true,
    aliases: options.aliases ?? {},
    diagnostics: options.diagnostics ?? new DiagnosticsCollector(),
    depth: 0,
    fileStack: [],
  };
}

export class PolyglotTree {
  readonly adapter: LanguageAdapter;
  private subtrees: ReadonlyMap<NodeId, PolyglotTree> = new Map();

  private constructor(
    private readonly syntaxTree: Parser.Tree,
    /** Exact source text the tree was parsed from */
    readonly code: string,
    readonly workingDir: string,
    readonly language: LanguageId,
    readonly filePath: string | null,
    readonly diagnostics: DiagnosticsCollector
  ) {
    this.adapter = getAdapter(language);
  }

  /**
   * Builds a tree from source code.
   *
   * Returns null if the parser declines to produce a tree. Failed interop
   * links inside the code never cause a null result; they are recorded in
   * `diagnostics` instead.
   *
   * @throws GrammarError if a grammar cannot be loaded into the parser
   */
  static fromCode(
    code: string,
    language: LanguageId,
    options: BuildOptions = {}
  ): PolyglotTree | null {
    const state = initialState(options);
    return PolyglotTree.build(code, language, options.workingDir ?? process.cwd(), null, state);
  }

  /**
   * Builds a tree from a file. Relative paths resolve against
   * `options.workingDir` (or the process working directory).
   *
   * Returns null, with a FILE_UNREADABLE diagnostic, if the file cannot be read.
   *
   * @throws GrammarError if a grammar cannot be loaded into the parser
   */
  static fromPath(
    filePath: string,
    language: LanguageId,
    options: BuildOptions = {}
  ): PolyglotTree | null {
    const state = initialState(options);
    const absolute = resolvePath(options.workingDir ?? process.cwd(), filePath);
    return PolyglotTree.buildFromFile(absolute, language, state);
  }

  private static buildFromFile(
    filePath: string,
    language: LanguageId,
    state: BuildState
  ): PolyglotTree | null {
    let code: string;
    try {
      code = readFileSync(filePath);
    } catch (error) {
      state.diagnostics.report({
        code: DiagnosticCodes.FILE_UNREADABLE,
        message: `unable to create tree for file ${filePath} due to the following error: ${
          error instanceof Error ? error.message : String(error)
        }`,
        language,
        file: filePath,
      });
      return null;
    }

    return PolyglotTree.build(code, language, dirname(filePath), filePath, {
      ...state,
      fileStack: [...state.fileStack, filePath],
    });
  }

  private static build(
    code: string,
    language: LanguageId,
    workingDir: string,
    filePath: string | null,
    state: BuildState
  ): PolyglotTree | null {
    const parsed = parseSource(code, language);
    if (!parsed.ok) {
      state.diagnostics.report({
        code: DiagnosticCodes.PARSE_FAILED,
        message: `parser produced no tree: ${parsed.error}`,
        language,
        ...(filePath ? { file: filePath } : {}),
      });
      return null;
    }

    const tree = new PolyglotTree(
      parsed.tree,
      code,
      workingDir,
      language,
      filePath,
      state.diagnostics
    );

    tree.subtrees = buildLinks(tree.rootNode, {
      isEvalCall: (node) => tree.isEvalCall(node),
      makeSubtree: (node) => tree.makeSubtree(node, state),
      onFailure: (node) => {
        const { line, column } = getLocation(node);
        tree.report(
          DiagnosticCodes.SUBTREE_FAILED,
          `unable to make subtree for polyglot call at position ${line}:${column}`,
          node
        );
      },
    });
    return tree;
  }

  private makeSubtree(node: Parser.SyntaxNode, state: BuildState): PolyglotTree | null {
    const args = getCallArguments(this.adapter, node);
    if (!args) {
      this.report(
        DiagnosticCodes.MALFORMED_CALL,
        'polyglot call arguments do not have the expected shape',
        node
      );
      return null;
    }

    const target = resolveEvalTarget(
      {
        adapter: this.adapter,
        source: this.code,
        workingDir: this.workingDir,
        report: (code, message, at) => this.report(code, message, at),
      },
      args
    );
    if (!target) {
      return null;
    }

    const language = resolveLanguage(target.language, state.aliases);
    if (!language) {
      this.report(
        DiagnosticCodes.UNKNOWN_LANGUAGE,
        `could not convert argument '${target.language}' to a supported language`,
        node
      );
      return null;
    }

    if (state.depth + 1 > state.maxDepth) {
      this.report(
        DiagnosticCodes.DEPTH_LIMIT,
        `polyglot nesting deeper than ${state.maxDepth} levels`,
        node
      );
      return null;
    }
    const childState: BuildState = { ...state, depth: state.depth + 1 };

    const { payload } = target;
    if (payload.kind === 'inline') {
      // Inline code keeps resolving files against this fragment's directory
      return PolyglotTree.build(payload.code, language, this.workingDir, null, childState);
    }

    if (state.detectCycles && state.fileStack.includes(payload.path)) {
      this.report(
        DiagnosticCodes.CYCLE,
        `file ${payload.path} is already being built higher up this polyglot chain`,
        node
      );
      return null;
    }
    return PolyglotTree.buildFromFile(payload.path, language, childState);
  }

  private report(code: DiagnosticCode, message: string, node: Parser.SyntaxNode): void {
    this.diagnostics.report({
      code,
      message,
      language: this.language,
      location: getLocation(node),
      ...(this.filePath ? { file: this.filePath } : {}),
    });
  }

  /**
   * Applies the processor to the tree, starting from the root.
   */
  apply(processor: PolyglotProcessor): void {
    processor.process(PolyglotZipper.fromTree(this));
  }

  get rootNode(): Parser.SyntaxNode {
    return this.syntaxTree.rootNode;
  }

  /** Number of evaluate calls in this fragment that have a subtree */
  get subtreeCount(): number {
    return this.subtrees.size;
  }

  /** Direct subtrees, in source order of their call sites */
  getSubtrees(): PolyglotTree[] {
    return Array.from(this.subtrees.values());
  }

  /**
   * The subtree linked to an evaluate call node of this tree.
   * `node` must come from this tree.
   */
  getSubtree(node: Parser.SyntaxNode): PolyglotTree | undefined {
    return this.subtrees.get(getNodeId(node));
  }

  nodeText(node: Parser.SyntaxNode): string {
    return getNodeText(node, this.code);
  }

  classifyCall(node: Parser.SyntaxNode): InteropCallKind | null {
    return classifyCall(this.adapter, node, this.code);
  }

  isEvalCall(node: Parser.SyntaxNode): boolean {
    return this.classifyCall(node) === 'eval';
  }

  isImportCall(node: Parser.SyntaxNode): boolean {
    return this.classifyCall(node) === 'import';
  }

  isExportCall(node: Parser.SyntaxNode): boolean {
    return this.classifyCall(node) === 'export';
  }

  /**
   * Binding name of an import or export call; null when the language
   * gives it no static name.
   *
   * @throws InvalidArgumentError if `node` is neither an import nor an export call
   */
  bindingName(node: Parser.SyntaxNode): string | null {
    const kind = this.classifyCall(node);
    if (kind !== 'import' && kind !== 'export') {
      throw new InvalidArgumentError(
        `binding name requested for a node that is not a polyglot import or export call`,
        { kind: node.type, location: getLocation(node) }
      );
    }
    return getBindingName(this.adapter, node, this.code);
  }
}

/**
 * Builds a tree from code and returns it together with its diagnostics.
 */
export function buildPolyglotTree(
  code: string,
  language: LanguageId,
  options: BuildOptions = {}
): BuildResult {
  const diagnostics = options.diagnostics ?? new DiagnosticsCollector();
  const tree = PolyglotTree.fromCode(code, language, { ...options, diagnostics });
  return { tree, diagnostics };
}

/**
 * Builds a tree from a file and returns it together with its diagnostics.
 */
export function buildPolyglotTreeFromPath(
  filePath: string,
  language: LanguageId,
  options: BuildOptions = {}
): BuildResult {
  const diagnostics = options.diagnostics ?? new DiagnosticsCollector();
  const tree = PolyglotTree.fromPath(filePath, language, { ...options, diagnostics });
  return { tree, diagnostics };
}
