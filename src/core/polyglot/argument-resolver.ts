/**
 * Resolution of an evaluate call's arguments into a target language and a
 * payload (inline code or a file path).
 */
import type Parser from 'tree-sitter';
import type {
  CallArguments,
  LanguageAdapter,
  NamedAdapter,
} from '../../languages/types.js';
import { getNodeText } from '../../languages/tree-sitter/TreeSitterUtils.js';
import { stripQuotes } from '../../utils/string.js';
import { resolvePath } from '../../utils/file-system.js';
import { DiagnosticCodes, type DiagnosticCode } from './diagnostics.js';

export type EvalPayload =
  | { kind: 'inline'; code: string }
  | { kind: 'file'; path: string };

export interface EvalTarget {
  /** Target language exactly as spelled in the call, unquoted */
  language: string;
  payload: EvalPayload;
}

export interface ResolverContext {
  adapter: LanguageAdapter;
  source: string;
  /** Directory that relative file payloads are resolved against */
  workingDir: string;
  report(code: DiagnosticCode, message: string, node: Parser.SyntaxNode): void;
}

/**
 * Resolves the arguments of an evaluate call.
 * Returns null (after reporting why) when the call cannot be resolved.
 */
export function resolveEvalTarget(
  ctx: ResolverContext,
  args: CallArguments
): EvalTarget | null {
  if (args.style === 'positional') {
    return resolvePositional(ctx, args.language, args.payload, args.callForm);
  }
  if (ctx.adapter.argumentStyle !== 'named') {
    return null;
  }
  return resolveNamed(ctx, ctx.adapter, [args.first, args.second]);
}

function literal(ctx: ResolverContext, node: Parser.SyntaxNode): string {
  return stripQuotes(getNodeText(node, ctx.source));
}

function resolvePositional(
  ctx: ResolverContext,
  languageNode: Parser.SyntaxNode,
  payloadNode: Parser.SyntaxNode,
  callFormNode: Parser.SyntaxNode | null
): EvalTarget | null {
  const language = literal(ctx, languageNode);
  const value = literal(ctx, payloadNode);
  const forms = ctx.adapter.argumentStyle === 'positional' ? ctx.adapter.callForms : null;

  if (!callFormNode || !forms) {
    return { language, payload: { kind: 'inline', code: value } };
  }

  const callForm = getNodeText(callFormNode, ctx.source);
  if (callForm === forms.inline) {
    return { language, payload: { kind: 'inline', code: value } };
  }
  if (callForm === forms.file) {
    return { language, payload: { kind: 'file', path: resolvePath(ctx.workingDir, value) } };
  }

  ctx.report(
    DiagnosticCodes.UNKNOWN_CALL_FORM,
    `unrecognized polyglot call form '${callForm}'`,
    callFormNode
  );
  return null;
}

function resolveNamed(
  ctx: ResolverContext,
  adapter: NamedAdapter,
  names: Parser.SyntaxNode[]
): EvalTarget | null {
  let language: string | null = null;
  let code: string | null = null;
  let path: string | null = null;

  for (const nameNode of names) {
    // name, '=', value
    const valueNode = nameNode.nextSibling?.nextSibling;
    if (!valueNode) {
      ctx.report(
        DiagnosticCodes.MALFORMED_CALL,
        `polyglot call argument '${getNodeText(nameNode, ctx.source)}' has no value`,
        nameNode
      );
      return null;
    }

    const name = getNodeText(nameNode, ctx.source);
    const value = literal(ctx, valueNode);

    if (name === adapter.argumentNames.path) {
      path = resolvePath(ctx.workingDir, value);
    } else if (name === adapter.argumentNames.language) {
      language = value;
    } else if (name === adapter.argumentNames.code) {
      code = value;
    } else {
      ctx.report(
        DiagnosticCodes.UNKNOWN_ARGUMENT,
        `unable to handle polyglot call argument '${name}'`,
        nameNode
      );
      return null;
    }
  }

  if (language === null) {
    ctx.report(
      DiagnosticCodes.MISSING_LANGUAGE,
      'no language argument provided for polyglot call',
      names[0]
    );
    return null;
  }
  if (code !== null) {
    return { language, payload: { kind: 'inline', code } };
  }
  if (path !== null) {
    return { language, payload: { kind: 'file', path } };
  }

  ctx.report(
    DiagnosticCodes.MISSING_PAYLOAD,
    `no ${adapter.argumentNames.path} or ${adapter.argumentNames.code} argument provided to ${adapter.displayName} polyglot call`,
    names[0]
  );
  return null;
}
