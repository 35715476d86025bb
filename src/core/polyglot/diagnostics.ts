/**
 * Diagnostics for interop links that could not be built.
 *
 * A failed link never aborts construction; it is recorded here and the
 * link is left out of the tree.
 */
import type { LanguageId } from '../../languages/types.js';
import type { SourceLocation } from '../../languages/tree-sitter/TreeSitterUtils.js';
import { logger } from '../../utils/logger.js';

export const DiagnosticCodes = {
  UNKNOWN_LANGUAGE: 'UNKNOWN_LANGUAGE',
  UNKNOWN_ARGUMENT: 'UNKNOWN_ARGUMENT',
  UNKNOWN_CALL_FORM: 'UNKNOWN_CALL_FORM',
  MISSING_LANGUAGE: 'MISSING_LANGUAGE',
  MISSING_PAYLOAD: 'MISSING_PAYLOAD',
  MALFORMED_CALL: 'MALFORMED_CALL',
  FILE_UNREADABLE: 'FILE_UNREADABLE',
  PARSE_FAILED: 'PARSE_FAILED',
  DEPTH_LIMIT: 'DEPTH_LIMIT',
  CYCLE: 'CYCLE',
  SUBTREE_FAILED: 'SUBTREE_FAILED',
} as const;

export type DiagnosticCode = (typeof DiagnosticCodes)[keyof typeof DiagnosticCodes];

export interface Diagnostic {
  code: DiagnosticCode;
  message: string;
  /** Language of the fragment the problem was found in */
  language: LanguageId;
  /** File the fragment came from, when it came from a file */
  file?: string;
  location?: SourceLocation;
}

/**
 * Collects diagnostics for a whole forest build.
 */
export class DiagnosticsCollector {
  private readonly items: Diagnostic[] = [];

  report(diagnostic: Diagnostic): void {
    this.items.push(diagnostic);
    logger.child('polyglot').debug(formatDiagnostic(diagnostic));
  }

  get diagnostics(): readonly Diagnostic[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  hasCode(code: DiagnosticCode): boolean {
    return this.items.some((d) => d.code === code);
  }

  byCode(code: DiagnosticCode): Diagnostic[] {
    return this.items.filter((d) => d.code === code);
  }
}

/**
 * Formats a diagnostic as `file:line:column [CODE] message`.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = [
    diagnostic.file ?? `<${diagnostic.language}>`,
    diagnostic.location ? `${diagnostic.location.line}:${diagnostic.location.column}` : null,
  ]
    .filter((part): part is string => part !== null)
    .join(':');
  return `${where} [${diagnostic.code}] ${diagnostic.message}`;
}
