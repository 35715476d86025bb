/**
 * Helpers shared by the tree-building commands.
 */
import * as path from 'node:path';
import { loadConfig, toBuildOptions } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import {
  buildPolyglotTreeFromPath,
  type BuildResult,
} from '../../core/polyglot/polyglot-tree.js';
import { formatDiagnostic } from '../../core/polyglot/diagnostics.js';
import { SUPPORTED_LANGUAGES, languageForExtension, resolveLanguage } from '../../languages/registry.js';
import type { LanguageId } from '../../languages/types.js';
import { ErrorCodes, PolyglotError } from '../../utils/errors.js';
import { logger as log } from '../../utils/logger.js';

export interface TreeCommandOptions {
  lang?: string;
  config: string;
}

/**
 * Picks the language from `--lang`, or from the file extension.
 */
export function resolveFileLanguage(
  file: string,
  lang: string | undefined,
  config: Config
): LanguageId {
  if (lang) {
    const language = resolveLanguage(lang, config.language_aliases);
    if (!language) {
      throw new PolyglotError(
        ErrorCodes.UNSUPPORTED_LANGUAGE,
        `Unsupported language: ${lang} (expected one of ${SUPPORTED_LANGUAGES.join(', ')})`
      );
    }
    return language;
  }

  const language = languageForExtension(path.extname(file));
  if (!language) {
    throw new PolyglotError(
      ErrorCodes.UNSUPPORTED_LANGUAGE,
      `Cannot infer the language of ${file}; pass --lang`
    );
  }
  return language;
}

/**
 * Loads config, builds the forest for `file` and reports diagnostics.
 * Throws when the root tree itself cannot be built.
 */
export async function buildTreeForCommand(
  file: string,
  options: TreeCommandOptions
): Promise<BuildResult & { tree: NonNullable<BuildResult['tree']> }> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  log.setLevel(config.log_level);

  const language = resolveFileLanguage(file, options.lang, config);
  const { tree, diagnostics } = buildPolyglotTreeFromPath(
    path.resolve(projectRoot, file),
    language,
    toBuildOptions(config)
  );

  for (const diagnostic of diagnostics.diagnostics) {
    log.warn(formatDiagnostic(diagnostic));
  }

  if (!tree) {
    throw new PolyglotError(ErrorCodes.FILE_NOT_FOUND, `Unable to build a tree for ${file}`);
  }
  return { tree, diagnostics };
}
