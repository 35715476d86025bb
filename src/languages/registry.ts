/**
 * Resolution of target-language strings found in interop calls.
 */

import type { LanguageId } from './types.js';

/** Built-in spellings of each supported language. */
const LANGUAGE_NAMES: Record<string, LanguageId> = {
  python: 'python',
  js: 'javascript',
  javascript: 'javascript',
  java: 'java',
  c: 'c',
};

export const SUPPORTED_LANGUAGES: readonly LanguageId[] = ['python', 'javascript', 'java', 'c'];

/**
 * Maps a target-language string to a supported language.
 * `aliases` extend (and may shadow) the built-in spellings.
 * Returns null for unrecognized strings.
 */
export function resolveLanguage(
  name: string,
  aliases: Readonly<Record<string, LanguageId>> = {}
): LanguageId | null {
  if (Object.hasOwn(aliases, name)) {
    return aliases[name];
  }
  if (Object.hasOwn(LANGUAGE_NAMES, name)) {
    return LANGUAGE_NAMES[name];
  }
  return null;
}

const EXTENSION_LANGUAGES: Record<string, LanguageId> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.java': 'java',
  '.c': 'c',
  '.h': 'c',
};

/**
 * Guesses a file's language from its extension (including the dot).
 */
export function languageForExtension(extension: string): LanguageId | null {
  const ext = extension.toLowerCase();
  return Object.hasOwn(EXTENSION_LANGUAGES, ext) ? EXTENSION_LANGUAGES[ext] : null;
}
