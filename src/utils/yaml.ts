/**
 * YAML documents validated against zod schemas.
 */
import { parse } from 'yaml';
import type { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

/**
 * Parse YAML text and validate it with `schema`.
 *
 * @throws SystemError PARSE_ERROR for malformed YAML, INVALID_CONFIG when validation fails
 */
export function parseYamlWithSchema<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> {
  let parsed: unknown;
  try {
    parsed = parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new SystemError(
      ErrorCodes.INVALID_CONFIG,
      `YAML validation failed: ${formatIssues(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}

/**
 * Read a YAML file and validate it with `schema`.
 * Errors carry the file path.
 */
export async function loadYamlWithSchema<T extends z.ZodTypeAny>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch (error) {
    throw new SystemError(ErrorCodes.PARSE_ERROR, `Failed to load YAML file: ${filePath}`, {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, {
        ...error.details,
        filePath,
      });
    }
    throw error;
  }
}
