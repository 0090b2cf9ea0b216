/**
 * Friendly Errors
 *
 * Standard utility for parsing YAML + Zod validation with human-readable errors.
 *
 * USAGE: Use this utility when parsing user-facing files (fabric-promote.yaml)
 * so every problem is reported with its path instead of a raw stack trace.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, DeployConfigFileSchema, "fabric-promote.yaml");
 * if (!result.success) {
 *   throw new ConfigurationError(result.error.message, { issues: result.error.details });
 * }
 * const data = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

/**
 * One line per issue, prefixed with the dotted path when there is one.
 * `describePath` lets callers rename paths (e.g. to the env var that feeds them).
 */
export function formatZodIssues(
  error: ZodError,
  describePath: (path: string) => string = (path) => path
): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${describePath(issue.path.join("."))}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // Keep the first line; the rest is a code frame
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Parse YAML content and validate against a Zod schema.
 * Returns a result object with friendly error messages.
 *
 * @param content - Raw YAML string
 * @param schema - Zod schema to validate against
 * @param filepath - Optional file path for error context
 */
export function safeParseYaml<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (err instanceof YAMLParseError) {
      return {
        success: false,
        error: {
          type: "yaml",
          message: `Invalid YAML syntax${fileContext}`,
          details: [formatYamlError(err)],
        },
      };
    }
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Failed to parse YAML${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  // An empty file parses to null; treat it as an empty mapping
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration${fileContext}`,
        details: formatZodIssues(result.error),
      },
    };
  }

  return { success: true, data: result.data };
}
