/**
 * Friendly Errors
 *
 * YAML + Zod parsing with human-readable errors. Used for every user-facing
 * file the engine reads (modpack.yaml, engine settings).
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, PackConfigSchema, "modpack.yaml");
 * if (!result.success) {
 *   throw toConfigurationError(result.error);
 * }
 * const config = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import { ConfigurationError } from "#/errors";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // First line only, the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

/**
 * Validate an already-parsed value against a schema.
 */
export function safeValidate<Output, Input = Output>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";
  const result = schema.safeParse(raw);
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

/**
 * Parse YAML content and validate against a Zod schema.
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

  return safeValidate(raw, schema, filepath);
}

export function toConfigurationError(error: FriendlyError): ConfigurationError {
  return new ConfigurationError(error.message, error.details ?? []);
}
