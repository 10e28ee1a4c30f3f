/**
 * Friendly Errors
 *
 * Standard utility for parsing YAML/JSON + Zod validation with human-readable errors.
 *
 * USAGE: Always use this utility when parsing user-facing settings files
 * (registries.yaml, registry credentials) and registry documents, so every
 * failure reads the same way.
 *
 * @example
 * ```ts
 * const result = safeParseYaml(content, RegistrySettingsFileSchema, "registries.yaml");
 * if (!result.success) {
 *   throw new ConfigError(result.error.message, result.error.details);
 * }
 * const settings = result.data;
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodType, ZodTypeDef, ZodError } from "zod";

export type ParseErrorType = "yaml" | "json" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  message: string;
  details?: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${path}${issue.message}`;
  });
}

function formatYamlError(error: YAMLParseError): string {
  // Keep the first line only; the rest is a source excerpt
  return error.message.split("\n")[0] ?? error.message;
}

function validate<Output, Input>(
  raw: unknown,
  schema: ZodType<Output, ZodTypeDef, Input>,
  fileContext: string
): ParseResult<Output> {
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

  // An empty document parses to null; treat it as an empty mapping
  return validate(raw ?? {}, schema, fileContext);
}

/**
 * Parse JSON content and validate against a Zod schema.
 *
 * @param content - Raw JSON string or bytes
 * @param schema - Zod schema to validate against
 * @param filepath - Optional file path (or reference) for error context
 */
export function safeParseJson<Output, Input = Output>(
  content: string | Buffer,
  schema: ZodType<Output, ZodTypeDef, Input>,
  filepath?: string
): ParseResult<Output> {
  const fileContext = filepath ? ` in ${filepath}` : "";

  let raw: unknown;
  try {
    raw = JSON.parse(typeof content === "string" ? content : content.toString("utf-8"));
  } catch (err) {
    return {
      success: false,
      error: {
        type: "json",
        message: `Invalid JSON syntax${fileContext}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  return validate(raw, schema, fileContext);
}
