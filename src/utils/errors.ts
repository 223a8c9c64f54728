import { ZodError } from "zod";

/**
 * Probe and sink failures are handled inside the session and never surface
 * here.
 */
export type ErrorCode = "BAD_INPUT" | "INTERNAL";

/**
 * Structured error report (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Raised before a session starts when its settings cannot be used.
 */
export class ConfigError extends Error {
  readonly code = "BAD_INPUT" as const;
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ConfigError";
    this.details = details;
  }
}

export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError): ErrorV1 {
  return buildErrorV1("BAD_INPUT", "Validation failed", {
    validation_errors: error.flatten(),
  });
}

function sanitizeMessage(message: string): string {
  return message.replace(/\/[\w/.@-]+/g, "[path]");
}

/**
 * Convert any error to ErrorV1 (no stack traces, file paths replaced)
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error);
  }

  if (error instanceof ConfigError) {
    return buildErrorV1("BAD_INPUT", error.message, error.details);
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", sanitizeMessage(error.message || "An unexpected error occurred"));
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", sanitizeMessage(error));
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred");
}

/**
 * Process exit code for an error code
 */
export function getExitCodeForErrorCode(code: ErrorCode): number {
  return code === "BAD_INPUT" ? 1 : 2;
}

/**
 * Render an ErrorV1 for a terminal: the message plus one line per field issue.
 */
export function formatErrorForConsole(error: ErrorV1): string {
  const lines = [`Error: ${error.message}`];
  const validation = error.details?.validation_errors;
  if (isFlattenedError(validation)) {
    for (const message of validation.formErrors) {
      lines.push(`  - ${message}`);
    }
    for (const [field, messages] of Object.entries(validation.fieldErrors)) {
      for (const message of messages ?? []) {
        lines.push(`  - ${field}: ${message}`);
      }
    }
  }
  return lines.join("\n");
}

interface FlattenedIssues {
  formErrors: string[];
  fieldErrors: Record<string, string[] | undefined>;
}

function isFlattenedError(value: unknown): value is FlattenedIssues {
  if (typeof value !== "object" || value === null) return false;
  return (
    "formErrors" in value &&
    Array.isArray(value.formErrors) &&
    "fieldErrors" in value &&
    typeof value.fieldErrors === "object" &&
    value.fieldErrors !== null
  );
}
