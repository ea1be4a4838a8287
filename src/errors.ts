// ─── keyline: Errors ─────────────────────────────────────────────────────────
//
// Typed failures surfaced by the parser, the input decoder and the config
// layer. Field-level anomalies never reach here; they are defaulted where
// they are read.
// ─────────────────────────────────────────────────────────────────────────────

/** Machine-readable failure kinds. */
export type ErrorCode =
  | "INVALID_INPUT"
  | "MALFORMED_DOCUMENT"
  | "NOT_IMPLEMENTED"
  | "DEVICE_UNAVAILABLE"
  | "INVALID_CONFIG";

/** Base class for every error this package throws on purpose. */
export class KeylineError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "KeylineError";
    this.code = code;
  }
}

/** Empty or missing document, path or argument. */
export class InvalidInputError extends KeylineError {
  constructor(message: string, options?: ErrorOptions) {
    super("INVALID_INPUT", message, options);
    this.name = "InvalidInputError";
  }
}

/** Markup that cannot be parsed, or a root element nobody recognizes. */
export class MalformedDocumentError extends KeylineError {
  readonly line?: number;
  readonly column?: number;

  constructor(
    message: string,
    location?: { line: number; column: number },
    options?: ErrorOptions
  ) {
    super("MALFORMED_DOCUMENT", message, options);
    this.name = "MalformedDocumentError";
    this.line = location?.line;
    this.column = location?.column;
  }
}

/** A recognized document kind this engine does not read. */
export class NotImplementedError extends KeylineError {
  constructor(message: string, options?: ErrorOptions) {
    super("NOT_IMPLEMENTED", message, options);
    this.name = "NotImplementedError";
  }
}

/** The input device could not be opened. No retry is attempted. */
export class DeviceUnavailableError extends KeylineError {
  constructor(message: string, options?: ErrorOptions) {
    super("DEVICE_UNAVAILABLE", message, options);
    this.name = "DeviceUnavailableError";
  }
}

/** One failed check from config validation. */
export interface ConfigIssue {
  field: string;
  message: string;
}

/** Engine config failed schema validation. */
export class ConfigError extends KeylineError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[], options?: ErrorOptions) {
    super("INVALID_CONFIG", message, options);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * Render an error and its cause chain on one line: `outer: inner: root`.
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  const seen = new Set<unknown>();
  let current: unknown = err;

  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }

  return parts.join(": ");
}
