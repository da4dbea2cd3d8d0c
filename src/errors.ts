export type ErrorCode =
  | "VALUE_TYPE"
  | "UNKNOWN_VARIABLE"
  | "TYPE_MISMATCH"
  | "INVALID_TEMPLATE"
  | "DUPLICATE_ID"
  | "PARSE_FAILED"
  | "FILE_NOT_FOUND"
  | "INVALID_CONFIG";

export class TaskSystemError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "TaskSystemError";
    this.code = code;
    this.details = details;
  }
}

/** Wrong-variant access on a TaskValue, or an out-of-range constructor argument. */
export class ValueTypeError extends TaskSystemError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("VALUE_TYPE", message, details);
    this.name = "ValueTypeError";
  }
}

export class BlackboardError extends TaskSystemError {
  readonly variable: string;

  constructor(code: "UNKNOWN_VARIABLE" | "TYPE_MISMATCH", variable: string, message: string) {
    super(code, message, { variable });
    this.name = "BlackboardError";
    this.variable = variable;
  }
}

export class ValidationError extends TaskSystemError {
  readonly problems: string[];

  constructor(code: ErrorCode, message: string, problems: string[] = []) {
    super(code, message, problems.length > 0 ? { problems } : undefined);
    this.name = "ValidationError";
    this.problems = problems;
  }
}

export class ParseError extends TaskSystemError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("PARSE_FAILED", message, details);
    this.name = "ParseError";
  }
}

export class ConfigError extends TaskSystemError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
