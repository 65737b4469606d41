export type ValidationErrorKind =
  | "invalid_body"
  | "missing_field"
  | "empty_selection"
  | "invalid_field";

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly field?: string;

  constructor(kind: ValidationErrorKind, message: string, field?: string) {
    super(message);
    this.name = "ValidationError";
    this.kind = kind;
    this.field = field;
  }

  static invalidBody(): ValidationError {
    return new ValidationError("invalid_body", "Invalid JSON body.");
  }

  static missingField(field: string): ValidationError {
    return new ValidationError(
      "missing_field",
      `Missing required field: ${field}`,
      field,
    );
  }

  static emptySelection(): ValidationError {
    return new ValidationError(
      "empty_selection",
      "At least one issue must be selected",
      "issues",
    );
  }

  static invalidField(field: string): ValidationError {
    return new ValidationError(
      "invalid_field",
      `Invalid value for field: ${field}`,
      field,
    );
  }
}

export type StorageOperation =
  | "ensure_schema"
  | "insert"
  | "list"
  | "count"
  | "backup";

/** Wraps a database or filesystem fault; `message` is the underlying text. */
export class StorageError extends Error {
  readonly operation: StorageOperation;

  constructor(operation: StorageOperation, cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
    this.name = "StorageError";
    this.operation = operation;
  }
}

export class ConfigurationError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
    this.name = "ConfigurationError";
    this.missing = missing;
  }
}
