export type PoolErrorCode =
  | "syntax_error"
  | "structural_error"
  | "not_found"
  | "schema_error"
  | "validation_error"
  | "ambiguous_mapping"
  | "execution_error"
  | "invalid_input";

export interface SourceLocation {
  filePath: string;
  line: number;
  column: number;
}

export interface MappingCandidate {
  mappingHash: string;
  comment: string;
}

export class PoolError extends Error {
  readonly code: PoolErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: PoolErrorCode, message: string, details: Record<string, unknown> = {}, options?: ErrorOptions) {
    super(message, options);
    this.name = "PoolError";
    this.code = code;
    this.details = details;
  }
}

export class SourceSyntaxError extends PoolError {
  readonly location: SourceLocation;

  constructor(location: SourceLocation, reason: string, options?: ErrorOptions) {
    super(
      "syntax_error",
      `${formatLocation(location)}: syntax error: ${reason}`,
      { ...location, reason },
      options,
    );
    this.name = "SourceSyntaxError";
    this.location = location;
  }
}

export class StructuralError extends PoolError {
  readonly location: SourceLocation;

  constructor(location: SourceLocation, reason: string) {
    super("structural_error", `${formatLocation(location)}: ${reason}`, { ...location, reason });
    this.name = "StructuralError";
    this.location = location;
  }
}

export class NotFoundError extends PoolError {
  constructor(resource: "function" | "language" | "mapping", id: string) {
    super("not_found", `${capitalize(resource)} not found: ${id}`, { resource, id });
    this.name = "NotFoundError";
  }
}

export class SchemaError extends PoolError {
  readonly violations: string[];

  constructor(subject: string, violations: string[], options?: ErrorOptions) {
    super("schema_error", `Schema violations in ${subject}: ${violations.join("; ")}`, { subject, violations }, options);
    this.name = "SchemaError";
    this.violations = violations.slice();
  }
}

export class ValidationError extends PoolError {
  readonly errors: string[];

  constructor(hash: string, errors: string[]) {
    super("validation_error", `Function ${hash} failed validation: ${errors.join("; ")}`, { hash, errors });
    this.name = "ValidationError";
    this.errors = errors.slice();
  }
}

export class AmbiguousMappingError extends PoolError {
  readonly candidates: MappingCandidate[];

  constructor(hash: string, language: string, candidates: MappingCandidate[]) {
    super(
      "ambiguous_mapping",
      `Function ${hash} has ${candidates.length} mappings for '${language}'; pass a mapping hash to pick one.`,
      { hash, language, candidates },
    );
    this.name = "AmbiguousMappingError";
    this.candidates = candidates.map((candidate) => ({ ...candidate }));
  }
}

export class ExecutionError extends PoolError {
  readonly hash: string;

  constructor(hash: string, message: string, cause: unknown) {
    super("execution_error", `Execution of ${hash} failed: ${message}`, { hash }, { cause });
    this.name = "ExecutionError";
    this.hash = hash;
  }
}

export class InvalidInputError extends PoolError {
  constructor(field: string, message: string) {
    super("invalid_input", `${field}: ${message}`, { field });
    this.name = "InvalidInputError";
  }
}

export function formatLocation(location: SourceLocation): string {
  return `${location.filePath}:${location.line}:${location.column}`;
}

// Errors raised inside a vm context are not `instanceof Error` in the host realm.
export function describeError(error: unknown): string {
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}

function capitalize(value: string): string {
  return value.length > 0 ? `${value[0].toUpperCase()}${value.slice(1)}` : value;
}
