export type ErrorCode =
  | "EXTRACTION_INCOMPLETE"
  | "EXTRACTION_UNAVAILABLE"
  | "EXTRACTION_FAILED"
  | "SCHEMA_CONFLICT"
  | "INDEX_NOT_FOUND"
  | "GENERATION_UNAVAILABLE"
  | "GROUNDING_VIOLATION"
  | "UNSUPPORTED_GENERATION_PARAMETER"
  | "GENERATION_REJECTED"
  | "CONFIG_INVALID"
  | "UNKNOWN";

export class InvoiceQaError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(message: string, code: ErrorCode, options: { retryable?: boolean; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "InvoiceQaError";
    this.code = code;
    this.retryable = options.retryable ?? false;
  }
}

export class ExtractionIncompleteError extends InvoiceQaError {
  constructor(
    public readonly sourceFile: string,
    public readonly field: string,
    reason: string
  ) {
    super(`${sourceFile}: required field "${field}" ${reason}`, "EXTRACTION_INCOMPLETE");
    this.name = "ExtractionIncompleteError";
  }
}

export class SchemaConflictError extends InvoiceQaError {
  constructor(
    public readonly indexName: string,
    details: string
  ) {
    super(
      `Index "${indexName}" exists with a different schema (${details}). Reset it to recreate.`,
      "SCHEMA_CONFLICT"
    );
    this.name = "SchemaConflictError";
  }
}

export class IndexNotFoundError extends InvoiceQaError {
  constructor(public readonly indexName: string) {
    super(`Index "${indexName}" does not exist`, "INDEX_NOT_FOUND");
    this.name = "IndexNotFoundError";
  }
}

export class GenerationUnavailableError extends InvoiceQaError {
  constructor(message: string, cause?: unknown) {
    super(message, "GENERATION_UNAVAILABLE", { retryable: true, cause });
    this.name = "GenerationUnavailableError";
  }
}

export class GroundingViolationError extends InvoiceQaError {
  constructor(
    message: string,
    public readonly ungroundedIds: string[] = []
  ) {
    super(message, "GROUNDING_VIOLATION");
    this.name = "GroundingViolationError";
  }
}

export class UnsupportedGenerationParameterError extends InvoiceQaError {
  constructor(
    public readonly parameter: string,
    public readonly replacement: string | null,
    cause?: unknown
  ) {
    super(
      `Generation model rejected parameter "${parameter}"` +
        (replacement ? `; expected "${replacement}"` : ""),
      "UNSUPPORTED_GENERATION_PARAMETER",
      { cause }
    );
    this.name = "UnsupportedGenerationParameterError";
  }
}

export class ConfigError extends InvoiceQaError {
  constructor(message: string) {
    super(message, "CONFIG_INVALID");
    this.name = "ConfigError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function wrapError(err: unknown, context?: string): InvoiceQaError {
  if (err instanceof InvoiceQaError) return err;
  const message = context ? `${context}: ${errorMessage(err)}` : errorMessage(err);
  return new InvoiceQaError(message, "UNKNOWN", { cause: err });
}
