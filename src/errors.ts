/**
 * Structured error types for the catalog compiler
 *
 * Every error carries a machine-readable code and optional details so the
 * CLI can log it without knowing the concrete class.
 */

export class CatalogError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CatalogError';
  }
}

/**
 * A `$ref` pointer that does not lead anywhere. This is an authoring bug in
 * the OpenAPI document and is never recovered from.
 */
export class UnresolvedReferenceError extends CatalogError {
  constructor(ref: string, segment?: string) {
    super(
      segment === undefined
        ? `Unresolvable reference: ${ref}`
        : `Unresolvable reference: ${ref} (missing segment '${segment}')`,
      'UNRESOLVED_REFERENCE',
      { ref, segment }
    );
    this.name = 'UnresolvedReferenceError';
  }
}

export class SpecLoadError extends CatalogError {
  constructor(message: string, specPath: string, cause?: unknown) {
    super(message, 'SPEC_LOAD_ERROR', {
      specPath,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.name = 'SpecLoadError';
  }
}

export class ConfigurationError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

export class ValidationError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

/**
 * Flatten any thrown value into a loggable record
 */
export function getErrorDetails(error: unknown): Record<string, unknown> {
  if (isCatalogError(error)) {
    return {
      name: error.name,
      code: error.code,
      message: error.message,
      details: error.details,
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return { message: String(error) };
}
