export type FieldErrors = Record<string, string[]>

/**
 * Base class for expected, per-command failures. `code` is stable and ends
 * up in JSON output.
 */
export class SpendlyError extends Error {
  readonly code: string
  readonly details?: unknown

  constructor(message: string, code: string, details?: unknown, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.details = details
  }
}

export class ValidationError extends SpendlyError {
  readonly fieldErrors: FieldErrors

  constructor(message: string, fieldErrors: FieldErrors) {
    super(message, 'validation_error', fieldErrors)
    this.fieldErrors = fieldErrors
  }
}

/**
 * Raised for records that do not exist or belong to another owner.
 * Both cases look the same to the caller.
 */
export class NotFoundError extends SpendlyError {
  constructor(kind: string, id: number) {
    super(`No ${kind} with id ${id} was found`, 'not_found', { kind, id })
  }
}

export class ReportGenerationError extends SpendlyError {
  constructor(month: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause)
    super(`Could not generate the report for ${month}: ${reason}`, 'report_generation_failed', { month }, { cause })
  }
}

/**
 * The config file exists but cannot be read as a Spendly config.
 */
export class ConfigError extends SpendlyError {
  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, 'invalid_config', { path }, options)
  }
}

export const isSpendlyError = (error: unknown): error is SpendlyError =>
  error instanceof SpendlyError
