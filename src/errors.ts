/**
 * Application Errors
 *
 * Every failure the service reports to a caller is an AppError carrying a
 * stable code. The API error middleware turns these into failure envelopes.
 */

export type ErrorCode =
  | 'TABLE_NOT_FOUND'
  | 'INVALID_CATEGORY_VALUE'
  | 'INCOMPLETE_DIMENSION_MAPPING'
  | 'UNMAPPED_CATEGORY_VALUE'
  | 'INVALID_SOURCE_ROW'
  | 'TEMPLATE_NOT_FOUND'
  | 'PROMPT_FILE_NOT_FOUND'
  | 'MALFORMED_MODEL_OUTPUT'
  | 'DISPATCH_REJECTED'
  | 'DATABASE_CONNECTION_FAILURE';

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(code: ErrorCode, message: string, details?: unknown, statusCode = 400) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    this.statusCode = statusCode;
  }
}

export class TableNotFoundError extends AppError {
  constructor(readonly table: string) {
    super('TABLE_NOT_FOUND', `Table "${table}" does not exist in the schema`, { table });
  }
}

export class InvalidCategoryValueError extends AppError {
  constructor(readonly dimension: string, readonly value: string) {
    super('INVALID_CATEGORY_VALUE', `"${value}" is not a valid ${dimension} value`, {
      dimension,
      value,
    });
  }
}

export class IncompleteDimensionMappingError extends AppError {
  constructor(readonly missing: string[]) {
    super(
      'INCOMPLETE_DIMENSION_MAPPING',
      `Dimension ids missing for: ${missing.join(', ')}`,
      { missing }
    );
  }
}

export class UnmappedCategoryValueError extends AppError {
  constructor(readonly dimension: string, readonly value: string) {
    super('UNMAPPED_CATEGORY_VALUE', `No ${dimension} id resolved for "${value}"`, {
      dimension,
      value,
    });
  }
}

export class InvalidSourceRowError extends AppError {
  constructor(readonly row: number, issues: unknown) {
    super('INVALID_SOURCE_ROW', `Source row ${row} failed validation`, { row, issues });
  }
}

export class TemplateNotFoundError extends AppError {
  constructor(readonly templateName: string, readonly directory: string) {
    super('TEMPLATE_NOT_FOUND', `Template "${templateName}" does not exist in ${directory}`, {
      templateName,
      directory,
    });
  }
}

export class PromptFileNotFoundError extends AppError {
  constructor(readonly fileName: string, readonly directory: string) {
    super('PROMPT_FILE_NOT_FOUND', `Prompt file "${fileName}" does not exist in ${directory}`, {
      fileName,
      directory,
    });
  }
}

export class MalformedModelOutputError extends AppError {
  constructor(reason: string, readonly output: string) {
    super('MALFORMED_MODEL_OUTPUT', `Model output is not a valid dispatch request: ${reason}`, {
      output: output.slice(0, 200),
    });
  }
}

export class DispatchRejectedError extends AppError {
  constructor(readonly target: string, reason: string) {
    super('DISPATCH_REJECTED', `Refusing to call ${target}: ${reason}`, { target });
  }
}

export class DatabaseConnectionFailureError extends AppError {
  constructor(message: string, details?: unknown) {
    super('DATABASE_CONNECTION_FAILURE', message, details, 503);
  }
}

export function toError(cause: unknown): Error {
  if (cause instanceof Error) {
    return cause;
  }
  return new Error(String(cause));
}
