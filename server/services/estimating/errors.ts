import type { ZodError, ZodIssue } from 'zod';
import { fromZodError } from 'zod-validation-error';

export type EstimateInputErrorCode = 'FILE_UNREADABLE' | 'INVALID_JSON' | 'SCHEMA_INVALID' | 'INVALID_CONFIG';

/**
 * Boundary failure: an input file or the environment could not be turned
 * into engine input. Item-level problems are findings, never this error.
 */
export class EstimateInputError extends Error {
  constructor(
    message: string,
    public readonly code: EstimateInputErrorCode,
    public readonly details: { path?: string; issues?: ZodIssue[] } = {}
  ) {
    super(message);
    this.name = 'EstimateInputError';
  }
}

export function describeZodError(error: ZodError, prefix: string): string {
  return fromZodError(error, { prefix, maxIssuesInMessage: 5 }).message;
}
