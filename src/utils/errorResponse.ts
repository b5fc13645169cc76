/**
 * Error body shared by every HTTP endpoint: { success: false, message, errors?, code? }.
 */
import type { ZodError } from 'zod';

export interface FieldIssue {
  path: string;
  message: string;
}

export type ErrorCode =
  | 'INVALID_BODY'
  | 'INVALID_PARAMS'
  | 'BAD_JSON'
  | 'NOT_FOUND'
  | 'CANCELLED'
  | 'TURN_FAILED'
  | 'INTERNAL_ERROR';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldIssue[];
  code?: ErrorCode;
}

export function createErrorResponse(message: string, errors?: FieldIssue[], code?: ErrorCode): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

/** One issue per failing field, dotted path ("" for the root). */
export function fieldIssues(error: ZodError): FieldIssue[] {
  return error.errors.map((e) => ({ path: e.path.join('.'), message: e.message }));
}
