import type { Response } from 'express';

/**
 * JSON body for every non-2xx answer from the orchestrator API. Orchestration results
 * themselves are sent as-is with 200, even when `success` is false.
 */

export type ErrorCode = 'bad_request' | 'not_found' | 'assistant_unavailable' | 'internal_error';

export interface FieldIssue {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  code: ErrorCode;
  errors?: FieldIssue[];
}

export function createErrorResponse(message: string, code: ErrorCode, errors?: FieldIssue[]): ErrorResponse {
  const body: ErrorResponse = { success: false, message, code };
  if (errors && errors.length > 0) body.errors = errors;
  return body;
}

export function sendError(res: Response, status: number, message: string, code: ErrorCode, errors?: FieldIssue[]): void {
  res.status(status).json(createErrorResponse(message, code, errors));
}
