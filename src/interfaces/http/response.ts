import type { ZodError } from 'zod';

const STATUS_NAMES: Record<number, string> = {
  200: 'OK',
  201: 'CREATED',
  400: 'BAD_REQUEST',
  401: 'UNAUTHORIZED',
  403: 'FORBIDDEN',
  404: 'NOT_FOUND',
  409: 'CONFLICT',
  415: 'UNSUPPORTED_MEDIA_TYPE',
  422: 'UNPROCESSABLE_ENTITY',
  500: 'INTERNAL_SERVER_ERROR',
  503: 'SERVICE_UNAVAILABLE',
};

export interface ResponseDetail {
  status_code: string;
  status_name: string;
  status_description: string;
}

/** Wire envelope of every response: `{ data, detail }`. */
export interface Envelope<T> {
  data: T;
  detail: ResponseDetail;
}

export function createDetail(statusCode: number, description = 'Success'): ResponseDetail {
  return {
    status_code: String(statusCode),
    status_name: STATUS_NAMES[statusCode] ?? 'UNKNOWN',
    status_description: description,
  };
}

export function successResponse<T>(data: T, statusCode = 200): Envelope<T> {
  return { data, detail: createDetail(statusCode) };
}

export function errorResponse(statusCode: number, description: string): Envelope<Record<string, never>> {
  return { data: {}, detail: createDetail(statusCode, description) };
}

/** Describes the first issue, e.g. `Validation error in field 'entity_id': Invalid uuid`. */
export function describeValidationError(error: ZodError): string {
  const issue = error.issues[0];
  if (issue === undefined) return 'Validation error';
  const field = issue.path.length > 0 ? issue.path.join('.') : 'body';
  return `Validation error in field '${field}': ${issue.message}`;
}
