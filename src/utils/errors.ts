import type { ZodError } from 'zod';

export type RiotApiErrorKind =
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'FORBIDDEN'
  | 'UNAUTHORIZED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'UNKNOWN_REGION'
  | 'MALFORMED_RESPONSE';

export interface RiotApiErrorDetails {
  status?: number;
  /** `Retry-After` 헤더 원본 값 (초) */
  retryAfter?: string;
}

/**
 * 툴 호출이 끝날 수 있는 모든 실패 유형.
 * message 는 그대로 에이전트에게 전달된다.
 */
export class RiotApiError extends Error {
  readonly kind: RiotApiErrorKind;
  readonly status?: number;
  readonly retryAfter?: string;

  constructor(kind: RiotApiErrorKind, message: string, details: RiotApiErrorDetails = {}) {
    super(message);
    this.name = 'RiotApiError';
    this.kind = kind;
    this.status = details.status;
    this.retryAfter = details.retryAfter;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function malformedResponse(
  resource: string,
  error: ZodError,
  pathPrefix: ReadonlyArray<string | number> = [],
): RiotApiError {
  const issue = error.issues[0];
  const path = [...pathPrefix, ...(issue ? issue.path : [])];
  const field = path.length > 0 ? path.join('.') : '(root)';
  return new RiotApiError(
    'MALFORMED_RESPONSE',
    `Malformed ${resource} response: missing or invalid field "${field}"`,
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
