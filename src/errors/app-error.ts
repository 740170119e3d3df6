/**
 * Error taxonomy shared by the REST routes and the live stream protocol.
 *
 * Every error that reaches a client carries a stable `code` and a readable
 * message. Causes and stacks stay server-side.
 */

export type ErrorCode =
  | 'Unauthorized'
  | 'Forbidden'
  | 'NotFound'
  | 'TooManySessions'
  | 'UnknownCommand'
  | 'StreamFailure'
  | 'StreamDegraded'
  | 'NoCorpus'
  | 'DimensionMismatch'
  | 'ValidationError'
  | 'ScorerUnavailable'
  | 'Unavailable'
  | 'Internal';

const HTTP_STATUS: Record<ErrorCode, number> = {
  Unauthorized: 401,
  Forbidden: 403,
  NotFound: 404,
  TooManySessions: 429,
  UnknownCommand: 400,
  StreamFailure: 503,
  StreamDegraded: 503,
  NoCorpus: 409,
  DimensionMismatch: 422,
  ValidationError: 400,
  ScorerUnavailable: 503,
  Unavailable: 503,
  Internal: 500,
};

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.status = HTTP_STATUS[code];
  }

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

/** Anything that is not an AppError is reported as a generic internal error */
export function toErrorPayload(err: unknown): ErrorPayload {
  if (isAppError(err)) return err.toPayload();
  return { code: 'Internal', message: 'Internal server error' };
}

// ───── Constructors for the common cases ─────

export const unauthorized = (message = 'Missing or invalid access token'): AppError =>
  new AppError('Unauthorized', message);

export const forbidden = (message = 'Not enough permissions'): AppError =>
  new AppError('Forbidden', message);

export const callNotFound = (callId: string): AppError =>
  new AppError('NotFound', `Call ${callId} not found`);

export const tooManySessions = (message: string): AppError =>
  new AppError('TooManySessions', message);

export const unknownCommand = (command: string): AppError =>
  new AppError('UnknownCommand', `Unknown command: ${command}`);
