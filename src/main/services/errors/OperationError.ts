import type { OperationErrorCode, OperationResult } from '@shared/contracts';

export class OperationError extends Error {
  constructor(
    readonly code: OperationErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'OperationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toFailureResult(error: unknown, fallbackMessage: string): OperationResult {
  if (error instanceof OperationError) {
    return {
      ok: false,
      message: error.message,
      errorCode: error.code
    };
  }

  return {
    ok: false,
    message: `${fallbackMessage}: ${describeError(error)}`,
    errorCode: 'unexpected'
  };
}
