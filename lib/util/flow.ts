/**
 * An error that is reported to the user as just its message, without a stack trace
 *
 * Carries the exit code the process should end with.
 */
export class SimpleError extends Error {
  constructor(message: string, public readonly exitCode: number = 1) {
    super(message);
    this.name = 'SimpleError';
  }
}

/**
 * Checks the shape, not the class: errors from Node's own modules fail
 * `instanceof Error` when the caller runs in another realm (a Jest sandbox).
 */
export function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
  return typeof e === 'object' && e !== null && 'code' in e;
}

export function errorMessage(e: unknown): string {
  if (typeof e === 'object' && e !== null && 'message' in e && typeof e.message === 'string') {
    return e.message;
  }
  return String(e);
}

export function errorCode(e: unknown): string | undefined {
  return isErrnoException(e) ? e.code : undefined;
}
