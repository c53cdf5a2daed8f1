/**
 * Error message extraction for values caught from `catch`
 */

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
