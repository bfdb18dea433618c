/**
 * Raised by integration points that exist only as placeholders. Callers
 * get this immediately instead of a fabricated plan.
 */
export class NotImplementedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotImplementedError";
  }
}

export function isNotImplementedError(err: unknown): err is NotImplementedError {
  return err instanceof Error && err.name === "NotImplementedError";
}
