/**
 * Error taxonomy shared across packages.
 *
 * Every error carries an HTTP-style `status` so the server's error handler
 * can map it without knowing each subclass.
 */

export class SkyrouteError extends Error {
  readonly status: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, status = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = "SkyrouteError";
    this.status = status;
    this.details = details;
  }
}

/** Bad ids, negative inputs, illegal phase transitions */
export class ValidationError extends SkyrouteError {
  constructor(message: string, details?: Record<string, unknown>, status = 400) {
    super(message, status, details);
    this.name = "ValidationError";
  }
}

/** An id that refers to nothing */
export class NotFoundError extends ValidationError {
  constructor(resource: string) {
    super(`${resource} not found`, undefined, 404);
    this.name = "NotFoundError";
  }
}

/** The request conflicts with current state (task already taken, vehicle busy) */
export class ConflictError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 409);
    this.name = "ConflictError";
  }
}

/**
 * No feasible route. Planning reports this as a result value; this class
 * exists for layers that must surface it as a failure.
 */
export class NoRouteError extends SkyrouteError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 404, details);
    this.name = "NoRouteError";
  }
}

/** A spatial, elevation or weather lookup failed or timed out */
export class CollaboratorError extends SkyrouteError {
  readonly collaborator: string;

  constructor(collaborator: string, message: string, cause?: unknown) {
    super(`${collaborator}: ${message}`, 502);
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
    if (cause !== undefined) this.cause = cause;
  }
}

/** Render any thrown value as a one-line message for logs */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
