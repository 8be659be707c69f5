import { CollaboratorError } from "../errors.js";

/**
 * Run a collaborator call with an upper bound on how long it may take.
 *
 * Rejects with a CollaboratorError on timeout, and wraps any other failure
 * (sync throw or rejection) in one, so callers only handle a single type.
 */
export async function withTimeout<T>(
  collaborator: string,
  call: () => T | Promise<T>,
  timeoutMs: number,
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new CollaboratorError(collaborator, `timed out after ${timeoutMs}ms`)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([Promise.resolve().then(call), timeout]);
  } catch (err) {
    if (err instanceof CollaboratorError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    throw new CollaboratorError(collaborator, message, err);
  } finally {
    clearTimeout(timer);
  }
}
