/**
 * Raised when the tracking state or the observation log cannot be written.
 * Ends the run with a non-zero exit status.
 */
export class PersistenceError extends Error {
  public readonly target: "tracking-state" | "observation-log";

  constructor(target: PersistenceError["target"], message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
    this.target = target;
    Object.setPrototypeOf(this, PersistenceError.prototype);
  }
}
