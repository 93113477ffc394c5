import { ArenaInvariantError } from "./errors.js";

function isThenable(value: unknown): boolean {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Exclusive access to one game's store and index.
 *
 * Critical sections are synchronous, so on a single event loop they cannot
 * interleave; the lock enforces that they stay that way (no re-entry, no
 * awaiting inside).
 */
export class GameLock {
  private held = false;

  get isHeld(): boolean {
    return this.held;
  }

  run<T>(fn: () => T): T {
    if (this.held) {
      throw new ArenaInvariantError("Game lock re-entered");
    }
    this.held = true;
    try {
      const result = fn();
      if (isThenable(result)) {
        throw new ArenaInvariantError("Game lock held across an await");
      }
      return result;
    } finally {
      this.held = false;
    }
  }
}
