export type NotFoundKind = "game" | "player" | "gun";

/** A request referenced an identifier that does not exist. */
export class NotFoundError extends Error {
  readonly kind: NotFoundKind;
  readonly id: number;

  constructor(kind: NotFoundKind, id: number) {
    super(`Unknown ${kind}: ${id}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}

/**
 * The world reached a state the rules cannot produce (overlapping statics,
 * a full map, lock misuse). Aborts whatever operation observed it.
 */
export class ArenaInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArenaInvariantError";
  }
}
