/**
 * Error taxonomy for the compositor core.
 *
 * Lookups report "not found" through their return value; these classes are
 * thrown only by operations whose contract is to fail loudly
 * (bringToFront/sendToBack on unknown ids, capacity checks, picture lookups).
 */

export class CompositorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type NotFoundSubject = "sprite" | "layer" | "cast" | "picture" | "window";

export class NotFoundError extends CompositorError {
  readonly subject: NotFoundSubject;
  readonly id: number;

  constructor(subject: NotFoundSubject, id: number) {
    super(`${subject} not found: ${id}`);
    this.subject = subject;
    this.id = id;
  }
}

export class ResourceExhaustedError extends CompositorError {
  readonly limit: number;

  constructor(what: string, limit: number) {
    super(`resource limit exceeded: ${what} (max ${limit})`);
    this.limit = limit;
  }
}
