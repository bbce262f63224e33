/**
 * Validation errors raised by the division generator.
 *
 * Both carry a 400 status so the HTTP error middleware can report them
 * directly as ApiErrors.
 */

export class DivisionError extends Error {
  readonly statusCode: number = 400;
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** The search area is missing vertices, has no area, or is otherwise degenerate. */
export class InvalidGeometryError extends DivisionError {}

/** The target area (or another numeric option) is absent, non-finite or out of range. */
export class InvalidParameterError extends DivisionError {}
