/**
 * Root of the project's error hierarchy. Sets `name` to the concrete class name.
 */
export class BaseError extends Error {
  constructor(message?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}
