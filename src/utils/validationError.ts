import { BaseError } from './baseError.js';

export class ValidationError extends BaseError {
  constructor(
    message: string,
    public readonly details?: string,
    public readonly suggestions?: string[],
  ) {
    super(message);
  }
}
