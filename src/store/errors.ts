/**
 * Error thrown when runs are grouped by a field outside the allow-list.
 */
export class InvalidGroupFieldError extends Error {
  override readonly name = 'InvalidGroupFieldError';
  readonly field: string;
  readonly allowed: readonly string[];

  constructor(field: string, allowed: readonly string[]) {
    super(`Invalid group field: ${field}. Allowed: ${allowed.join(', ')}`);
    this.field = field;
    this.allowed = allowed;
    Object.setPrototypeOf(this, InvalidGroupFieldError.prototype);
  }
}
