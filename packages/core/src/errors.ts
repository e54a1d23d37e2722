/**
 * Base class for every domain error raised by the bank core.
 *
 * Callers can catch `BankError` to tell expected validation failures apart
 * from programming errors.
 */
export class BankError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}
