/**
 * Errors raised by the money value types.
 *
 * Expected failures (unknown code, currency mismatch, zero divisor) are handed
 * back inside neverthrow `Err`s. Misuse such as a NaN amount is thrown.
 */

export type MoneyErrorCode = 'UNKNOWN_CURRENCY' | 'CURRENCY_MISMATCH' | 'INVALID_ARGUMENT';

export abstract class MoneyError extends Error {
  abstract readonly code: MoneyErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * The requested code is not in the currency table
 */
export class UnknownCurrencyError extends MoneyError {
  readonly code = 'UNKNOWN_CURRENCY';

  constructor(
    public readonly currencyCode: string,
    supportedCodes: readonly string[] = []
  ) {
    const supported = supportedCodes.length > 0 ? ` Supported codes: ${supportedCodes.join(', ')}` : '';
    super(`Currency with code ${currencyCode} is unknown.${supported}`);
  }
}

/**
 * Two amounts in different currencies were combined or ordered
 */
export class CurrencyMismatchError extends MoneyError {
  readonly code = 'CURRENCY_MISMATCH';

  constructor(
    public readonly left: string,
    public readonly right: string
  ) {
    super(`Currencies do not match: ${left} and ${right}`);
  }
}

export class InvalidArgumentError extends MoneyError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    public readonly argument: string,
    public readonly value: unknown,
    reason: string
  ) {
    super(`Invalid ${argument}: ${reason}`);
  }
}
