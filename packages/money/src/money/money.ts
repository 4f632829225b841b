import { getLogger } from '@minorunit/logger';
import { Decimal } from 'decimal.js';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

import type { Currency } from '../currency/currency.js';
import { CurrencyMismatchError, InvalidArgumentError } from '../errors.js';
import { DECIMAL_PATTERN, DecimalInputSchema } from '../schemas/money.js';
import {
  formatDecimal,
  fromMinorUnits,
  hasSubMinorRemainder,
  isWithinAmountRange,
  MAX_AMOUNT_EXPONENT,
  toMinorUnits,
} from '../utils/decimal-utils.js';
import { describeZodError, fromZod } from '../utils/zod-utils.js';

const logger = getLogger('money');

export type MoneyInput = Decimal | number | string;

export type Comparison = -1 | 0 | 1;

/**
 * Money value object
 *
 * An amount stored as an exact integer count of minor units (cents for EUR)
 * bound to one Currency for its whole life. Every operation returns a new
 * value; operations that combine or order two amounts require the same
 * currency and return a CurrencyMismatchError otherwise.
 */
export class Money {
  /**
   * Build from a decimal amount in major units.
   *
   * The amount is truncated toward zero to whole minor units: 1.999 EUR
   * becomes 199 cents. A number is read through its shortest decimal string
   * (100.32 is taken as "100.32", not as its binary expansion). Strings must
   * be plain decimal notation; hex, binary and octal literals are rejected.
   *
   * @throws InvalidArgumentError for NaN, Infinity, an unparsable string or
   * an exponent above MAX_AMOUNT_EXPONENT
   */
  static of(value: MoneyInput, currency: Currency): Money {
    const decimal = toFiniteDecimal(value);
    const units = toMinorUnits(decimal, currency.minorDigits);

    if (hasSubMinorRemainder(decimal, currency.minorDigits)) {
      logger.debug({ currency: currency.code, units, value: decimal.toString() }, 'Sub-minor remainder truncated');
    }

    return new Money(units, currency);
  }

  /**
   * Validate an untrusted amount (number or decimal string) and build from it
   */
  static parse(input: unknown, currency: Currency): Result<Money, InvalidArgumentError> {
    return fromZod(DecimalInputSchema, input)
      .mapErr((error) => new InvalidArgumentError('amount', input, describeZodError(error)))
      .andThen((value) => {
        try {
          return ok(Money.of(value, currency));
        } catch (error) {
          if (error instanceof InvalidArgumentError) return err(error);
          throw error;
        }
      });
  }

  /**
   * Wrap an exact count of minor units
   */
  static ofMinor(units: bigint, currency: Currency): Money {
    return new Money(units, currency);
  }

  static zero(currency: Currency): Money {
    return new Money(0n, currency);
  }

  private constructor(
    /** Count of minor units */
    readonly amount: bigint,
    readonly currency: Currency
  ) {}

  isSameCurrency(other: Money): boolean {
    return this.currency.isSameCurrency(other.currency);
  }

  plus(other: Money): Result<Money, CurrencyMismatchError> {
    return this.requireSameCurrency(other).map(() => new Money(this.amount + other.amount, this.currency));
  }

  minus(other: Money): Result<Money, CurrencyMismatchError> {
    return this.requireSameCurrency(other).map(() => new Money(this.amount - other.amount, this.currency));
  }

  /**
   * Scale by an integer. No rounding is involved.
   *
   * @throws InvalidArgumentError if `multiplier` is a non-integer number
   */
  multiply(multiplier: bigint | number): Money {
    const factor = toInteger('multiplier', multiplier);
    if (factor.isErr()) throw factor.error;
    return new Money(this.amount * factor.value, this.currency);
  }

  /**
   * Integer division of the minor units, truncated toward zero:
   * 10.00 / 3 is 3.33, -10.00 / 3 is -3.33
   */
  divide(divisor: bigint | number): Result<Money, InvalidArgumentError> {
    return toInteger('divisor', divisor).andThen((n) => {
      if (n === 0n) {
        return err(new InvalidArgumentError('divisor', divisor, 'cannot divide by zero'));
      }
      return ok(new Money(this.amount / n, this.currency));
    });
  }

  isLessThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compareTo(other).map((order) => order === -1);
  }

  isGreaterThan(other: Money): Result<boolean, CurrencyMismatchError> {
    return this.compareTo(other).map((order) => order === 1);
  }

  compareTo(other: Money): Result<Comparison, CurrencyMismatchError> {
    return this.requireSameCurrency(other).map((): Comparison => {
      if (this.amount < other.amount) return -1;
      if (this.amount > other.amount) return 1;
      return 0;
    });
  }

  /**
   * Same currency and same amount. Amounts in different currencies are
   * simply unequal; this never fails.
   */
  equals(other: Money): boolean {
    return this.isSameCurrency(other) && this.amount === other.amount;
  }

  isNegative(): boolean {
    return this.amount < 0n;
  }

  isZero(): boolean {
    return this.amount === 0n;
  }

  /**
   * Amount in major units, exact
   */
  toDecimal(): Decimal {
    if (this.amount === 0n) return new Decimal(0);
    return fromMinorUnits(this.amount, this.currency.minorDigits);
  }

  /**
   * Display string "{symbol} {amount}", e.g. "EUR 1.000,00" or "USD 1,000.00",
   * using the separators of the currency locale
   */
  beautify(): string {
    return `${this.currency.symbol} ${formatDecimal(this.toDecimal(), this.currency.getNumberFormat())}`;
  }

  toString(): string {
    return this.beautify();
  }

  private requireSameCurrency(other: Money): Result<void, CurrencyMismatchError> {
    if (!this.isSameCurrency(other)) {
      return err(new CurrencyMismatchError(this.currency.code, other.currency.code));
    }
    return ok(undefined);
  }
}

function toFiniteDecimal(value: MoneyInput): Decimal {
  if (typeof value === 'string' && !DECIMAL_PATTERN.test(value)) {
    throw new InvalidArgumentError('amount', value, 'amount must be a decimal string');
  }

  let decimal: Decimal;
  try {
    decimal = new Decimal(value);
  } catch (error) {
    throw new InvalidArgumentError('amount', value, error instanceof Error ? error.message : String(error));
  }

  if (!decimal.isFinite()) {
    throw new InvalidArgumentError('amount', value, 'amount must be finite');
  }
  if (!isWithinAmountRange(decimal)) {
    throw new InvalidArgumentError('amount', value, `exponent must not exceed ${MAX_AMOUNT_EXPONENT}`);
  }
  return decimal;
}

function toInteger(argument: string, value: bigint | number): Result<bigint, InvalidArgumentError> {
  if (typeof value === 'bigint') return ok(value);
  if (!Number.isInteger(value)) {
    return err(new InvalidArgumentError(argument, value, `${String(value)} is not an integer`));
  }
  return ok(BigInt(value));
}
