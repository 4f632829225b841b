import { getLogger } from '@minorunit/logger';
import { err, ok } from 'neverthrow';
import type { Result } from 'neverthrow';

import { InvalidArgumentError, UnknownCurrencyError } from '../errors.js';
import { CurrencyCodeSchema } from '../schemas/money.js';
import { fromZod } from '../utils/zod-utils.js';

import { builtInCurrencySource, type CurrencyDescriptor, type CurrencySource } from './currency-source.js';

const logger = getLogger('currency');

/**
 * Currency value object
 *
 * Describes how amounts in one currency are stored and shown: the code, the
 * number of minor-unit digits, the scaling factor between major and minor
 * units (always 10^minorDigits) and the locale used for display.
 *
 * Identity is the code alone, compared case-insensitively.
 */
export class Currency {
  /**
   * Look up a currency by its exact code (EUR, USD, GBP for the built-in table)
   */
  static of(code: string, source: CurrencySource = builtInCurrencySource): Result<Currency, UnknownCurrencyError> {
    const descriptor = source.resolve(code);
    if (!descriptor) {
      logger.debug({ code }, 'Unknown currency code requested');
      return err(new UnknownCurrencyError(code, source.codes()));
    }
    return ok(new Currency(descriptor));
  }

  /**
   * Validate an untrusted value as a currency code, then look it up
   */
  static parse(input: unknown, source: CurrencySource = builtInCurrencySource): Result<Currency, UnknownCurrencyError> {
    return fromZod(CurrencyCodeSchema, input)
      .mapErr(() => new UnknownCurrencyError(typeof input === 'string' ? input : String(input), source.codes()))
      .andThen((code) => Currency.of(code, source));
  }

  static supportedCodes(source: CurrencySource = builtInCurrencySource): readonly string[] {
    return source.codes();
  }

  readonly code: string;
  readonly minorDigits: number;
  readonly factor: bigint;
  readonly locale: string;

  private numberFormat: Intl.NumberFormat | undefined;

  private constructor(descriptor: CurrencyDescriptor) {
    if (!Number.isInteger(descriptor.minorDigits) || descriptor.minorDigits < 0) {
      throw new InvalidArgumentError(
        'minorDigits',
        descriptor.minorDigits,
        `${descriptor.code} must have a non-negative integer number of minor digits`
      );
    }

    this.code = descriptor.code;
    this.minorDigits = descriptor.minorDigits;
    this.factor = 10n ** BigInt(descriptor.minorDigits);
    this.locale = descriptor.locale;
  }

  /**
   * Symbol printed by Money.beautify(); the code itself
   */
  get symbol(): string {
    return this.code;
  }

  /**
   * Decimal format for this currency: exactly `minorDigits` fraction digits,
   * grouping and separators from the currency locale
   */
  getNumberFormat(): Intl.NumberFormat {
    if (!this.numberFormat) {
      this.numberFormat = new Intl.NumberFormat(this.locale, {
        maximumFractionDigits: this.minorDigits,
        minimumFractionDigits: this.minorDigits,
        style: 'decimal',
        useGrouping: true,
      });
    }
    return this.numberFormat;
  }

  isSameCurrency(other: Currency): boolean {
    return this.code.toUpperCase() === other.code.toUpperCase();
  }

  /**
   * Same as isSameCurrency: a currency is its code
   */
  equals(other: Currency): boolean {
    return this.isSameCurrency(other);
  }

  toString(): string {
    return this.code;
  }
}
