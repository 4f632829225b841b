/**
 * Where Currency.of looks codes up.
 *
 * The library ships one fixed, frozen table. The interface exists so that
 * lookup is never hardwired into Currency or Money.
 */

export interface CurrencyDescriptor {
  /** Three-letter code, e.g. EUR */
  readonly code: string;
  /** Decimal digits in the minor unit (cents: 2) */
  readonly minorDigits: number;
  /** BCP 47 tag used for grouping and separators when formatting */
  readonly locale: string;
}

export interface CurrencySource {
  resolve(code: string): CurrencyDescriptor | undefined;
  codes(): readonly string[];
}

export const BUILT_IN_CURRENCIES: readonly CurrencyDescriptor[] = Object.freeze([
  Object.freeze({ code: 'EUR', minorDigits: 2, locale: 'de-DE' }),
  Object.freeze({ code: 'USD', minorDigits: 2, locale: 'en-US' }),
  Object.freeze({ code: 'GBP', minorDigits: 2, locale: 'en-GB' }),
]);

/**
 * Read-only lookup over a list of descriptors. Codes match exactly (case-sensitive).
 */
export class StaticCurrencySource implements CurrencySource {
  private readonly byCode: ReadonlyMap<string, CurrencyDescriptor>;

  constructor(descriptors: readonly CurrencyDescriptor[]) {
    this.byCode = new Map(descriptors.map((descriptor) => [descriptor.code, descriptor]));
  }

  resolve(code: string): CurrencyDescriptor | undefined {
    return this.byCode.get(code);
  }

  codes(): readonly string[] {
    return [...this.byCode.keys()];
  }
}

export const builtInCurrencySource: CurrencySource = new StaticCurrencySource(BUILT_IN_CURRENCIES);
