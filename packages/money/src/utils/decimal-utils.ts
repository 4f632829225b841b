import { Decimal } from 'decimal.js';

/*
 * Conversions between decimal amounts and integer minor units.
 *
 * Everything here works on digit strings (toFixed / toDecimalPlaces are exact
 * for any magnitude) rather than Decimal arithmetic, whose results are rounded
 * to the configured significant-digit precision.
 */

/**
 * Largest decimal exponent accepted for an amount. Conversions expand the
 * value into a digit string, so the exponent bounds its length.
 */
export const MAX_AMOUNT_EXPONENT = 1000;

/**
 * True if the value is finite and its exponent is within MAX_AMOUNT_EXPONENT
 */
export function isWithinAmountRange(value: Decimal): boolean {
  return value.isFinite() && value.e <= MAX_AMOUNT_EXPONENT;
}

/**
 * Truncate toward zero to `minorDigits` places and return the digits as an
 * integer count of minor units: 1.999 with 2 digits gives 199n, -1.999 gives -199n.
 */
export function toMinorUnits(value: Decimal, minorDigits: number): bigint {
  const truncated = value.toDecimalPlaces(minorDigits, Decimal.ROUND_DOWN);
  return BigInt(truncated.toFixed(minorDigits).replace('.', ''));
}

/**
 * Exact inverse of toMinorUnits: 1250n with 2 digits gives 12.5
 */
export function fromMinorUnits(units: bigint, minorDigits: number): Decimal {
  if (minorDigits === 0) return new Decimal(units.toString());

  const negative = units < 0n;
  const digits = (negative ? -units : units).toString().padStart(minorDigits + 1, '0');
  const integerPart = digits.slice(0, -minorDigits);
  const fractionPart = digits.slice(-minorDigits);

  return new Decimal(`${negative ? '-' : ''}${integerPart}.${fractionPart}`);
}

/**
 * True if converting `value` to minor units would drop digits
 */
export function hasSubMinorRemainder(value: Decimal, minorDigits: number): boolean {
  return value.decimalPlaces() > minorDigits;
}

/**
 * Format a decimal with a locale number format without passing through a JS number.
 *
 * The integer part is formatted as a bigint (exact at any size, locale grouping
 * applied) and the format's fraction digits are replaced with the value's own,
 * cut to the format's maximum fraction digits.
 */
export function formatDecimal(value: Decimal, format: Intl.NumberFormat): string {
  const fractionDigits = format.resolvedOptions().maximumFractionDigits ?? 0;
  const fixed = value.abs().toFixed(fractionDigits, Decimal.ROUND_DOWN);
  const [integerDigits = '0', fractionPart = ''] = fixed.split('.');

  const body = format
    .formatToParts(BigInt(integerDigits))
    .map((part) => (part.type === 'fraction' ? fractionPart : part.value))
    .join('');

  const isVisiblyNegative = value.isNegative() && /[1-9]/.test(fixed);
  return isVisiblyNegative ? `${minusSign(format)}${body}` : body;
}

function minusSign(format: Intl.NumberFormat): string {
  return format.formatToParts(-1).find((part) => part.type === 'minusSign')?.value ?? '-';
}
