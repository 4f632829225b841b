import { Decimal } from 'decimal.js';
import { z } from 'zod';

import { isWithinAmountRange, MAX_AMOUNT_EXPONENT } from '../utils/decimal-utils.js';

// Plain decimal notation with an optional exponent: 12, -0.5, .25, 1e3
export const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

// Currency code - three ASCII letters, surrounding whitespace dropped.
// Case is kept: lookup against the currency table is case-sensitive
export const CurrencyCodeSchema = z
  .string({ message: 'Currency code must be a string' })
  .trim()
  .regex(/^[A-Za-z]{3}$/, 'Currency code must be three letters');

// Amount input - finite number or decimal string, passed on unchanged for Money.of
export const DecimalInputSchema = z.union(
  [
    z.number().finite('Amount must be a finite number'),
    z
      .string()
      .trim()
      .regex(DECIMAL_PATTERN, 'Amount must be a decimal string')
      .refine((val) => !DECIMAL_PATTERN.test(val) || isWithinAmountRange(new Decimal(val)), {
        message: `Amount must be below 1e${MAX_AMOUNT_EXPONENT + 1}`,
      }),
  ],
  { message: 'Amount must be a number or a decimal string' }
);

export type DecimalInput = z.infer<typeof DecimalInputSchema>;
