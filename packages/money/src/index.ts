export * from './currency/currency.js';
export * from './currency/currency-source.js';
export * from './money/money.js';
export * from './errors.js';
export * from './schemas/index.js';
export * from './utils/decimal-utils.js';
export { fromZod } from './utils/zod-utils.js';
