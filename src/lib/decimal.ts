import Decimal from 'decimal.js';
import { InvalidInputError } from '../models/errors';

// Quantities, prices and rates never touch binary floating point. The exponent
// bounds keep toString()/toJSON() in plain notation.
Decimal.set({ precision: 34, rounding: Decimal.ROUND_HALF_EVEN, toExpNeg: -40, toExpPos: 40 });

export { Decimal };

export type DecimalInput = Decimal.Value;

export const ZERO = new Decimal(0);
export const ONE = new Decimal(1);
export const HUNDRED = new Decimal(100);

export function toDecimal(value: DecimalInput, field: string): Decimal {
    let parsed: Decimal;
    try {
        parsed = new Decimal(typeof value === 'string' ? value.trim() : value);
    } catch {
        throw new InvalidInputError(`${field} is not a valid decimal: ${String(value)}`, field);
    }
    if (!parsed.isFinite()) {
        throw new InvalidInputError(`${field} must be a finite number`, field);
    }
    return parsed;
}

export function toPositiveDecimal(value: DecimalInput, field: string): Decimal {
    const parsed = toDecimal(value, field);
    if (parsed.lte(0)) {
        throw new InvalidInputError(`${field} must be greater than zero`, field);
    }
    return parsed;
}

export function toNonNegativeDecimal(value: DecimalInput, field: string): Decimal {
    const parsed = toDecimal(value, field);
    if (parsed.isNegative() && !parsed.isZero()) {
        throw new InvalidInputError(`${field} must not be negative`, field);
    }
    return parsed;
}

/** Storage form: plain notation, no exponent, full precision. */
export const toStorage = (value: Decimal): string => (value.isZero() ? '0' : value.toFixed());

export const sum = (values: Iterable<Decimal>): Decimal => {
    let total = ZERO;
    for (const value of values) {
        total = total.plus(value);
    }
    return total;
};
