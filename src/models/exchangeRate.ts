import type { Decimal, DecimalInput } from '../lib/decimal';

/**
 * A directional, timestamped fact: one `fromCurrency` bought `rate` units of
 * `toCurrency` at `timestamp` (FX notation `FROM/TO = rate`).
 */
export interface ExchangeRate {
    id: number;
    fromCurrency: string;
    toCurrency: string;
    rate: Decimal;
    timestamp: Date;
    source: string; // "manual", "swap", ...
    notes: string | null;
    createdAt: Date;
}

export interface ExchangeRateInput {
    fromCurrency: string;
    toCurrency: string;
    rate: DecimalInput;
    timestamp: Date;
    source?: string;
    notes?: string | null;
}

export const DEFAULT_RATE_SOURCE = 'manual';

export const ratePair = (rate: Pick<ExchangeRate, 'fromCurrency' | 'toCurrency'>): string =>
    `${rate.fromCurrency}/${rate.toCurrency}`;
