import { Decimal, DecimalInput, ONE, toDecimal, toPositiveDecimal } from '../lib/decimal';
import { InvalidInputError, NotFoundError, RateUnavailableError } from '../models/errors';
import { DEFAULT_RATE_SOURCE, ExchangeRate, ExchangeRateInput, ratePair } from '../models/exchangeRate';
import { attempt, Result } from '../models/result';
import type { ExchangeRateRepository } from '../repositories/exchangeRateRepository';
import type { CurrencyCatalog } from './currencyCatalog';

export interface ResolvedRate {
    /** Units of `to` per one `from`, inverted from the reverse pair when needed. */
    rate: Decimal;
    inverted: boolean;
    source: ExchangeRate;
}

export interface Conversion extends ResolvedRate {
    amount: Decimal;
    converted: Decimal;
}

export const toValidDate = (value: Date, field: string): Date => {
    if (Number.isNaN(value.getTime())) {
        throw new InvalidInputError(`${field} is not a valid date`, field);
    }
    return value;
};

/**
 * Directional, timestamped rate history. Lookups never invert implicitly;
 * only `convert`/`resolve` fall back to `1 / rate` of the reverse pair.
 */
export class ExchangeRateStore {
    constructor(
        private readonly repo: ExchangeRateRepository,
        private readonly catalog: CurrencyCatalog,
        private readonly now: () => Date = () => new Date(),
    ) {}

    upsert(input: ExchangeRateInput): Result<number> {
        return attempt(() => this.write(input).id);
    }

    latest(fromCurrency: string, toCurrency: string): Result<ExchangeRate> {
        return attempt(() => {
            const [from, to] = this.pair(fromCurrency, toCurrency);
            const rate = this.repo.findLatest(from, to);
            if (!rate) {
                throw new NotFoundError('exchange_rate', `${from}/${to}`);
            }
            return rate;
        });
    }

    asOf(fromCurrency: string, toCurrency: string, instant: Date): Result<ExchangeRate> {
        return attempt(() => {
            const [from, to] = this.pair(fromCurrency, toCurrency);
            const rate = this.repo.findAsOf(from, to, toValidDate(instant, 'instant'));
            if (!rate) {
                throw new NotFoundError('exchange_rate', `${from}/${to}@${instant.toISOString()}`);
            }
            return rate;
        });
    }

    /**
     * Newest first. The iterable is lazy and can be iterated again from the
     * start; each pass reads the table afresh.
     */
    history(fromCurrency: string, toCurrency: string): Result<Iterable<ExchangeRate>> {
        return attempt(() => {
            const [from, to] = this.pair(fromCurrency, toCurrency);
            const repo = this.repo;
            return {
                [Symbol.iterator]: () => repo.iterateHistory(from, to),
            };
        });
    }

    convert(
        amount: DecimalInput,
        fromCurrency: string,
        toCurrency: string,
        instant: Date,
        maxAgeMs?: number,
    ): Result<Conversion> {
        return attempt(() => {
            const value = toDecimal(amount, 'amount');
            const resolved = this.resolve(fromCurrency, toCurrency, instant, maxAgeMs);
            return { ...resolved, amount: value, converted: value.times(resolved.rate) };
        });
    }

    /** Validates and stores; throws instead of returning a Result so it can join a ledger transaction. */
    write(input: ExchangeRateInput): ExchangeRate {
        const [from, to] = this.pair(input.fromCurrency, input.toCurrency);
        const row: Omit<ExchangeRate, 'id'> = {
            fromCurrency: from,
            toCurrency: to,
            rate: toPositiveDecimal(input.rate, 'rate'),
            timestamp: toValidDate(input.timestamp, 'timestamp'),
            source: input.source?.trim() || DEFAULT_RATE_SOURCE,
            notes: input.notes ?? null,
            createdAt: this.now(),
        };
        const id = this.repo.upsert(row);
        const stored = this.repo.findById(id);
        if (!stored) {
            throw new Error(`Exchange rate ${ratePair(row)} vanished after upsert (id ${id})`);
        }
        return stored;
    }

    /**
     * Rate usable at `instant`: the direct pair's as-of rate, else the inverse
     * of the reverse pair's. A rate older than `maxAgeMs` does not qualify.
     */
    resolve(fromCurrency: string, toCurrency: string, instant: Date, maxAgeMs?: number): ResolvedRate {
        const [from, to] = this.pair(fromCurrency, toCurrency);
        const at = toValidDate(instant, 'instant');
        const fresh = (rate: ExchangeRate | null): rate is ExchangeRate =>
            rate !== null && (maxAgeMs === undefined || at.getTime() - rate.timestamp.getTime() <= maxAgeMs);

        const direct = this.repo.findAsOf(from, to, at);
        if (fresh(direct)) {
            return { rate: direct.rate, inverted: false, source: direct };
        }
        const reverse = this.repo.findAsOf(to, from, at);
        if (fresh(reverse)) {
            return { rate: ONE.dividedBy(reverse.rate), inverted: true, source: reverse };
        }
        throw new RateUnavailableError(from, to, at);
    }

    private pair(fromCurrency: string, toCurrency: string): [string, string] {
        const from = this.catalog.require(fromCurrency).code;
        const to = this.catalog.require(toCurrency).code;
        if (from === to) {
            throw new InvalidInputError(`An exchange rate needs two different currencies, got ${from}/${to}`);
        }
        return [from, to];
    }
}
