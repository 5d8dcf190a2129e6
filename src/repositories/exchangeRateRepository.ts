import { z } from 'zod';
import type { LedgerDatabase } from '../db';
import { Decimal, toStorage } from '../lib/decimal';
import type { ExchangeRate } from '../models/exchangeRate';

const ExchangeRateRow = z.object({
    id: z.number().int(),
    from_currency: z.string(),
    to_currency: z.string(),
    rate: z.string(),
    timestamp: z.string(),
    source: z.string(),
    notes: z.string().nullable(),
    created_at: z.string(),
});

const toExchangeRate = (raw: unknown): ExchangeRate => {
    const row = ExchangeRateRow.parse(raw);
    return {
        id: row.id,
        fromCurrency: row.from_currency,
        toCurrency: row.to_currency,
        rate: new Decimal(row.rate),
        timestamp: new Date(row.timestamp),
        source: row.source,
        notes: row.notes,
        createdAt: new Date(row.created_at),
    };
};

const SELECT_COLUMNS = 'id, from_currency, to_currency, rate, timestamp, source, notes, created_at';
const HISTORY_PAGE_SIZE = 100;

export class ExchangeRateRepository {
    constructor(private readonly db: LedgerDatabase) {}

    /** Inserts, or replaces rate/source/notes of the row at the same (from, to, timestamp). */
    upsert(rate: Omit<ExchangeRate, 'id'>): number {
        const timestamp = rate.timestamp.toISOString();
        this.db.execute(
            `INSERT INTO exchange_rates (from_currency, to_currency, rate, timestamp, source, notes, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?)
             ON CONFLICT (from_currency, to_currency, timestamp) DO UPDATE SET
                 rate = excluded.rate,
                 source = excluded.source,
                 notes = excluded.notes`,
            [
                rate.fromCurrency,
                rate.toCurrency,
                toStorage(rate.rate),
                timestamp,
                rate.source,
                rate.notes,
                rate.createdAt.toISOString(),
            ],
        );

        // last_insert_rowid() is stale when the conflict branch ran, so look the row up.
        const row = this.db.queryOne(
            'SELECT id FROM exchange_rates WHERE from_currency = ? AND to_currency = ? AND timestamp = ?',
            [rate.fromCurrency, rate.toCurrency, timestamp],
        );
        return z.object({ id: z.number().int() }).parse(row).id;
    }

    findById(id: number): ExchangeRate | null {
        const row = this.db.queryOne(`SELECT ${SELECT_COLUMNS} FROM exchange_rates WHERE id = ?`, [id]);
        return row === undefined ? null : toExchangeRate(row);
    }

    findLatest(fromCurrency: string, toCurrency: string): ExchangeRate | null {
        const row = this.db.queryOne(
            `SELECT ${SELECT_COLUMNS}
             FROM exchange_rates
             WHERE from_currency = ? AND to_currency = ?
             ORDER BY timestamp DESC
             LIMIT 1`,
            [fromCurrency, toCurrency],
        );
        return row === undefined ? null : toExchangeRate(row);
    }

    findAsOf(fromCurrency: string, toCurrency: string, instant: Date): ExchangeRate | null {
        const row = this.db.queryOne(
            `SELECT ${SELECT_COLUMNS}
             FROM exchange_rates
             WHERE from_currency = ? AND to_currency = ? AND timestamp <= ?
             ORDER BY timestamp DESC
             LIMIT 1`,
            [fromCurrency, toCurrency, instant.toISOString()],
        );
        return row === undefined ? null : toExchangeRate(row);
    }

    /**
     * Newest first, read in pages keyed on the timestamp. Each page is a
     * finished query, so the connection is free between yields.
     */
    *iterateHistory(fromCurrency: string, toCurrency: string): Generator<ExchangeRate> {
        let before: string | null = null;
        for (;;) {
            const { rows } = this.db.query(
                `SELECT ${SELECT_COLUMNS}
                 FROM exchange_rates
                 WHERE from_currency = ? AND to_currency = ?
                   AND (? IS NULL OR timestamp < ?)
                 ORDER BY timestamp DESC
                 LIMIT ?`,
                [fromCurrency, toCurrency, before, before, HISTORY_PAGE_SIZE],
            );
            const page = rows.map(toExchangeRate);
            yield* page;
            if (page.length < HISTORY_PAGE_SIZE) {
                return;
            }
            before = page[page.length - 1].timestamp.toISOString();
        }
    }
}
