import { z } from 'zod';
import type { LedgerDatabase, SqlParam } from '../db';
import { ASSET_CLASSES, Currency, CurrencyFilter, CurrencyUpdate } from '../models/currency';

const CurrencyRow = z.object({
    code: z.string(),
    name: z.string(),
    symbol: z.string(),
    decimals: z.number().int(),
    asset_class: z.enum(ASSET_CLASSES),
    enabled: z.number(),
    created_at: z.string(),
    updated_at: z.string(),
});

const toCurrency = (raw: unknown): Currency => {
    const row = CurrencyRow.parse(raw);
    return {
        code: row.code,
        name: row.name,
        symbol: row.symbol,
        decimalPrecision: row.decimals,
        assetClass: row.asset_class,
        enabled: row.enabled !== 0,
        createdAt: new Date(row.created_at),
        updatedAt: new Date(row.updated_at),
    };
};

const SELECT_COLUMNS = 'code, name, symbol, decimals, asset_class, enabled, created_at, updated_at';

export class CurrencyRepository {
    constructor(private readonly db: LedgerDatabase) {}

    findByCode(code: string): Currency | null {
        const row = this.db.queryOne(`SELECT ${SELECT_COLUMNS} FROM currencies WHERE code = ?`, [code]);
        return row === undefined ? null : toCurrency(row);
    }

    list(filter: CurrencyFilter = {}): Currency[] {
        const clauses: string[] = [];
        const params: SqlParam[] = [];
        if (filter.assetClass) {
            clauses.push('asset_class = ?');
            params.push(filter.assetClass);
        }
        if (filter.enabledOnly) {
            clauses.push('enabled = 1');
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

        const sql = `
            SELECT ${SELECT_COLUMNS}
            FROM currencies
            ${where}
            ORDER BY
                CASE asset_class
                    WHEN 'fiat' THEN 1
                    WHEN 'stablecoin' THEN 2
                    WHEN 'crypto' THEN 3
                END,
                code
        `;
        const { rows } = this.db.query(sql, params);
        return rows.map(toCurrency);
    }

    insert(currency: Currency): void {
        this.db.execute(
            `INSERT INTO currencies (code, name, symbol, decimals, asset_class, enabled, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                currency.code,
                currency.name,
                currency.symbol,
                currency.decimalPrecision,
                currency.assetClass,
                currency.enabled ? 1 : 0,
                currency.createdAt.toISOString(),
                currency.updatedAt.toISOString(),
            ],
        );
    }

    update(code: string, changes: CurrencyUpdate & { enabled?: boolean }, updatedAt: Date): boolean {
        const sets: string[] = [];
        const params: SqlParam[] = [];
        if (changes.name !== undefined) {
            sets.push('name = ?');
            params.push(changes.name);
        }
        if (changes.symbol !== undefined) {
            sets.push('symbol = ?');
            params.push(changes.symbol);
        }
        if (changes.decimalPrecision !== undefined) {
            sets.push('decimals = ?');
            params.push(changes.decimalPrecision);
        }
        if (changes.enabled !== undefined) {
            sets.push('enabled = ?');
            params.push(changes.enabled ? 1 : 0);
        }
        sets.push('updated_at = ?');
        params.push(updatedAt.toISOString(), code);

        const { changes: affected } = this.db.execute(
            `UPDATE currencies SET ${sets.join(', ')} WHERE code = ?`,
            params,
        );
        return affected > 0;
    }
}
