import { z } from 'zod';
import type { LedgerDatabase, SqlParam } from '../db';
import { Decimal, toStorage } from '../lib/decimal';
import { ConflictError } from '../models/errors';
import type { Holding, HoldingFilter } from '../models/holding';

const HoldingRow = z.object({
    id: z.number().int(),
    account_id: z.string(),
    asset: z.string(),
    quantity: z.string(),
    avg_cost_basis: z.string(),
    cost_basis_currency: z.string(),
    version: z.number().int(),
    updated_at: z.string(),
});

const toHolding = (raw: unknown): Holding => {
    const row = HoldingRow.parse(raw);
    return {
        id: row.id,
        accountId: row.account_id,
        asset: row.asset,
        quantity: new Decimal(row.quantity),
        avgCostBasis: new Decimal(row.avg_cost_basis),
        costBasisCurrency: row.cost_basis_currency,
        version: row.version,
        updatedAt: new Date(row.updated_at),
    };
};

const SELECT_COLUMNS =
    'id, account_id, asset, quantity, avg_cost_basis, cost_basis_currency, version, updated_at';

export interface HoldingWrite {
    accountId: string;
    asset: string;
    quantity: Decimal;
    avgCostBasis: Decimal;
    costBasisCurrency: string;
    updatedAt: Date;
}

export class HoldingRepository {
    constructor(private readonly db: LedgerDatabase) {}

    find(accountId: string, asset: string): Holding | null {
        const row = this.db.queryOne(
            `SELECT ${SELECT_COLUMNS} FROM holdings WHERE account_id = ? AND asset = ?`,
            [accountId, asset],
        );
        return row === undefined ? null : toHolding(row);
    }

    list(filter: HoldingFilter = {}): Holding[] {
        const clauses: string[] = [];
        const params: SqlParam[] = [];
        if (filter.accountId) {
            clauses.push('account_id = ?');
            params.push(filter.accountId);
        }
        if (filter.asset) {
            clauses.push('asset = ?');
            params.push(filter.asset);
        }
        const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

        const { rows } = this.db.query(
            `SELECT ${SELECT_COLUMNS} FROM holdings ${where} ORDER BY account_id, asset`,
            params,
        );
        const holdings = rows.map(toHolding);
        // Quantities are TEXT, so the zero filter happens here rather than in SQL.
        return filter.includeEmpty ? holdings : holdings.filter((holding) => !holding.quantity.isZero());
    }

    insert(holding: HoldingWrite): void {
        try {
            this.db.execute(
                `INSERT INTO holdings (account_id, asset, quantity, avg_cost_basis, cost_basis_currency, version, updated_at)
                 VALUES (?, ?, ?, ?, ?, 1, ?)`,
                [
                    holding.accountId,
                    holding.asset,
                    toStorage(holding.quantity),
                    toStorage(holding.avgCostBasis),
                    holding.costBasisCurrency,
                    holding.updatedAt.toISOString(),
                ],
            );
        } catch (error) {
            if (error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
                throw new ConflictError(
                    `Holding ${holding.asset} in account ${holding.accountId} was created concurrently`,
                );
            }
            throw error;
        }
    }

    /** Writes only if nobody bumped `version` since `expectedVersion` was read. */
    update(holding: HoldingWrite, expectedVersion: number): void {
        const { changes } = this.db.execute(
            `UPDATE holdings
             SET quantity = ?, avg_cost_basis = ?, cost_basis_currency = ?, version = version + 1, updated_at = ?
             WHERE account_id = ? AND asset = ? AND version = ?`,
            [
                toStorage(holding.quantity),
                toStorage(holding.avgCostBasis),
                holding.costBasisCurrency,
                holding.updatedAt.toISOString(),
                holding.accountId,
                holding.asset,
                expectedVersion,
            ],
        );
        if (changes === 0) {
            throw new ConflictError(
                `Holding ${holding.asset} in account ${holding.accountId} changed since it was read`,
            );
        }
    }
}
