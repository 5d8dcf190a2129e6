import { z } from 'zod';
import type { LedgerDatabase, SqlParam } from '../db';
import { Decimal, toStorage } from '../lib/decimal';
import {
    DEFAULT_TRANSACTION_LIMIT,
    LedgerTransaction,
    NewTransaction,
    TransactionFilter,
} from '../models/transaction';

const TransactionRow = z.object({
    id: z.number().int(),
    tx_type: z.enum(['buy', 'sell', 'transfer', 'swap']),
    from_account_id: z.string().nullable(),
    from_asset: z.string().nullable(),
    from_quantity: z.string().nullable(),
    to_account_id: z.string().nullable(),
    to_asset: z.string().nullable(),
    to_quantity: z.string().nullable(),
    unit_price: z.string().nullable(),
    price_currency: z.string().nullable(),
    price_amount: z.string().nullable(),
    exchange_rate: z.string().nullable(),
    exchange_rate_pair: z.string().nullable(),
    fee: z.string().nullable(),
    fee_asset: z.string().nullable(),
    notes: z.string().nullable(),
    timestamp: z.string(),
    created_at: z.string(),
});

type TransactionRow = z.infer<typeof TransactionRow>;

const required = (row: TransactionRow, column: keyof TransactionRow): string => {
    const value = row[column];
    if (typeof value !== 'string') {
        throw new Error(`Transaction ${row.id} (${row.tx_type}) has no ${column}`);
    }
    return value;
};

const decimalOrNull = (value: string | null): Decimal | null => (value === null ? null : new Decimal(value));

const toTransaction = (raw: unknown): LedgerTransaction => {
    const row = TransactionRow.parse(raw);
    const base = {
        id: row.id,
        timestamp: new Date(row.timestamp),
        feeAsset: row.fee_asset,
        notes: row.notes,
        createdAt: new Date(row.created_at),
    };

    switch (row.tx_type) {
        case 'buy':
            return {
                ...base,
                txType: 'buy',
                accountId: required(row, 'to_account_id'),
                asset: required(row, 'to_asset'),
                quantity: new Decimal(required(row, 'to_quantity')),
                unitPrice: new Decimal(required(row, 'unit_price')),
                priceCurrency: required(row, 'price_currency'),
                priceAmount: new Decimal(required(row, 'price_amount')),
            };
        case 'sell':
            return {
                ...base,
                txType: 'sell',
                accountId: required(row, 'from_account_id'),
                asset: required(row, 'from_asset'),
                quantity: new Decimal(required(row, 'from_quantity')),
                unitPrice: new Decimal(required(row, 'unit_price')),
                priceCurrency: required(row, 'price_currency'),
                priceAmount: new Decimal(required(row, 'price_amount')),
            };
        case 'transfer':
            return {
                ...base,
                txType: 'transfer',
                fromAccountId: required(row, 'from_account_id'),
                toAccountId: required(row, 'to_account_id'),
                asset: required(row, 'from_asset'),
                quantity: new Decimal(required(row, 'from_quantity')),
                receivedQuantity: new Decimal(required(row, 'to_quantity')),
                fee: new Decimal(row.fee ?? '0'),
            };
        case 'swap':
            return {
                ...base,
                txType: 'swap',
                fromAccountId: required(row, 'from_account_id'),
                fromAsset: required(row, 'from_asset'),
                fromQuantity: new Decimal(required(row, 'from_quantity')),
                toAccountId: required(row, 'to_account_id'),
                toAsset: required(row, 'to_asset'),
                toQuantity: new Decimal(required(row, 'to_quantity')),
                unitPrice: new Decimal(required(row, 'unit_price')),
                exchangeRate: decimalOrNull(row.exchange_rate),
                exchangeRatePair: row.exchange_rate_pair,
            };
    }
};

type Columns = Omit<TransactionRow, 'id' | 'created_at'>;

const EMPTY_COLUMNS: Omit<Columns, 'tx_type' | 'timestamp'> = {
    from_account_id: null,
    from_asset: null,
    from_quantity: null,
    to_account_id: null,
    to_asset: null,
    to_quantity: null,
    unit_price: null,
    price_currency: null,
    price_amount: null,
    exchange_rate: null,
    exchange_rate_pair: null,
    fee: null,
    fee_asset: null,
    notes: null,
};

const toColumns = (tx: NewTransaction): Columns => {
    const common = {
        ...EMPTY_COLUMNS,
        tx_type: tx.txType,
        timestamp: tx.timestamp.toISOString(),
        fee_asset: tx.feeAsset,
        notes: tx.notes,
    };

    switch (tx.txType) {
        case 'buy':
            return {
                ...common,
                to_account_id: tx.accountId,
                to_asset: tx.asset,
                to_quantity: toStorage(tx.quantity),
                unit_price: toStorage(tx.unitPrice),
                price_currency: tx.priceCurrency,
                price_amount: toStorage(tx.priceAmount),
            };
        case 'sell':
            return {
                ...common,
                from_account_id: tx.accountId,
                from_asset: tx.asset,
                from_quantity: toStorage(tx.quantity),
                unit_price: toStorage(tx.unitPrice),
                price_currency: tx.priceCurrency,
                price_amount: toStorage(tx.priceAmount),
            };
        case 'transfer':
            return {
                ...common,
                from_account_id: tx.fromAccountId,
                from_asset: tx.asset,
                from_quantity: toStorage(tx.quantity),
                to_account_id: tx.toAccountId,
                to_asset: tx.asset,
                to_quantity: toStorage(tx.receivedQuantity),
                fee: toStorage(tx.fee),
            };
        case 'swap':
            return {
                ...common,
                from_account_id: tx.fromAccountId,
                from_asset: tx.fromAsset,
                from_quantity: toStorage(tx.fromQuantity),
                to_account_id: tx.toAccountId,
                to_asset: tx.toAsset,
                to_quantity: toStorage(tx.toQuantity),
                unit_price: toStorage(tx.unitPrice),
                exchange_rate: tx.exchangeRate === null ? null : toStorage(tx.exchangeRate),
                exchange_rate_pair: tx.exchangeRatePair,
            };
    }
};

const SELECT_COLUMNS = `
    id, tx_type, from_account_id, from_asset, from_quantity,
    to_account_id, to_asset, to_quantity, unit_price, price_currency, price_amount,
    exchange_rate, exchange_rate_pair, fee, fee_asset, notes, timestamp, created_at
`;

export class TransactionRepository {
    constructor(private readonly db: LedgerDatabase) {}

    insert(tx: NewTransaction, createdAt: Date): number {
        const columns = toColumns(tx);
        const names = Object.keys(columns);
        const values: SqlParam[] = Object.values(columns);

        const { lastInsertId } = this.db.execute(
            `INSERT INTO transactions (${names.join(', ')}, created_at)
             VALUES (${names.map(() => '?').join(', ')}, ?)`,
            [...values, createdAt.toISOString()],
        );
        return lastInsertId;
    }

    findById(id: number): LedgerTransaction | null {
        const row = this.db.queryOne(`SELECT ${SELECT_COLUMNS} FROM transactions WHERE id = ?`, [id]);
        return row === undefined ? null : toTransaction(row);
    }

    list(filter: TransactionFilter = {}): LedgerTransaction[] {
        const params: SqlParam[] = [];
        let where = '';
        if (filter.accountId) {
            where = 'WHERE from_account_id = ? OR to_account_id = ?';
            params.push(filter.accountId, filter.accountId);
        }
        params.push(filter.limit ?? DEFAULT_TRANSACTION_LIMIT);

        const { rows } = this.db.query(
            `SELECT ${SELECT_COLUMNS}
             FROM transactions
             ${where}
             ORDER BY timestamp DESC, id DESC
             LIMIT ?`,
            params,
        );
        return rows.map(toTransaction);
    }
}
