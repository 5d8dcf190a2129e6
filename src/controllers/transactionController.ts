import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import { dateField, decimalField, sendInternalError, sendResult, sendValidationError } from './respond';

const common = {
    timestamp: dateField.optional(),
    notes: z.string().nullable().optional(),
};

const TradeFields = {
    ...common,
    accountId: z.string(),
    asset: z.string(),
    quantity: decimalField,
    unitPrice: decimalField,
    priceCurrency: z.string().optional(),
};

const TransactionBody = z.discriminatedUnion('type', [
    z.object({ type: z.literal('buy'), ...TradeFields }),
    z.object({ type: z.literal('sell'), ...TradeFields }),
    z.object({
        type: z.literal('transfer'),
        ...common,
        fromAccountId: z.string(),
        toAccountId: z.string(),
        asset: z.string(),
        quantity: decimalField,
        fee: decimalField.optional(),
        feeAsset: z.string().optional(),
    }),
    z.object({
        type: z.literal('swap'),
        ...common,
        fromAccountId: z.string(),
        toAccountId: z.string().optional(),
        fromAsset: z.string(),
        fromQuantity: decimalField,
        toAsset: z.string(),
        toQuantity: decimalField,
        manualRate: decimalField.optional(),
    }),
]);

const ListQuery = z.object({
    account: z.string().optional(),
    limit: z.coerce.number().int().optional(),
});

export class TransactionController {
    constructor(private readonly ledger: Ledger) {}

    public async record(req: Request, res: Response): Promise<void> {
        const body = TransactionBody.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        try {
            sendResult(res, this.ledger.transactions.record(body.data), 201, this.ledger.registry);
        } catch (error) {
            sendInternalError(res, 'recording transaction', error);
        }
    }

    public async list(req: Request, res: Response): Promise<void> {
        const query = ListQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const { account, limit } = query.data;
            sendResult(res, this.ledger.transactions.list({ accountId: account, limit }), 200, this.ledger.registry);
        } catch (error) {
            sendInternalError(res, 'listing transactions', error);
        }
    }

    public async get(req: Request, res: Response): Promise<void> {
        const id = Number(req.params.id);
        if (!Number.isInteger(id)) {
            res.status(400).json({ code: 'INVALID_INPUT', message: 'Invalid id. Must be an integer.' });
            return;
        }

        try {
            sendResult(res, this.ledger.transactions.get(id));
        } catch (error) {
            sendInternalError(res, 'retrieving transaction', error);
        }
    }
}
