import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import { ASSET_CLASSES } from '../models/currency';
import { mapResult } from '../models/result';
import { decimalField, sendInternalError, sendResult, sendValidationError } from './respond';

const NewCurrencyBody = z.object({
    code: z.string(),
    name: z.string(),
    symbol: z.string(),
    decimalPrecision: z.number().int(),
    assetClass: z.enum(ASSET_CLASSES),
    enabled: z.boolean().optional(),
});

const CurrencyPatchBody = z.object({
    name: z.string().optional(),
    symbol: z.string().optional(),
    decimalPrecision: z.number().int().optional(),
    enabled: z.boolean().optional(),
});

const ListQuery = z.object({
    assetClass: z.enum(ASSET_CLASSES).optional(),
    enabledOnly: z
        .enum(['true', 'false'])
        .optional()
        .transform((value) => value === 'true'),
});

const FormatQuery = z.object({ amount: decimalField });

export class CurrencyController {
    constructor(private readonly ledger: Ledger) {}

    public async list(req: Request, res: Response): Promise<void> {
        const query = ListQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            sendResult(res, this.ledger.currencies.list(query.data));
        } catch (error) {
            sendInternalError(res, 'listing currencies', error);
        }
    }

    public async get(req: Request, res: Response): Promise<void> {
        try {
            sendResult(res, this.ledger.currencies.get(req.params.code));
        } catch (error) {
            sendInternalError(res, 'retrieving currency', error);
        }
    }

    public async register(req: Request, res: Response): Promise<void> {
        const body = NewCurrencyBody.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        try {
            sendResult(res, this.ledger.currencies.register(body.data), 201);
        } catch (error) {
            sendInternalError(res, 'registering currency', error);
        }
    }

    public async update(req: Request, res: Response): Promise<void> {
        const body = CurrencyPatchBody.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        try {
            const { enabled, ...changes } = body.data;
            const code = req.params.code;
            const updated = this.ledger.currencies.update(code, changes);
            sendResult(
                res,
                updated.ok && enabled !== undefined ? this.ledger.currencies.setEnabled(code, enabled) : updated,
            );
        } catch (error) {
            sendInternalError(res, 'updating currency', error);
        }
    }

    public async format(req: Request, res: Response): Promise<void> {
        const query = FormatQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const result = this.ledger.currencies.format(req.params.code, query.data.amount);
            sendResult(res, mapResult(result, (formatted) => ({ code: req.params.code.toUpperCase(), formatted })));
        } catch (error) {
            sendInternalError(res, 'formatting amount', error);
        }
    }
}
