import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import { sendInternalError, sendResult, sendValidationError } from './respond';

const ListQuery = z.object({
    account: z.string().optional(),
    asset: z.string().optional(),
    includeEmpty: z
        .enum(['true', 'false'])
        .optional()
        .transform((value) => value === 'true'),
});

export class HoldingController {
    constructor(private readonly ledger: Ledger) {}

    public async list(req: Request, res: Response): Promise<void> {
        const query = ListQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const { account, asset, includeEmpty } = query.data;
            sendResult(
                res,
                this.ledger.holdings.list({ accountId: account, asset, includeEmpty }),
                200,
                this.ledger.registry,
            );
        } catch (error) {
            sendInternalError(res, 'listing holdings', error);
        }
    }

    public async get(req: Request, res: Response): Promise<void> {
        try {
            sendResult(
                res,
                this.ledger.holdings.get(req.params.account, req.params.asset),
                200,
                this.ledger.registry,
            );
        } catch (error) {
            sendInternalError(res, 'retrieving holding', error);
        }
    }
}
