import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import { ACCOUNT_TYPES } from '../models/account';
import { attempt } from '../models/result';
import { sendInternalError, sendResult, sendValidationError } from './respond';

const NewAccountBody = z.object({
    name: z.string(),
    accountType: z.enum(ACCOUNT_TYPES),
    category: z.string().optional(),
});

export class AccountController {
    constructor(private readonly ledger: Ledger) {}

    public async list(req: Request, res: Response): Promise<void> {
        try {
            res.status(200).json(this.ledger.registry.list());
        } catch (error) {
            sendInternalError(res, 'listing accounts', error);
        }
    }

    // GET /api/accounts/:ref where ref is an id or a (case-insensitive) name
    public async get(req: Request, res: Response): Promise<void> {
        try {
            sendResult(res, attempt(() => this.ledger.registry.resolve(req.params.ref)), 200, this.ledger.registry);
        } catch (error) {
            sendInternalError(res, 'retrieving account', error);
        }
    }

    public async create(req: Request, res: Response): Promise<void> {
        const body = NewAccountBody.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        try {
            sendResult(res, attempt(() => this.ledger.accounts.create(body.data, this.ledger.now())), 201);
        } catch (error) {
            sendInternalError(res, 'creating account', error);
        }
    }
}
