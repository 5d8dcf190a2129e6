import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import type { ExchangeRate } from '../models/exchangeRate';
import { mapResult } from '../models/result';
import { dateField, decimalField, sendInternalError, sendResult, sendValidationError } from './respond';

const DAY_MS = 24 * 60 * 60 * 1000;

const RateBody = z.object({
    fromCurrency: z.string(),
    toCurrency: z.string(),
    rate: decimalField,
    timestamp: dateField.optional(),
    source: z.string().optional(),
    notes: z.string().nullable().optional(),
});

const PairQuery = z.object({ from: z.string(), to: z.string() });

const AsOfQuery = PairQuery.extend({ at: dateField.optional() });

const HistoryQuery = PairQuery.extend({
    limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const ConvertQuery = AsOfQuery.extend({ amount: decimalField });

export class ExchangeRateController {
    constructor(private readonly ledger: Ledger) {}

    public async upsert(req: Request, res: Response): Promise<void> {
        const body = RateBody.safeParse(req.body);
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        try {
            const { timestamp, ...input } = body.data;
            const stored = this.ledger.rates.upsert({ ...input, timestamp: timestamp ?? this.ledger.now() });
            sendResult(res, mapResult(stored, (id) => ({ id })), 201);
        } catch (error) {
            sendInternalError(res, 'storing exchange rate', error);
        }
    }

    public async latest(req: Request, res: Response): Promise<void> {
        const query = PairQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            sendResult(res, this.ledger.rates.latest(query.data.from, query.data.to));
        } catch (error) {
            sendInternalError(res, 'retrieving latest exchange rate', error);
        }
    }

    public async asOf(req: Request, res: Response): Promise<void> {
        const query = AsOfQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const { from, to, at } = query.data;
            sendResult(res, this.ledger.rates.asOf(from, to, at ?? this.ledger.now()));
        } catch (error) {
            sendInternalError(res, 'retrieving exchange rate', error);
        }
    }

    public async history(req: Request, res: Response): Promise<void> {
        const query = HistoryQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const { from, to, limit } = query.data;
            const history = this.ledger.rates.history(from, to);
            sendResult(
                res,
                mapResult(history, (rates) => {
                    const page: ExchangeRate[] = [];
                    for (const rate of rates) {
                        if (page.length >= limit) {
                            break;
                        }
                        page.push(rate);
                    }
                    return page;
                }),
            );
        } catch (error) {
            sendInternalError(res, 'retrieving exchange rate history', error);
        }
    }

    public async convert(req: Request, res: Response): Promise<void> {
        const query = ConvertQuery.safeParse(req.query);
        if (!query.success) {
            sendValidationError(res, query.error);
            return;
        }

        try {
            const { amount, from, to, at } = query.data;
            const maxAgeMs = this.ledger.rateMaxAgeDays === undefined ? undefined : this.ledger.rateMaxAgeDays * DAY_MS;
            sendResult(res, this.ledger.rates.convert(amount, from, to, at ?? this.ledger.now(), maxAgeMs));
        } catch (error) {
            sendInternalError(res, 'converting amount', error);
        }
    }
}
