import { Request, Response } from 'express';
import { z } from 'zod';
import type { Ledger } from '../ledger';
import { toDecimal } from '../lib/decimal';
import type { PriceLookup } from '../models/portfolio';
import { normalizeCode } from '../services/currencyCatalog';
import { decimalField, sendInternalError, sendResult, sendValidationError } from './respond';

const ValuationBody = z.object({
    // asset code -> price per unit in the ledger's base currency
    prices: z.record(decimalField).default({}),
});

export class PortfolioController {
    constructor(private readonly ledger: Ledger) {}

    public async valuate(req: Request, res: Response): Promise<void> {
        const body = ValuationBody.safeParse(req.body ?? {});
        if (!body.success) {
            sendValidationError(res, body.error);
            return;
        }

        const prices = new Map(
            Object.entries(body.data.prices).map(([asset, price]): [string, string | number] => [
                normalizeCode(asset),
                price,
            ]),
        );
        const priceOf: PriceLookup = (asset) => {
            const price = prices.get(asset);
            return price === undefined ? null : toDecimal(price, `prices.${asset}`);
        };

        try {
            sendResult(res, this.ledger.portfolio.valuate(priceOf));
        } catch (error) {
            sendInternalError(res, 'valuating portfolio', error);
        }
    }
}
