import { Router } from 'express';
import { CurrencyController } from '../controllers/currencyController';
import type { Ledger } from '../ledger';

const currencyRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new CurrencyController(ledger);

    // GET /api/currencies?assetClass=crypto&enabledOnly=true
    router.get('/', controller.list.bind(controller));
    router.post('/', controller.register.bind(controller));
    router.get('/:code', controller.get.bind(controller));
    // PATCH /api/currencies/:code { name?, symbol?, decimalPrecision?, enabled? }
    router.patch('/:code', controller.update.bind(controller));
    // GET /api/currencies/BTC/format?amount=0.123456789
    router.get('/:code/format', controller.format.bind(controller));

    return router;
};

export default currencyRoutes;
