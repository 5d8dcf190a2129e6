import { Router } from 'express';
import { ExchangeRateController } from '../controllers/exchangeRateController';
import type { Ledger } from '../ledger';

const exchangeRateRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new ExchangeRateController(ledger);

    router.post('/', controller.upsert.bind(controller));
    // GET /api/rates/latest?from=USD&to=CRC
    router.get('/latest', controller.latest.bind(controller));
    router.get('/as-of', controller.asOf.bind(controller));
    router.get('/history', controller.history.bind(controller));
    // GET /api/rates/convert?amount=100&from=USD&to=CRC&at=2024-03-01T00:00:00Z
    router.get('/convert', controller.convert.bind(controller));

    return router;
};

export default exchangeRateRoutes;
