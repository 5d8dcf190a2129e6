import { Router } from 'express';
import { HoldingController } from '../controllers/holdingController';
import type { Ledger } from '../ledger';

const holdingRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new HoldingController(ledger);

    // GET /api/holdings?account=Binance&asset=BTC&includeEmpty=true
    router.get('/', controller.list.bind(controller));
    router.get('/:account/:asset', controller.get.bind(controller));

    return router;
};

export default holdingRoutes;
