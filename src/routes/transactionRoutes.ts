import { Router } from 'express';
import { TransactionController } from '../controllers/transactionController';
import type { Ledger } from '../ledger';

const transactionRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new TransactionController(ledger);

    // POST /api/transactions { type: 'buy' | 'sell' | 'transfer' | 'swap', ... }
    // Applies every holding movement of the event atomically
    router.post('/', controller.record.bind(controller));
    // GET /api/transactions?account=Binance&limit=20
    router.get('/', controller.list.bind(controller));
    router.get('/:id', controller.get.bind(controller));

    return router;
};

export default transactionRoutes;
