import { Router } from 'express';
import { PortfolioController } from '../controllers/portfolioController';
import type { Ledger } from '../ledger';

const portfolioRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new PortfolioController(ledger);

    // POST /api/portfolio/valuation { prices: { BTC: "60000", ETH: "3000" } }
    router.post('/valuation', controller.valuate.bind(controller));

    return router;
};

export default portfolioRoutes;
