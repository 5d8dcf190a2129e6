import { Router } from 'express';
import { AccountController } from '../controllers/accountController';
import type { Ledger } from '../ledger';

const accountRoutes = (ledger: Ledger): Router => {
    const router = Router();
    const controller = new AccountController(ledger);

    router.get('/', controller.list.bind(controller));
    router.post('/', controller.create.bind(controller));
    router.get('/:ref', controller.get.bind(controller));

    return router;
};

export default accountRoutes;
