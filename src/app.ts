import express, { NextFunction, Request, Response } from 'express';
import config from './config';
import type { Ledger } from './ledger';
import accountRoutes from './routes/accountRoutes';
import currencyRoutes from './routes/currencyRoutes';
import exchangeRateRoutes from './routes/exchangeRateRoutes';
import holdingRoutes from './routes/holdingRoutes';
import portfolioRoutes from './routes/portfolioRoutes';
import transactionRoutes from './routes/transactionRoutes';

export const createApp = (ledger: Ledger): express.Express => {
    const app = express();

    app.use(express.json());

    // Health check endpoint
    app.get('/health', (req, res) => {
        res.status(200).json({ status: 'OK', timestamp: new Date().toISOString(), baseCurrency: ledger.baseCurrency });
    });

    app.use('/api/currencies', currencyRoutes(ledger));
    app.use('/api/rates', exchangeRateRoutes(ledger));
    app.use('/api/accounts', accountRoutes(ledger));
    app.use('/api/holdings', holdingRoutes(ledger));
    app.use('/api/transactions', transactionRoutes(ledger));
    app.use('/api/portfolio', portfolioRoutes(ledger));

    // Malformed JSON bodies end up here
    app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(error);
            return;
        }
        if (error instanceof SyntaxError) {
            res.status(400).json({ code: 'INVALID_INPUT', message: 'Malformed JSON body' });
            return;
        }
        console.error('Unhandled request error:', error);
        res.status(500).json({ message: 'Internal server error' });
    });

    return app;
};

export const startServer = (ledger: Ledger, port: number = config.port) =>
    createApp(ledger).listen(port, () => {
        console.log(`Ledger API is running on port ${port} (base currency ${ledger.baseCurrency})`);
    });
