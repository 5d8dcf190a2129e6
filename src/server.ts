import config from './config';
import { startServer } from './app';
import { openDatabase } from './db';
import { createLedger } from './ledger';

const db = openDatabase(config.db.path, { busyTimeoutMs: config.db.busyTimeoutMs });
const ledger = createLedger(db, { baseCurrency: config.baseCurrency, rateMaxAgeDays: config.rateMaxAgeDays });
const server = startServer(ledger);

const shutdown = (signal: string) => {
    console.log(`Received ${signal}, closing ledger database`);
    server.close((error) => {
        if (error) {
            console.error('Error stopping server:', error);
        }
        db.close();
        process.exit(error ? 1 : 0);
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
