import dotenv from 'dotenv';

dotenv.config();

const toInt = (value: string | undefined, fallback: number): number => {
    const parsed = Number.parseInt(value ?? '', 10);
    return Number.isFinite(parsed) ? parsed : fallback;
};

const config = {
    port: toInt(process.env.PORT, 3000),
    db: {
        path: process.env.LEDGER_DB_PATH || './data/ledger.sqlite',
        busyTimeoutMs: toInt(process.env.LEDGER_DB_BUSY_TIMEOUT_MS, 5000),
    },
    // Currency every holding's cost basis is kept in; prices given to the
    // portfolio valuation are expected in it too.
    baseCurrency: (process.env.BASE_CURRENCY || 'USD').toUpperCase(),
    rateMaxAgeDays: toInt(process.env.RATE_MAX_AGE_DAYS, 7),
};

export type LedgerConfig = typeof config;

export default config;
