import type Database from 'better-sqlite3';

interface Migration {
    id: number;
    sql: string;
}

const MIGRATIONS: Migration[] = [
    {
        id: 1,
        sql: `
            CREATE TABLE currencies (
                code        TEXT PRIMARY KEY,
                name        TEXT NOT NULL,
                symbol      TEXT NOT NULL,
                decimals    INTEGER NOT NULL DEFAULT 2,
                asset_class TEXT NOT NULL CHECK (asset_class IN ('fiat', 'crypto', 'stablecoin')),
                enabled     INTEGER NOT NULL DEFAULT 1,
                created_at  TEXT NOT NULL,
                updated_at  TEXT NOT NULL
            );

            INSERT INTO currencies (code, name, symbol, decimals, asset_class, enabled, created_at, updated_at) VALUES
                ('USD',  'US Dollar',         '$',    2,  'fiat',       1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('CRC',  'Costa Rican Colón', '₡',    2,  'fiat',       1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('EUR',  'Euro',              '€',    2,  'fiat',       1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('BTC',  'Bitcoin',           '₿',    8,  'crypto',     1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('ETH',  'Ethereum',          'Ξ',    18, 'crypto',     1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('USDT', 'Tether USD',        'USDT', 6,  'stablecoin', 1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('USDC', 'USD Coin',          'USDC', 6,  'stablecoin', 1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('BNB',  'Binance Coin',      'BNB',  8,  'crypto',     1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
                ('SOL',  'Solana',            'SOL',  9,  'crypto',     1, strftime('%Y-%m-%dT%H:%M:%fZ', 'now'), strftime('%Y-%m-%dT%H:%M:%fZ', 'now'));

            CREATE TABLE exchange_rates (
                id            INTEGER PRIMARY KEY AUTOINCREMENT,
                from_currency TEXT NOT NULL REFERENCES currencies(code),
                to_currency   TEXT NOT NULL REFERENCES currencies(code),
                rate          TEXT NOT NULL,
                timestamp     TEXT NOT NULL,
                source        TEXT NOT NULL DEFAULT 'manual',
                notes         TEXT,
                created_at    TEXT NOT NULL,
                UNIQUE (from_currency, to_currency, timestamp)
            );

            CREATE INDEX idx_exchange_rates_lookup
                ON exchange_rates (from_currency, to_currency, timestamp DESC);

            CREATE TABLE accounts (
                id           TEXT PRIMARY KEY,
                name         TEXT NOT NULL UNIQUE COLLATE NOCASE,
                account_type TEXT NOT NULL CHECK (account_type IN
                    ('exchange', 'hardware_wallet', 'software_wallet', 'custodial_service', 'bank')),
                category     TEXT NOT NULL DEFAULT 'uncategorized',
                created_at   TEXT NOT NULL
            );

            CREATE TABLE holdings (
                id                  INTEGER PRIMARY KEY AUTOINCREMENT,
                account_id          TEXT NOT NULL,
                asset               TEXT NOT NULL REFERENCES currencies(code),
                quantity            TEXT NOT NULL,
                avg_cost_basis      TEXT NOT NULL,
                cost_basis_currency TEXT NOT NULL,
                version             INTEGER NOT NULL DEFAULT 1,
                updated_at          TEXT NOT NULL,
                UNIQUE (account_id, asset)
            );

            CREATE INDEX idx_holdings_asset ON holdings (asset);

            CREATE TABLE transactions (
                id                 INTEGER PRIMARY KEY AUTOINCREMENT,
                tx_type            TEXT NOT NULL CHECK (tx_type IN ('buy', 'sell', 'transfer', 'swap')),
                from_account_id    TEXT,
                from_asset         TEXT,
                from_quantity      TEXT,
                to_account_id      TEXT,
                to_asset           TEXT,
                to_quantity        TEXT,
                unit_price         TEXT,
                price_currency     TEXT,
                price_amount       TEXT,
                exchange_rate      TEXT,
                exchange_rate_pair TEXT,
                fee                TEXT,
                fee_asset          TEXT,
                notes              TEXT,
                timestamp          TEXT NOT NULL,
                created_at         TEXT NOT NULL
            );

            CREATE INDEX idx_transactions_timestamp ON transactions (timestamp);
            CREATE INDEX idx_transactions_from_account ON transactions (from_account_id);
            CREATE INDEX idx_transactions_to_account ON transactions (to_account_id);
        `,
    },
];

/** Applies every migration not yet recorded in `_migrations`, each in its own transaction. */
export function runMigrations(connection: Database.Database): number[] {
    connection.exec(`
        CREATE TABLE IF NOT EXISTS _migrations (
            id         INTEGER PRIMARY KEY,
            applied_at TEXT NOT NULL
        )
    `);

    const isApplied = connection.prepare('SELECT 1 FROM _migrations WHERE id = ?');
    const markApplied = connection.prepare('INSERT INTO _migrations (id, applied_at) VALUES (?, ?)');
    const applied: number[] = [];

    for (const migration of MIGRATIONS) {
        if (isApplied.get(migration.id) !== undefined) continue;

        connection.transaction(() => {
            connection.exec(migration.sql);
            markApplied.run(migration.id, new Date().toISOString());
        })();
        applied.push(migration.id);
    }

    return applied;
}
