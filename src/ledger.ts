import { LedgerDatabase } from './db';
import type { AccountRegistry } from './models/account';
import { AccountRepository } from './repositories/accountRepository';
import { CurrencyRepository } from './repositories/currencyRepository';
import { ExchangeRateRepository } from './repositories/exchangeRateRepository';
import { HoldingRepository } from './repositories/holdingRepository';
import { TransactionRepository } from './repositories/transactionRepository';
import { CurrencyCatalog } from './services/currencyCatalog';
import { ExchangeRateStore } from './services/exchangeRateStore';
import { HoldingsLedger } from './services/holdingsLedger';
import { PortfolioAggregator } from './services/portfolioAggregator';
import { TransactionRecorder } from './services/transactionRecorder';

export interface LedgerOptions {
    baseCurrency: string;
    rateMaxAgeDays?: number;
    /** Replaces the built-in SQLite account table, e.g. with an external account service. */
    accounts?: AccountRegistry;
    now?: () => Date;
}

export interface Ledger {
    db: LedgerDatabase;
    baseCurrency: string;
    rateMaxAgeDays: number | undefined;
    now: () => Date;
    /** The built-in account table; `registry` is what the engine actually resolves against. */
    accounts: AccountRepository;
    registry: AccountRegistry;
    currencies: CurrencyCatalog;
    rates: ExchangeRateStore;
    holdings: HoldingsLedger;
    transactions: TransactionRecorder;
    portfolio: PortfolioAggregator;
}

export const createLedger = (db: LedgerDatabase, options: LedgerOptions): Ledger => {
    const now = options.now ?? (() => new Date());
    const accounts = new AccountRepository(db);
    const registry = options.accounts ?? accounts;
    const currencies = new CurrencyCatalog(new CurrencyRepository(db), now);

    // Fails fast on a base currency the catalog does not know.
    const baseCurrency = currencies.require(options.baseCurrency).code;

    const rates = new ExchangeRateStore(new ExchangeRateRepository(db), currencies, now);
    const holdingRepository = new HoldingRepository(db);
    const holdings = new HoldingsLedger(db, holdingRepository, currencies, registry, { baseCurrency, now });

    return {
        db,
        baseCurrency,
        rateMaxAgeDays: options.rateMaxAgeDays,
        now,
        accounts,
        registry,
        currencies,
        rates,
        holdings,
        transactions: new TransactionRecorder(
            db,
            new TransactionRepository(db),
            holdings,
            rates,
            currencies,
            registry,
            { baseCurrency, rateMaxAgeDays: options.rateMaxAgeDays, now },
        ),
        portfolio: new PortfolioAggregator(db, holdingRepository, registry, { baseCurrency }),
    };
};
