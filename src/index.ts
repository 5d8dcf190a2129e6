export { LedgerDatabase, openDatabase } from './db';
export type { DatabaseOptions } from './db';
export { createLedger } from './ledger';
export type { Ledger, LedgerOptions } from './ledger';
export { Decimal } from './lib/decimal';
export type { DecimalInput } from './lib/decimal';

export * from './models/errors';
export * from './models/result';
export * from './models/account';
export * from './models/currency';
export * from './models/exchangeRate';
export * from './models/holding';
export * from './models/portfolio';
export * from './models/transaction';

export { CurrencyCatalog } from './services/currencyCatalog';
export { ExchangeRateStore } from './services/exchangeRateStore';
export type { Conversion, ResolvedRate } from './services/exchangeRateStore';
export { HoldingsLedger } from './services/holdingsLedger';
export { PortfolioAggregator } from './services/portfolioAggregator';
export { TransactionRecorder } from './services/transactionRecorder';
