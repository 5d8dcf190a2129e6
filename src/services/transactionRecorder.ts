import type { LedgerDatabase } from '../db';
import {
    Decimal,
    ONE,
    toNonNegativeDecimal,
    toPositiveDecimal,
    ZERO,
} from '../lib/decimal';
import type { Account, AccountRegistry } from '../models/account';
import { isFiat } from '../models/currency';
import {
    ArithmeticError,
    InsufficientHoldingsError,
    InvalidInputError,
    NotFoundError,
} from '../models/errors';
import { ExchangeRate, ratePair } from '../models/exchangeRate';
import { attempt, Result } from '../models/result';
import {
    BuyRequest,
    DEFAULT_TRANSACTION_LIMIT,
    LedgerTransaction,
    NewTransaction,
    RecordedTransaction,
    SellRequest,
    SwapRequest,
    TransactionFilter,
    TransactionRequest,
    TransferRequest,
} from '../models/transaction';
import type { TransactionRepository } from '../repositories/transactionRepository';
import type { CurrencyCatalog } from './currencyCatalog';
import { ExchangeRateStore, toValidDate } from './exchangeRateStore';
import type { HoldingsLedger } from './holdingsLedger';

const DAY_MS = 24 * 60 * 60 * 1000;
const MAX_LIST_LIMIT = 1000;

export interface TransactionRecorderOptions {
    baseCurrency: string;
    /** How old a rate may be, relative to the transaction, and still convert a price or fee. */
    rateMaxAgeDays?: number;
    now?: () => Date;
}

const unknownRequest = (request: never): never => {
    throw new InvalidInputError(`Unknown transaction type in ${JSON.stringify(request)}`, 'type');
};

const cleanNotes = (notes: string | null | undefined): string | null => notes?.trim() || null;

/**
 * Validates and applies Buy, Sell, Transfer and Swap requests. Each request is
 * one IMMEDIATE transaction: every leg is validated against a consistent view
 * before the first write, and any failure afterwards rolls all legs back.
 */
export class TransactionRecorder {
    private readonly baseCurrency: string;
    private readonly rateMaxAgeMs: number | undefined;
    private readonly now: () => Date;

    constructor(
        private readonly db: LedgerDatabase,
        private readonly transactions: TransactionRepository,
        private readonly holdings: HoldingsLedger,
        private readonly rates: ExchangeRateStore,
        private readonly catalog: CurrencyCatalog,
        private readonly accounts: AccountRegistry,
        options: TransactionRecorderOptions,
    ) {
        this.baseCurrency = options.baseCurrency;
        this.rateMaxAgeMs = options.rateMaxAgeDays === undefined ? undefined : options.rateMaxAgeDays * DAY_MS;
        this.now = options.now ?? (() => new Date());
    }

    record(request: TransactionRequest): Result<RecordedTransaction> {
        return attempt(() =>
            this.db.transaction(() => {
                switch (request.type) {
                    case 'buy':
                    case 'sell':
                        return this.recordTrade(request);
                    case 'transfer':
                        return this.recordTransfer(request);
                    case 'swap':
                        return this.recordSwap(request);
                    default:
                        return unknownRequest(request);
                }
            }),
        );
    }

    get(id: number): Result<LedgerTransaction> {
        return attempt(() => {
            const transaction = this.transactions.findById(id);
            if (!transaction) {
                throw new NotFoundError('transaction', String(id));
            }
            return transaction;
        });
    }

    /** Newest first; `accountId` matches either side of a movement. */
    list(filter: TransactionFilter = {}): Result<LedgerTransaction[]> {
        return attempt(() => {
            const limit = filter.limit ?? DEFAULT_TRANSACTION_LIMIT;
            if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIST_LIMIT) {
                throw new InvalidInputError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 'limit');
            }
            const accountId = filter.accountId === undefined ? undefined : this.accounts.resolve(filter.accountId).id;
            return this.transactions.list({ accountId, limit });
        });
    }

    private recordTrade(request: BuyRequest | SellRequest): RecordedTransaction {
        const account = this.accounts.resolve(request.accountId);
        const asset = this.catalog.require(request.asset).code;
        const quantity = toPositiveDecimal(request.quantity, 'quantity');
        const priceAmount = toPositiveDecimal(request.unitPrice, 'unitPrice');
        const priceCurrency =
            request.priceCurrency === undefined ? this.baseCurrency : this.catalog.require(request.priceCurrency).code;
        const timestamp = this.timestampOf(request);

        const unitPrice =
            priceCurrency === this.baseCurrency
                ? priceAmount
                : priceAmount.times(this.rateAt(priceCurrency, this.baseCurrency, timestamp));

        if (request.type === 'sell') {
            this.requireAvailable(account, asset, quantity);
        }

        const snapshot = this.holdings.applyDelta(
            account.id,
            asset,
            request.type === 'buy' ? quantity : quantity.negated(),
            unitPrice,
        );

        const transaction = this.insert({
            txType: request.type,
            accountId: account.id,
            asset,
            quantity,
            unitPrice,
            priceCurrency,
            priceAmount,
            timestamp,
            feeAsset: null,
            notes: cleanNotes(request.notes),
        });

        return { transaction, holdings: [snapshot], realizedPnl: snapshot.realizedPnl, capturedRate: null };
    }

    private recordTransfer(request: TransferRequest): RecordedTransaction {
        const from = this.accounts.resolve(request.fromAccountId);
        const to = this.accounts.resolve(request.toAccountId);
        if (from.id === to.id) {
            throw new InvalidInputError('A transfer needs two different accounts', 'toAccountId');
        }
        const asset = this.catalog.require(request.asset).code;
        const quantity = toPositiveDecimal(request.quantity, 'quantity');
        const fee = request.fee === undefined ? ZERO : toNonNegativeDecimal(request.fee, 'fee');
        const feeAsset = request.feeAsset === undefined ? asset : this.catalog.require(request.feeAsset).code;
        const timestamp = this.timestampOf(request);

        const feeInAsset =
            fee.isZero() || feeAsset === asset ? fee : fee.times(this.rateAt(feeAsset, asset, timestamp));
        const received = quantity.minus(feeInAsset);
        if (!received.isPositive() || received.isZero()) {
            throw new InvalidInputError('fee must be smaller than the transferred quantity', 'fee');
        }

        const source = this.requireAvailable(from, asset, quantity);

        // Cost basis travels with the units; the fee is lost at the source's average cost.
        const outgoing = this.holdings.applyDelta(from.id, asset, quantity.negated());
        const incoming = this.holdings.applyDelta(to.id, asset, received, source.avgCostBasis);

        const transaction = this.insert({
            txType: 'transfer',
            fromAccountId: from.id,
            toAccountId: to.id,
            asset,
            quantity,
            receivedQuantity: received,
            fee,
            feeAsset,
            timestamp,
            notes: cleanNotes(request.notes),
        });

        return {
            transaction,
            holdings: [outgoing, incoming],
            realizedPnl: feeInAsset.isZero() ? ZERO : feeInAsset.times(source.avgCostBasis).negated(),
            capturedRate: null,
        };
    }

    private recordSwap(request: SwapRequest): RecordedTransaction {
        const fromAccount = this.accounts.resolve(request.fromAccountId);
        const toAccount =
            request.toAccountId === undefined ? fromAccount : this.accounts.resolve(request.toAccountId);
        const fromAsset = this.catalog.require(request.fromAsset);
        const toAsset = this.catalog.require(request.toAsset);
        if (fromAccount.id === toAccount.id && fromAsset.code === toAsset.code) {
            throw new InvalidInputError('A swap within one account needs two different assets', 'toAsset');
        }

        const fromQuantity = toPositiveDecimal(request.fromQuantity, 'fromQuantity');
        const toQuantity = toNonNegativeDecimal(request.toQuantity, 'toQuantity');
        const manualRate =
            request.manualRate === undefined ? undefined : toPositiveDecimal(request.manualRate, 'manualRate');
        if (toQuantity.isZero()) {
            if (manualRate === undefined) {
                throw new ArithmeticError('Cannot derive an implied rate from a swap with toQuantity 0');
            }
            throw new InvalidInputError('toQuantity must be greater than zero', 'toQuantity');
        }
        const timestamp = this.timestampOf(request);

        // Units of fromAsset paid per unit of toAsset.
        const rate = manualRate ?? fromQuantity.dividedBy(toQuantity);
        const source = this.requireAvailable(fromAccount, fromAsset.code, fromQuantity);
        const fromUnitCost = fromAsset.code === this.baseCurrency ? ONE : source.avgCostBasis;
        const toUnitPrice = rate.times(fromUnitCost);

        const outgoing = this.holdings.applyDelta(fromAccount.id, fromAsset.code, fromQuantity.negated());
        const incoming = this.holdings.applyDelta(toAccount.id, toAsset.code, toQuantity, toUnitPrice);

        // The captured fact is "one toAsset = rate fromAsset", i.e. the pair TO/FROM.
        let capturedRate: ExchangeRate | null = null;
        if (isFiat(fromAsset) && isFiat(toAsset)) {
            capturedRate = this.rates.write({
                fromCurrency: toAsset.code,
                toCurrency: fromAsset.code,
                rate,
                timestamp,
                source: 'swap',
                notes: `${fromQuantity.toFixed()} ${fromAsset.code} -> ${toQuantity.toFixed()} ${toAsset.code}`,
            });
        }

        const transaction = this.insert({
            txType: 'swap',
            fromAccountId: fromAccount.id,
            fromAsset: fromAsset.code,
            fromQuantity,
            toAccountId: toAccount.id,
            toAsset: toAsset.code,
            toQuantity,
            unitPrice: toUnitPrice,
            exchangeRate: capturedRate ? capturedRate.rate : null,
            exchangeRatePair: capturedRate ? ratePair(capturedRate) : null,
            timestamp,
            feeAsset: null,
            notes: cleanNotes(request.notes),
        });

        return { transaction, holdings: [outgoing, incoming], realizedPnl: null, capturedRate };
    }

    private requireAvailable(
        account: Account,
        asset: string,
        required: Decimal,
    ): { quantity: Decimal; avgCostBasis: Decimal } {
        const position = this.holdings.position(account.id, asset);
        if (position.quantity.lessThan(required)) {
            throw new InsufficientHoldingsError(account.id, asset, position.quantity.toFixed(), required.toFixed());
        }
        return position;
    }

    private rateAt(fromCurrency: string, toCurrency: string, at: Date): Decimal {
        return this.rates.resolve(fromCurrency, toCurrency, at, this.rateMaxAgeMs).rate;
    }

    private timestampOf(request: TransactionRequest): Date {
        return request.timestamp === undefined ? this.now() : toValidDate(request.timestamp, 'timestamp');
    }

    private insert(tx: NewTransaction): LedgerTransaction {
        const id = this.transactions.insert(tx, this.now());
        const stored = this.transactions.findById(id);
        if (!stored) {
            throw new Error(`Transaction ${id} vanished after insert`);
        }
        return stored;
    }
}
