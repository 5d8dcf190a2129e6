import type { Decimal, DecimalInput } from '../lib/decimal';
import type { ExchangeRate } from './exchangeRate';
import type { HoldingSnapshot } from './holding';

export type TransactionType = 'buy' | 'sell' | 'transfer' | 'swap';

interface RequestBase {
    timestamp?: Date;
    notes?: string | null;
}

export interface BuyRequest extends RequestBase {
    type: 'buy';
    accountId: string; // name or id
    asset: string;
    quantity: DecimalInput;
    unitPrice: DecimalInput;
    priceCurrency?: string; // defaults to the ledger's base currency
}

export interface SellRequest extends RequestBase {
    type: 'sell';
    accountId: string;
    asset: string;
    quantity: DecimalInput;
    unitPrice: DecimalInput;
    priceCurrency?: string;
}

export interface TransferRequest extends RequestBase {
    type: 'transfer';
    fromAccountId: string;
    toAccountId: string;
    asset: string;
    quantity: DecimalInput;
    fee?: DecimalInput;
    feeAsset?: string; // defaults to `asset`
}

export interface SwapRequest extends RequestBase {
    type: 'swap';
    fromAccountId: string;
    toAccountId?: string; // defaults to fromAccountId
    fromAsset: string;
    fromQuantity: DecimalInput;
    toAsset: string;
    toQuantity: DecimalInput;
    /** Units of `fromAsset` paid per one unit of `toAsset`, e.g. 550 for CRC -> USD. */
    manualRate?: DecimalInput;
}

export type TransactionRequest = BuyRequest | SellRequest | TransferRequest | SwapRequest;

interface TransactionBase {
    id: number;
    timestamp: Date;
    feeAsset: string | null;
    notes: string | null;
    createdAt: Date;
}

export interface BuyTransaction extends TransactionBase {
    txType: 'buy';
    accountId: string;
    asset: string;
    quantity: Decimal;
    unitPrice: Decimal; // in the base currency
    priceCurrency: string; // as entered
    priceAmount: Decimal;
}

export interface SellTransaction extends Omit<BuyTransaction, 'txType'> {
    txType: 'sell';
}

export interface TransferTransaction extends TransactionBase {
    txType: 'transfer';
    fromAccountId: string;
    toAccountId: string;
    asset: string;
    quantity: Decimal; // left the source
    receivedQuantity: Decimal; // arrived at the destination
    fee: Decimal; // in feeAsset
}

export interface SwapTransaction extends TransactionBase {
    txType: 'swap';
    fromAccountId: string;
    fromAsset: string;
    fromQuantity: Decimal;
    toAccountId: string;
    toAsset: string;
    toQuantity: Decimal;
    unitPrice: Decimal; // cost per unit of toAsset carried into the destination
    exchangeRate: Decimal | null; // captured for fiat-to-fiat swaps
    exchangeRatePair: string | null;
}

export type LedgerTransaction = BuyTransaction | SellTransaction | TransferTransaction | SwapTransaction;

/** A transaction as handed to the repository, before it has an id. */
export type NewTransaction = DistributiveOmit<LedgerTransaction, 'id' | 'createdAt'>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export interface RecordedTransaction {
    transaction: LedgerTransaction;
    holdings: HoldingSnapshot[];
    /** Sell: gain against average cost. Transfer: the fee as a loss at source cost. */
    realizedPnl: Decimal | null;
    capturedRate: ExchangeRate | null;
}

export interface TransactionFilter {
    accountId?: string;
    limit?: number;
}

export const DEFAULT_TRANSACTION_LIMIT = 50;
