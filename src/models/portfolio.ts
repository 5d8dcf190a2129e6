import type { Decimal } from '../lib/decimal';

/** Caller-supplied price in the ledger's base currency; `null` when unavailable. */
export type PriceLookup = (asset: string) => Decimal | null;

export interface ValuationTotals {
    value: Decimal;
    cost: Decimal;
    unrealizedPnl: Decimal;
    pnlPercent: Decimal;
}

export interface HoldingValuation extends ValuationTotals {
    accountId: string;
    accountName: string;
    category: string;
    asset: string;
    quantity: Decimal;
    avgCostBasis: Decimal;
    price: Decimal;
}

export interface AccountValuation extends ValuationTotals {
    accountId: string;
    accountName: string;
    category: string;
    holdings: HoldingValuation[];
}

export interface CategoryValuation extends ValuationTotals {
    category: string;
    accounts: AccountValuation[];
}

export interface AssetValuation extends ValuationTotals {
    asset: string;
    quantity: Decimal;
}

export interface UnpricedHolding {
    accountId: string;
    asset: string;
    quantity: Decimal;
}

export interface PortfolioValuation {
    baseCurrency: string;
    holdings: HoldingValuation[];
    byAccount: AccountValuation[];
    byCategory: CategoryValuation[];
    byAsset: AssetValuation[];
    totals: ValuationTotals;
    unpriced: UnpricedHolding[];
}
