import type { Decimal } from '../lib/decimal';

export interface Holding {
    id: number;
    accountId: string;
    asset: string;
    quantity: Decimal;
    avgCostBasis: Decimal; // per unit; void while quantity is zero
    costBasisCurrency: string;
    version: number;
    updatedAt: Date;
}

export interface HoldingSnapshot {
    accountId: string;
    asset: string;
    quantityBefore: Decimal;
    quantity: Decimal;
    avgCostBasis: Decimal;
    costBasisCurrency: string;
    /** Advisory only: `(unitPrice - avgCost) * sold` on a priced decrease. Never persisted. */
    realizedPnl: Decimal | null;
}

export interface HoldingFilter {
    accountId?: string;
    asset?: string;
    includeEmpty?: boolean;
}

export const costBasisTotal = (holding: Pick<Holding, 'quantity' | 'avgCostBasis'>): Decimal =>
    holding.quantity.times(holding.avgCostBasis);
