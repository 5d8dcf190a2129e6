import type { LedgerDatabase } from '../db';
import { Decimal, DecimalInput, toDecimal, ZERO } from '../lib/decimal';
import type { AccountRegistry } from '../models/account';
import { InsufficientHoldingsError, InvalidInputError, NotFoundError } from '../models/errors';
import type { Holding, HoldingFilter, HoldingSnapshot } from '../models/holding';
import { attempt, Result } from '../models/result';
import type { HoldingRepository } from '../repositories/holdingRepository';
import type { CurrencyCatalog } from './currencyCatalog';

export interface HoldingsLedgerOptions {
    baseCurrency: string;
    now?: () => Date;
}

/**
 * Quantity and weighted-average cost per (account, asset).
 *
 * Increase with a price blends it in: c1 = (q0*c0 + d*p) / (q0 + d).
 * Increase without a price keeps c0. A decrease never moves the average; when
 * priced, it reports (p - c0) * |d| as advisory realized P&L.
 */
export class HoldingsLedger {
    private readonly baseCurrency: string;
    private readonly now: () => Date;

    constructor(
        private readonly db: LedgerDatabase,
        private readonly repo: HoldingRepository,
        private readonly catalog: CurrencyCatalog,
        private readonly accounts: AccountRegistry,
        options: HoldingsLedgerOptions,
    ) {
        this.baseCurrency = options.baseCurrency;
        this.now = options.now ?? (() => new Date());
    }

    apply(
        account: string,
        asset: string,
        quantityDelta: DecimalInput,
        unitPrice?: DecimalInput,
    ): Result<HoldingSnapshot> {
        return attempt(() =>
            this.db.transaction(() => {
                const accountId = this.accounts.resolve(account).id;
                const code = this.catalog.require(asset).code;
                const delta = toDecimal(quantityDelta, 'quantityDelta');
                const price = unitPrice === undefined ? undefined : toDecimal(unitPrice, 'unitPrice');
                return this.applyDelta(accountId, code, delta, price);
            }),
        );
    }

    get(account: string, asset: string): Result<Holding> {
        return attempt(() => {
            const accountId = this.accounts.resolve(account).id;
            const code = this.catalog.require(asset).code;
            const holding = this.repo.find(accountId, code);
            if (!holding) {
                throw new NotFoundError('holding', `${accountId}/${code}`);
            }
            return holding;
        });
    }

    list(filter: HoldingFilter = {}): Result<Holding[]> {
        return attempt(() =>
            this.repo.list({
                ...filter,
                accountId: filter.accountId === undefined ? undefined : this.accounts.resolve(filter.accountId).id,
                asset: filter.asset === undefined ? undefined : this.catalog.require(filter.asset).code,
            }),
        );
    }

    /** Current quantity and average, zero for a pair that was never touched. */
    position(accountId: string, asset: string): { quantity: Decimal; avgCostBasis: Decimal } {
        const holding = this.repo.find(accountId, asset);
        return { quantity: holding?.quantity ?? ZERO, avgCostBasis: holding?.avgCostBasis ?? ZERO };
    }

    /**
     * Applies one movement to already-resolved ids. Throws; callers wrap it in a
     * ledger transaction so that a failure rolls back every leg.
     */
    applyDelta(accountId: string, asset: string, delta: Decimal, unitPrice?: Decimal): HoldingSnapshot {
        if (delta.isZero()) {
            throw new InvalidInputError('quantityDelta must not be zero', 'quantityDelta');
        }
        if (unitPrice !== undefined && unitPrice.isNegative() && !unitPrice.isZero()) {
            throw new InvalidInputError('unitPrice must not be negative', 'unitPrice');
        }

        const existing = this.repo.find(accountId, asset);
        const q0 = existing?.quantity ?? ZERO;
        const c0 = existing?.avgCostBasis ?? ZERO;
        if (existing && !q0.isZero() && existing.costBasisCurrency !== this.baseCurrency) {
            throw new InvalidInputError(
                `Holding ${asset} in account ${accountId} is costed in ${existing.costBasisCurrency}, ` +
                    `not the ledger base currency ${this.baseCurrency}`,
            );
        }

        let q1: Decimal;
        let c1: Decimal;
        let realizedPnl: Decimal | null = null;

        if (delta.isPositive()) {
            q1 = q0.plus(delta);
            c1 = unitPrice === undefined ? c0 : q0.times(c0).plus(delta.times(unitPrice)).dividedBy(q1);
        } else {
            q1 = q0.plus(delta);
            if (q1.isNegative()) {
                throw new InsufficientHoldingsError(accountId, asset, q0.toFixed(), delta.abs().toFixed());
            }
            c1 = c0;
            if (unitPrice !== undefined) {
                realizedPnl = unitPrice.minus(c0).times(delta.abs());
            }
        }

        const write = {
            accountId,
            asset,
            quantity: q1,
            avgCostBasis: c1,
            costBasisCurrency: this.baseCurrency,
            updatedAt: this.now(),
        };
        if (existing) {
            this.repo.update(write, existing.version);
        } else {
            this.repo.insert(write);
        }

        return {
            accountId,
            asset,
            quantityBefore: q0,
            quantity: q1,
            avgCostBasis: c1,
            costBasisCurrency: this.baseCurrency,
            realizedPnl,
        };
    }
}
