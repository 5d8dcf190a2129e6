import type { LedgerDatabase } from '../db';
import { Decimal, HUNDRED, ONE, sum, ZERO } from '../lib/decimal';
import { Account, AccountRegistry, DEFAULT_CATEGORY } from '../models/account';
import { costBasisTotal } from '../models/holding';
import type {
    AccountValuation,
    AssetValuation,
    CategoryValuation,
    HoldingValuation,
    PortfolioValuation,
    PriceLookup,
    UnpricedHolding,
    ValuationTotals,
} from '../models/portfolio';
import { attempt, Result } from '../models/result';
import type { HoldingRepository } from '../repositories/holdingRepository';

const totalsOf = (value: Decimal, cost: Decimal): ValuationTotals => {
    const unrealizedPnl = value.minus(cost);
    return {
        value,
        cost,
        unrealizedPnl,
        pnlPercent: cost.isZero() ? ZERO : unrealizedPnl.dividedBy(cost).times(HUNDRED),
    };
};

const rollUp = (parts: ValuationTotals[]): ValuationTotals =>
    totalsOf(
        sum(parts.map((part) => part.value)),
        sum(parts.map((part) => part.cost)),
    );

const byText = (a: string, b: string): number => a.localeCompare(b);

export class PortfolioAggregator {
    private readonly baseCurrency: string;

    constructor(
        private readonly db: LedgerDatabase,
        private readonly holdings: HoldingRepository,
        private readonly accounts: AccountRegistry,
        options: { baseCurrency: string },
    ) {
        this.baseCurrency = options.baseCurrency;
    }

    /**
     * Values every non-empty holding at `priceOf(asset)` (base currency per
     * unit). The base currency itself is worth 1 when no price is given.
     * Holdings without a price are listed in `unpriced` and left out of every
     * total.
     */
    valuate(priceOf: PriceLookup): Result<PortfolioValuation> {
        return attempt(() => {
            const { holdings, accounts } = this.db.read(() => ({
                holdings: this.holdings.list(),
                accounts: new Map(this.accounts.list().map((account): [string, Account] => [account.id, account])),
            }));

            const valued: HoldingValuation[] = [];
            const unpriced: UnpricedHolding[] = [];

            for (const holding of holdings) {
                const price = priceOf(holding.asset) ?? (holding.asset === this.baseCurrency ? ONE : null);
                if (price === null) {
                    unpriced.push({ accountId: holding.accountId, asset: holding.asset, quantity: holding.quantity });
                    continue;
                }
                const account = accounts.get(holding.accountId);
                valued.push({
                    ...totalsOf(holding.quantity.times(price), costBasisTotal(holding)),
                    accountId: holding.accountId,
                    accountName: account?.name ?? holding.accountId,
                    category: account?.category ?? DEFAULT_CATEGORY,
                    asset: holding.asset,
                    quantity: holding.quantity,
                    avgCostBasis: holding.avgCostBasis,
                    price,
                });
            }

            valued.sort((a, b) => byText(a.accountName, b.accountName) || byText(a.asset, b.asset));

            const byAccount = this.groupByAccount(valued);
            return {
                baseCurrency: this.baseCurrency,
                holdings: valued,
                byAccount,
                byCategory: this.groupByCategory(byAccount),
                byAsset: this.groupByAsset(valued),
                totals: rollUp(valued),
                unpriced,
            };
        });
    }

    private groupByAccount(valued: HoldingValuation[]): AccountValuation[] {
        const groups = new Map<string, HoldingValuation[]>();
        for (const holding of valued) {
            const group = groups.get(holding.accountId) ?? [];
            group.push(holding);
            groups.set(holding.accountId, group);
        }

        return [...groups.values()].map((group) => ({
            ...rollUp(group),
            accountId: group[0].accountId,
            accountName: group[0].accountName,
            category: group[0].category,
            holdings: group,
        }));
    }

    private groupByCategory(byAccount: AccountValuation[]): CategoryValuation[] {
        const groups = new Map<string, AccountValuation[]>();
        for (const account of byAccount) {
            const group = groups.get(account.category) ?? [];
            group.push(account);
            groups.set(account.category, group);
        }

        return [...groups.entries()]
            .sort(([a], [b]) => byText(a, b))
            .map(([category, accounts]) => ({ ...rollUp(accounts), category, accounts }));
    }

    private groupByAsset(valued: HoldingValuation[]): AssetValuation[] {
        const groups = new Map<string, HoldingValuation[]>();
        for (const holding of valued) {
            const group = groups.get(holding.asset) ?? [];
            group.push(holding);
            groups.set(holding.asset, group);
        }

        return [...groups.entries()]
            .sort(([a], [b]) => byText(a, b))
            .map(([asset, holdings]) => ({
                ...rollUp(holdings),
                asset,
                quantity: sum(holdings.map((holding) => holding.quantity)),
            }));
    }
}
