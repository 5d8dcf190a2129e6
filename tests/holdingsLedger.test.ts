import { addAccount, createTestLedger, expectFailure, expectOk } from './helpers';

describe('HoldingsLedger', () => {
    it('should blend purchase prices into a weighted average', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');

        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.1', '50000'));
        const snapshot = expectOk(ledger.holdings.apply('binance', 'btc', '0.1', '60000'));

        expect(snapshot.quantityBefore.toFixed()).toBe('0.1');
        expect(snapshot.quantity.toFixed()).toBe('0.2');
        expect(snapshot.avgCostBasis.toFixed()).toBe('55000');
        expect(snapshot.costBasisCurrency).toBe('USD');
    });

    it('should reach the same average whatever the purchase order', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Kraken');

        expectOk(ledger.holdings.apply('Kraken', 'BTC', '0.1', '60000'));
        expectOk(ledger.holdings.apply('Kraken', 'BTC', '0.1', '50000'));

        expect(expectOk(ledger.holdings.get('Kraken', 'BTC')).avgCostBasis.toFixed()).toBe('55000');
    });

    it('should keep the average on decreases and report realized P&L when priced', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');
        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.2', '55000'));

        const unpriced = expectOk(ledger.holdings.apply('Binance', 'BTC', '-0.05'));
        expect(unpriced.quantity.toFixed()).toBe('0.15');
        expect(unpriced.avgCostBasis.toFixed()).toBe('55000');
        expect(unpriced.realizedPnl).toBeNull();

        const priced = expectOk(ledger.holdings.apply('Binance', 'BTC', '-0.05', '70000'));
        expect(priced.quantity.toFixed()).toBe('0.1');
        expect(priced.avgCostBasis.toFixed()).toBe('55000');
        expect(priced.realizedPnl?.toFixed()).toBe('750');
    });

    it('should keep an emptied holding at exactly zero', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');
        expectOk(ledger.holdings.apply('Binance', 'ETH', '1.5', '2000'));

        expectOk(ledger.holdings.apply('Binance', 'ETH', '-1.5'));

        expect(expectOk(ledger.holdings.get('Binance', 'ETH')).quantity.toFixed()).toBe('0');
        expect(expectOk(ledger.holdings.list())).toHaveLength(0);
        expect(expectOk(ledger.holdings.list({ includeEmpty: true }))).toHaveLength(1);
    });

    it('should start an unpriced increase at zero cost', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');

        const snapshot = expectOk(ledger.holdings.apply('Binance', 'USDT', '50'));

        expect(snapshot.avgCostBasis.toFixed()).toBe('0');
    });

    it('should refuse to go below zero and leave the holding as it was', () => {
        const ledger = createTestLedger();
        const account = addAccount(ledger, 'Binance');
        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.2', '55000'));

        const error = expectFailure(ledger.holdings.apply('Binance', 'BTC', '-0.3'));

        expect(error.code).toBe('INSUFFICIENT_HOLDINGS');
        expect(error.message).toBe(`Insufficient BTC in account ${account.id}: have 0.2, need 0.3`);
        const holding = expectOk(ledger.holdings.get('Binance', 'BTC'));
        expect(holding.quantity.toFixed()).toBe('0.2');
        expect(holding.version).toBe(1);
    });

    it('should bump the version on every write', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');

        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.1', '50000'));
        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.1', '50000'));
        expectOk(ledger.holdings.apply('Binance', 'BTC', '-0.1'));

        expect(expectOk(ledger.holdings.get('Binance', 'BTC')).version).toBe(3);
    });

    it('should reject zero deltas, negative prices and unknown references', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');

        expect(expectFailure(ledger.holdings.apply('Binance', 'BTC', '0', '50000')).code).toBe('INVALID_INPUT');
        expect(expectFailure(ledger.holdings.apply('Binance', 'BTC', '1', '-5')).code).toBe('INVALID_INPUT');
        expect(expectFailure(ledger.holdings.apply('Nowhere', 'BTC', '1', '5')).code).toBe('NOT_FOUND');
        expect(expectFailure(ledger.holdings.apply('Binance', 'XYZ', '1', '5')).code).toBe('NOT_FOUND');
        expect(expectFailure(ledger.holdings.get('Binance', 'BTC')).code).toBe('NOT_FOUND');
    });

    it('should filter holdings by account and asset', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');
        const cold = addAccount(ledger, 'Cold Wallet', 'hardware_wallet');
        expectOk(ledger.holdings.apply('Binance', 'BTC', '0.1', '50000'));
        expectOk(ledger.holdings.apply('Binance', 'ETH', '1', '2000'));
        expectOk(ledger.holdings.apply('Cold Wallet', 'BTC', '0.3', '30000'));

        const btc = expectOk(ledger.holdings.list({ asset: 'btc' }));
        expect(btc).toHaveLength(2);

        const coldHoldings = expectOk(ledger.holdings.list({ accountId: 'cold wallet' }));
        expect(coldHoldings.map((holding) => [holding.accountId, holding.asset])).toEqual([[cold.id, 'BTC']]);
    });
});
