import { createTestLedger, expectFailure, expectOk } from './helpers';

describe('CurrencyCatalog', () => {
    it('should seed the default currencies ordered fiat, stablecoin, crypto', () => {
        const ledger = createTestLedger();

        const codes = expectOk(ledger.currencies.list()).map((currency) => currency.code);

        expect(codes).toEqual(['CRC', 'EUR', 'USD', 'USDC', 'USDT', 'BNB', 'BTC', 'ETH', 'SOL']);
    });

    it('should register a currency under its normalized code', () => {
        const ledger = createTestLedger();

        const ada = expectOk(
            ledger.currencies.register({
                code: ' ada ',
                name: 'Cardano',
                symbol: '₳',
                decimalPrecision: 6,
                assetClass: 'crypto',
            }),
        );

        expect(ada.code).toBe('ADA');
        expect(ada.enabled).toBe(true);
        expect(expectOk(ledger.currencies.get('ada')).name).toBe('Cardano');
    });

    it('should reject a code that is already taken', () => {
        const ledger = createTestLedger();

        const error = expectFailure(
            ledger.currencies.register({
                code: 'btc',
                name: 'Bitcoin again',
                symbol: 'B',
                decimalPrecision: 8,
                assetClass: 'crypto',
            }),
        );

        expect(error.code).toBe('ALREADY_EXISTS');
    });

    it('should reject malformed codes and precisions', () => {
        const ledger = createTestLedger();
        const base = { name: 'Test', symbol: 'T', assetClass: 'crypto' as const };

        expect(expectFailure(ledger.currencies.register({ ...base, code: 'X!', decimalPrecision: 2 })).code).toBe(
            'INVALID_INPUT',
        );
        expect(expectFailure(ledger.currencies.register({ ...base, code: 'TST', decimalPrecision: 31 })).code).toBe(
            'INVALID_INPUT',
        );
    });

    it('should report unknown codes as not found', () => {
        const ledger = createTestLedger();

        const error = expectFailure(ledger.currencies.get('XYZ'));

        expect(error.code).toBe('NOT_FOUND');
        expect(error.message).toBe('currency not found: XYZ');
    });

    it('should hide disabled currencies from enabled-only listings but keep them resolvable', () => {
        const ledger = createTestLedger();

        expectOk(ledger.currencies.setEnabled('SOL', false));
        expectOk(ledger.currencies.setEnabled('SOL', false));

        const enabled = expectOk(ledger.currencies.list({ enabledOnly: true })).map((currency) => currency.code);
        expect(enabled).not.toContain('SOL');
        expect(enabled).toHaveLength(8);
        expect(expectOk(ledger.currencies.get('SOL')).enabled).toBe(false);
    });

    it('should filter by asset class', () => {
        const ledger = createTestLedger();

        const stablecoins = expectOk(ledger.currencies.list({ assetClass: 'stablecoin' }));

        expect(stablecoins.map((currency) => currency.code)).toEqual(['USDC', 'USDT']);
    });

    it('should update display fields', () => {
        const ledger = createTestLedger();

        const updated = expectOk(ledger.currencies.update('CRC', { symbol: 'CRC', decimalPrecision: 0 }));

        expect(updated.symbol).toBe('CRC');
        expect(updated.decimalPrecision).toBe(0);
        expect(updated.name).toBe('Costa Rican Colón');
    });

    it('should format amounts to the currency precision', () => {
        const ledger = createTestLedger();

        expect(expectOk(ledger.currencies.format('BTC', '0.123456789'))).toBe('0.12345679');
        expect(expectOk(ledger.currencies.format('USD', '1.005'))).toBe('1.01');
        expect(expectOk(ledger.currencies.format('CRC', 100000))).toBe('100000.00');
    });
});
