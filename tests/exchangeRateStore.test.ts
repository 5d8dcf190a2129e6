import type { ExchangeRate } from '../src/models/exchangeRate';
import { addAccount, createTestLedger, expectFailure, expectOk } from './helpers';

const JAN = new Date('2024-01-01T00:00:00.000Z');
const FEB = new Date('2024-02-01T00:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

const nextRate = (walk: Iterator<ExchangeRate>): string => {
    const step = walk.next();
    if (step.done) {
        throw new Error('history ended early');
    }
    return step.value.rate.toFixed();
};

describe('ExchangeRateStore', () => {
    it('should keep one row per pair and timestamp, with the last value written', () => {
        const ledger = createTestLedger();

        const first = expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '520', timestamp: JAN }));
        const second = expectOk(
            ledger.rates.upsert({ fromCurrency: 'usd', toCurrency: 'crc', rate: '525', timestamp: JAN, source: 'bank' }),
        );

        expect(second).toBe(first);
        const history = [...expectOk(ledger.rates.history('USD', 'CRC'))];
        expect(history).toHaveLength(1);
        expect(history[0].rate.toFixed()).toBe('525');
        expect(history[0].source).toBe('bank');
    });

    it('should default the source to manual', () => {
        const ledger = createTestLedger();

        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'EUR', rate: '0.92', timestamp: JAN }));

        expect(expectOk(ledger.rates.latest('USD', 'EUR')).source).toBe('manual');
    });

    it('should answer latest and as-of lookups', () => {
        const ledger = createTestLedger();
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '520', timestamp: JAN }));
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '530', timestamp: FEB }));

        expect(expectOk(ledger.rates.latest('USD', 'CRC')).rate.toFixed()).toBe('530');
        expect(expectOk(ledger.rates.asOf('USD', 'CRC', new Date('2024-01-15T00:00:00.000Z'))).rate.toFixed()).toBe(
            '520',
        );
        expect(expectOk(ledger.rates.asOf('USD', 'CRC', FEB)).rate.toFixed()).toBe('530');
        expect(expectFailure(ledger.rates.asOf('USD', 'CRC', new Date('2023-12-31T00:00:00.000Z'))).code).toBe(
            'NOT_FOUND',
        );
    });

    it('should never invert a pair on plain lookups', () => {
        const ledger = createTestLedger();
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '520', timestamp: JAN }));

        expect(expectFailure(ledger.rates.latest('CRC', 'USD')).code).toBe('NOT_FOUND');
    });

    it('should list history newest first and allow iterating it again', () => {
        const ledger = createTestLedger();
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '520', timestamp: JAN }));
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '530', timestamp: FEB }));

        const history = expectOk(ledger.rates.history('USD', 'CRC'));

        expect([...history].map((rate) => rate.rate.toFixed())).toEqual(['530', '520']);
        expect([...history].map((rate) => rate.timestamp.toISOString())).toEqual([
            FEB.toISOString(),
            JAN.toISOString(),
        ]);
    });

    it('should walk long histories across pages in order', () => {
        const ledger = createTestLedger();
        for (let day = 0; day < 250; day++) {
            expectOk(
                ledger.rates.upsert({
                    fromCurrency: 'USD',
                    toCurrency: 'CRC',
                    rate: String(500 + day),
                    timestamp: new Date(JAN.getTime() + day * DAY_MS),
                }),
            );
        }

        const rates = [...expectOk(ledger.rates.history('USD', 'CRC'))];

        expect(rates).toHaveLength(250);
        expect(rates[0].rate.toFixed()).toBe('749');
        expect(rates[249].rate.toFixed()).toBe('500');
        expect(rates.every((rate, index) => index === 0 || rate.timestamp < rates[index - 1].timestamp)).toBe(true);
    });

    it('should accept writes while a history walk is paused', () => {
        const ledger = createTestLedger();
        addAccount(ledger, 'Binance');
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '520', timestamp: JAN }));
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '530', timestamp: FEB }));

        const walk = expectOk(ledger.rates.history('USD', 'CRC'))[Symbol.iterator]();
        expect(nextRate(walk)).toBe('530');

        expectOk(ledger.transactions.record({ type: 'buy', accountId: 'Binance', asset: 'BTC', quantity: '0.1', unitPrice: '50000' }));
        expectOk(
            ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '540', timestamp: new Date('2024-02-15T00:00:00.000Z') }),
        );

        expect(nextRate(walk)).toBe('520');
        expect(walk.next().done).toBe(true);
        expect([...expectOk(ledger.rates.history('USD', 'CRC'))].map((rate) => rate.rate.toFixed())).toEqual(['540', '530', '520']);
    });

    it('should reject invalid rates and pairs', () => {
        const ledger = createTestLedger();

        expect(expectFailure(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'USD', rate: '1', timestamp: JAN })).code).toBe(
            'INVALID_INPUT',
        );
        expect(expectFailure(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: '0', timestamp: JAN })).code).toBe(
            'INVALID_INPUT',
        );
        expect(expectFailure(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'CRC', rate: 'abc', timestamp: JAN })).code).toBe(
            'INVALID_INPUT',
        );
        expect(expectFailure(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'XYZ', rate: '2', timestamp: JAN })).code).toBe(
            'NOT_FOUND',
        );
    });

    it('should convert through the direct pair or the inverse of the reverse pair', () => {
        const ledger = createTestLedger();
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'EUR', rate: '0.8', timestamp: FEB }));
        const at = new Date('2024-02-10T00:00:00.000Z');

        const direct = expectOk(ledger.rates.convert('100', 'USD', 'EUR', at));
        expect(direct.converted.toFixed()).toBe('80');
        expect(direct.inverted).toBe(false);

        const inverse = expectOk(ledger.rates.convert('100', 'EUR', 'USD', at));
        expect(inverse.rate.toFixed()).toBe('1.25');
        expect(inverse.converted.toFixed()).toBe('125');
        expect(inverse.inverted).toBe(true);
    });

    it('should refuse to convert with a rate older than the tolerance', () => {
        const ledger = createTestLedger();
        expectOk(ledger.rates.upsert({ fromCurrency: 'USD', toCurrency: 'EUR', rate: '0.8', timestamp: FEB }));

        const error = expectFailure(
            ledger.rates.convert('100', 'USD', 'EUR', new Date('2024-03-01T00:00:00.000Z'), 7 * DAY_MS),
        );

        expect(error.code).toBe('RATE_UNAVAILABLE');
    });
});
