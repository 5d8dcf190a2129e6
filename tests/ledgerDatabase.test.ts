import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { LedgerDatabase } from '../src/db';
import { createLedger, Ledger } from '../src/ledger';
import { addAccount, expectFailure, expectOk, FIXED_NOW } from './helpers';

const openLedger = (filename: string): Ledger =>
    createLedger(new LedgerDatabase(filename, { busyTimeoutMs: 0 }), {
        baseCurrency: 'USD',
        now: () => FIXED_NOW,
    });

describe('LedgerDatabase', () => {
    let dir: string;
    let first: Ledger;
    let second: Ledger;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'folio-ledger-'));
        const filename = path.join(dir, 'ledger.sqlite');
        first = openLedger(filename);
        second = openLedger(filename);
        addAccount(first, 'Binance');
    });

    afterEach(() => {
        first.db.close();
        second.db.close();
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should share one file between connections', () => {
        expect(second.registry.resolve('binance').name).toBe('Binance');
    });

    it('should answer a locked ledger with a conflict and write nothing', () => {
        const result = first.db.transaction(() =>
            second.transactions.record({ type: 'buy', accountId: 'Binance', asset: 'BTC', quantity: '0.1', unitPrice: '50000' }),
        );

        expect(expectFailure(result).code).toBe('CONFLICT');
        expect(expectOk(second.transactions.list())).toEqual([]);
        expect(expectOk(second.holdings.list({ includeEmpty: true }))).toEqual([]);
        expect(expectOk(first.holdings.list({ includeEmpty: true }))).toEqual([]);
    });

    it('should let the second connection write once the lock is released', () => {
        first.db.transaction(() => addAccount(first, 'Kraken'));

        expectOk(second.transactions.record({ type: 'buy', accountId: 'Kraken', asset: 'BTC', quantity: '0.1', unitPrice: '50000' }));

        expect(expectOk(first.holdings.get('Kraken', 'BTC')).quantity.toFixed()).toBe('0.1');
    });
});
