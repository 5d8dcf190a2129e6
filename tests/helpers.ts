import { LedgerDatabase } from '../src/db';
import { createLedger, Ledger, LedgerOptions } from '../src/ledger';
import type { Account, AccountType } from '../src/models/account';
import type { LedgerError } from '../src/models/errors';
import { Result, unwrap } from '../src/models/result';

export const FIXED_NOW = new Date('2024-03-01T12:00:00.000Z');

export const createTestLedger = (options: Partial<LedgerOptions> = {}): Ledger =>
    createLedger(new LedgerDatabase(':memory:'), {
        baseCurrency: 'USD',
        rateMaxAgeDays: 7,
        now: () => FIXED_NOW,
        ...options,
    });

export const addAccount = (
    ledger: Ledger,
    name: string,
    accountType: AccountType = 'exchange',
    category?: string,
): Account => ledger.accounts.create({ name, accountType, category }, FIXED_NOW);

export const expectOk = <T>(result: Result<T>): T => unwrap(result);

export const expectFailure = <T>(result: Result<T>): LedgerError => {
    if (result.ok) {
        throw new Error(`Expected a failure, got ${JSON.stringify(result.value)}`);
    }
    return result.error;
};
