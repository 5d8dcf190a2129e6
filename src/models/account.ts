export const ACCOUNT_TYPES = [
    'exchange',
    'hardware_wallet',
    'software_wallet',
    'custodial_service',
    'bank',
] as const;

export type AccountType = (typeof ACCOUNT_TYPES)[number];

export interface Account {
    id: string;
    name: string;
    accountType: AccountType;
    category: string; // grouping key for portfolio summaries
    createdAt: Date;
}

export interface NewAccount {
    name: string;
    accountType: AccountType;
    category?: string;
}

export const DEFAULT_CATEGORY = 'uncategorized';

/**
 * Resolves account references. Account management itself lives outside the
 * ledger; the engine only needs references to resolve before it writes.
 */
export interface AccountRegistry {
    resolve(nameOrId: string): Account;
    list(): Account[];
}
