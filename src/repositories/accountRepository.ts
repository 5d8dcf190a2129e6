import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { LedgerDatabase } from '../db';
import { Account, AccountRegistry, ACCOUNT_TYPES, DEFAULT_CATEGORY, NewAccount } from '../models/account';
import { AlreadyExistsError, InvalidInputError, NotFoundError } from '../models/errors';

const AccountRow = z.object({
    id: z.string(),
    name: z.string(),
    account_type: z.enum(ACCOUNT_TYPES),
    category: z.string(),
    created_at: z.string(),
});

const toAccount = (raw: unknown): Account => {
    const row = AccountRow.parse(raw);
    return {
        id: row.id,
        name: row.name,
        accountType: row.account_type,
        category: row.category,
        createdAt: new Date(row.created_at),
    };
};

const SELECT_COLUMNS = 'id, name, account_type, category, created_at';

/** SQLite-backed registry used when the ledger runs standalone. */
export class AccountRepository implements AccountRegistry {
    constructor(private readonly db: LedgerDatabase) {}

    create(input: NewAccount, now: Date = new Date()): Account {
        const name = input.name.trim();
        if (name.length === 0) {
            throw new InvalidInputError('Account name must not be empty', 'name');
        }
        if (this.findByName(name)) {
            throw new AlreadyExistsError('account', name);
        }

        const account: Account = {
            id: randomUUID(),
            name,
            accountType: input.accountType,
            category: input.category?.trim() || DEFAULT_CATEGORY,
            createdAt: now,
        };
        this.db.execute(
            'INSERT INTO accounts (id, name, account_type, category, created_at) VALUES (?, ?, ?, ?, ?)',
            [account.id, account.name, account.accountType, account.category, account.createdAt.toISOString()],
        );
        return account;
    }

    findById(id: string): Account | null {
        const row = this.db.queryOne(`SELECT ${SELECT_COLUMNS} FROM accounts WHERE id = ?`, [id]);
        return row === undefined ? null : toAccount(row);
    }

    findByName(name: string): Account | null {
        // `name` is declared COLLATE NOCASE
        const row = this.db.queryOne(`SELECT ${SELECT_COLUMNS} FROM accounts WHERE name = ?`, [name]);
        return row === undefined ? null : toAccount(row);
    }

    resolve(nameOrId: string): Account {
        const account = this.findById(nameOrId) ?? this.findByName(nameOrId.trim());
        if (!account) {
            throw new NotFoundError('account', nameOrId);
        }
        return account;
    }

    list(): Account[] {
        const { rows } = this.db.query(`SELECT ${SELECT_COLUMNS} FROM accounts ORDER BY name`);
        return rows.map(toAccount);
    }
}
