import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { ConflictError } from '../models/errors';
import { runMigrations } from './migrations';

export type SqlParam = string | number | bigint | null;

export interface QueryResult {
    rows: unknown[];
}

export interface ExecResult {
    changes: number;
    lastInsertId: number;
}

export interface DatabaseOptions {
    /** How long a writer waits for another process's lock before giving up. */
    busyTimeoutMs?: number;
}

const isBusyError = (error: unknown): boolean =>
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_BUSY_SNAPSHOT' || error.code === 'SQLITE_LOCKED');

/**
 * One SQLite connection plus the ledger schema. Components receive an instance
 * explicitly; nothing in the engine reaches for a global connection.
 */
export class LedgerDatabase {
    private readonly connection: Database.Database;

    constructor(filename: string, options: DatabaseOptions = {}) {
        if (filename !== ':memory:') {
            fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
        }
        this.connection = new Database(filename, { timeout: options.busyTimeoutMs ?? 5000 });
        if (filename !== ':memory:') {
            this.connection.pragma('journal_mode = WAL');
        }
        this.connection.pragma('foreign_keys = ON');
        runMigrations(this.connection);
    }

    query(sql: string, params: SqlParam[] = []): QueryResult {
        return { rows: this.guard(() => this.connection.prepare(sql).all(...params)) };
    }

    queryOne(sql: string, params: SqlParam[] = []): unknown {
        return this.guard(() => this.connection.prepare(sql).get(...params));
    }

    execute(sql: string, params: SqlParam[] = []): ExecResult {
        const result = this.guard(() => this.connection.prepare(sql).run(...params));
        return { changes: result.changes, lastInsertId: Number(result.lastInsertRowid) };
    }

    /**
     * Runs `work` inside `BEGIN IMMEDIATE`: the write lock is taken up front, so
     * a second writer (in this or another process) waits for the busy timeout and
     * then fails with a ConflictError instead of overwriting stale reads. Any
     * throw rolls the whole unit back. Nested calls become savepoints.
     */
    transaction<T>(work: () => T): T {
        return this.guard(() => this.connection.transaction(work).immediate());
    }

    /** Deferred transaction: every read inside sees one consistent snapshot. */
    read<T>(work: () => T): T {
        return this.guard(() => this.connection.transaction(work).deferred());
    }

    close(): void {
        this.connection.close();
    }

    private guard<T>(operation: () => T): T {
        try {
            return operation();
        } catch (error) {
            if (isBusyError(error)) {
                throw new ConflictError('The ledger is locked by another writer; retry the operation');
            }
            throw error;
        }
    }
}

export const openDatabase = (filename: string, options?: DatabaseOptions): LedgerDatabase =>
    new LedgerDatabase(filename, options);
