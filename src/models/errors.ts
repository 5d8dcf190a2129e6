export type LedgerErrorCode =
    | 'NOT_FOUND'
    | 'ALREADY_EXISTS'
    | 'INVALID_INPUT'
    | 'INSUFFICIENT_HOLDINGS'
    | 'ARITHMETIC_ERROR'
    | 'RATE_UNAVAILABLE'
    | 'CONFLICT';

export type LedgerEntity = 'account' | 'currency' | 'exchange_rate' | 'holding' | 'transaction';

/**
 * Base class of every failure the engine reports to its callers. Anything that
 * is not a LedgerError is a bug or a storage fault and is left to propagate.
 */
export abstract class LedgerError extends Error {
    abstract readonly code: LedgerErrorCode;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class NotFoundError extends LedgerError {
    readonly code = 'NOT_FOUND';

    constructor(
        public readonly entity: LedgerEntity,
        public readonly key: string,
    ) {
        super(`${entity.replace('_', ' ')} not found: ${key}`);
    }
}

export class AlreadyExistsError extends LedgerError {
    readonly code = 'ALREADY_EXISTS';

    constructor(
        public readonly entity: LedgerEntity,
        public readonly key: string,
    ) {
        super(`${entity.replace('_', ' ')} already exists: ${key}`);
    }
}

export class InvalidInputError extends LedgerError {
    readonly code = 'INVALID_INPUT';

    constructor(
        message: string,
        public readonly field?: string,
    ) {
        super(message);
    }
}

export class InsufficientHoldingsError extends LedgerError {
    readonly code = 'INSUFFICIENT_HOLDINGS';

    constructor(
        public readonly accountId: string,
        public readonly asset: string,
        public readonly available: string,
        public readonly required: string,
    ) {
        super(`Insufficient ${asset} in account ${accountId}: have ${available}, need ${required}`);
    }
}

export class ArithmeticError extends LedgerError {
    readonly code = 'ARITHMETIC_ERROR';
}

export class RateUnavailableError extends LedgerError {
    readonly code = 'RATE_UNAVAILABLE';

    constructor(
        public readonly fromCurrency: string,
        public readonly toCurrency: string,
        public readonly at: Date,
    ) {
        super(`No exchange rate for ${fromCurrency}/${toCurrency} usable at ${at.toISOString()}`);
    }
}

export class ConflictError extends LedgerError {
    readonly code = 'CONFLICT';
}

export const isLedgerError = (error: unknown): error is LedgerError => error instanceof LedgerError;
