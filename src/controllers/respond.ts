import { Response } from 'express';
import { z } from 'zod';
import type { AccountRegistry } from '../models/account';
import { InvalidInputError, LedgerError, LedgerErrorCode, NotFoundError } from '../models/errors';
import type { Result } from '../models/result';

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
    NOT_FOUND: 404,
    ALREADY_EXISTS: 409,
    INVALID_INPUT: 400,
    INSUFFICIENT_HOLDINGS: 422,
    ARITHMETIC_ERROR: 422,
    RATE_UNAVAILABLE: 422,
    CONFLICT: 409,
};

export const statusFor = (error: LedgerError): number => STATUS_BY_CODE[error.code];

/** Decimals arrive as strings (or plain JSON numbers) and are checked by the engine. */
export const decimalField = z.union([z.string().trim().min(1), z.number()]);

export const dateField = z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value));

export const sendError = (res: Response, error: LedgerError, registry?: AccountRegistry): void => {
    const body: Record<string, unknown> = { code: error.code, message: error.message };
    if (error instanceof InvalidInputError && error.field) {
        body.field = error.field;
    }
    if (error instanceof NotFoundError && error.entity === 'account' && registry) {
        body.validAccounts = registry.list().map((account) => account.name);
    }
    res.status(statusFor(error)).json(body);
};

export const sendResult = <T>(
    res: Response,
    result: Result<T>,
    status = 200,
    registry?: AccountRegistry,
): void => {
    if (result.ok) {
        res.status(status).json(result.value);
    } else {
        sendError(res, result.error, registry);
    }
};

export const sendValidationError = (res: Response, error: z.ZodError): void => {
    res.status(400).json({
        code: 'INVALID_INPUT',
        message: 'Request validation failed',
        issues: error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
};

export const sendInternalError = (res: Response, context: string, error: unknown): void => {
    console.error(`Error ${context}:`, error);
    res.status(500).json({ message: 'Internal server error' });
};
