import { Decimal, DecimalInput, toDecimal } from '../lib/decimal';
import {
    ASSET_CLASSES,
    AssetClass,
    Currency,
    CurrencyFilter,
    CurrencyUpdate,
    NewCurrency,
} from '../models/currency';
import { AlreadyExistsError, InvalidInputError, NotFoundError } from '../models/errors';
import { attempt, Result } from '../models/result';
import type { CurrencyRepository } from '../repositories/currencyRepository';

const CODE_PATTERN = /^[A-Z0-9]{3,10}$/;
const MAX_PRECISION = 30;

export const normalizeCode = (code: string): string => code.trim().toUpperCase();

const validateCode = (raw: string): string => {
    const code = normalizeCode(raw);
    if (!CODE_PATTERN.test(code)) {
        throw new InvalidInputError(`Invalid currency code "${raw}": expected 3-10 letters or digits`, 'code');
    }
    return code;
};

const validatePrecision = (precision: number): number => {
    if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
        throw new InvalidInputError(
            `decimalPrecision must be an integer between 0 and ${MAX_PRECISION}`,
            'decimalPrecision',
        );
    }
    return precision;
};

const validateText = (value: string, field: string): string => {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
        throw new InvalidInputError(`${field} must not be empty`, field);
    }
    return trimmed;
};

const isAssetClass = (value: string): value is AssetClass => ASSET_CLASSES.some((known) => known === value);

/**
 * Registry of known currencies. Codes are unique and permanent: there is no
 * delete, only `setEnabled(code, false)`.
 */
export class CurrencyCatalog {
    constructor(
        private readonly repo: CurrencyRepository,
        private readonly now: () => Date = () => new Date(),
    ) {}

    register(input: NewCurrency): Result<Currency> {
        return attempt(() => {
            const code = validateCode(input.code);
            if (!isAssetClass(input.assetClass)) {
                throw new InvalidInputError(`Unknown asset class: ${String(input.assetClass)}`, 'assetClass');
            }
            if (this.repo.findByCode(code)) {
                throw new AlreadyExistsError('currency', code);
            }

            const timestamp = this.now();
            const currency: Currency = {
                code,
                name: validateText(input.name, 'name'),
                symbol: validateText(input.symbol, 'symbol'),
                decimalPrecision: validatePrecision(input.decimalPrecision),
                assetClass: input.assetClass,
                enabled: input.enabled ?? true,
                createdAt: timestamp,
                updatedAt: timestamp,
            };
            this.repo.insert(currency);
            return currency;
        });
    }

    get(code: string): Result<Currency> {
        return attempt(() => this.require(code));
    }

    /** Fiat first, then stablecoins, then crypto; alphabetical within each class. */
    list(filter: CurrencyFilter = {}): Result<Currency[]> {
        return attempt(() => this.repo.list(filter));
    }

    setEnabled(code: string, enabled: boolean): Result<Currency> {
        return attempt(() => {
            const currency = this.require(code);
            if (currency.enabled === enabled) {
                return currency;
            }
            this.repo.update(currency.code, { enabled }, this.now());
            return this.require(currency.code);
        });
    }

    update(code: string, changes: CurrencyUpdate): Result<Currency> {
        return attempt(() => {
            const currency = this.require(code);
            this.repo.update(
                currency.code,
                {
                    name: changes.name === undefined ? undefined : validateText(changes.name, 'name'),
                    symbol: changes.symbol === undefined ? undefined : validateText(changes.symbol, 'symbol'),
                    decimalPrecision:
                        changes.decimalPrecision === undefined
                            ? undefined
                            : validatePrecision(changes.decimalPrecision),
                },
                this.now(),
            );
            return this.require(currency.code);
        });
    }

    /** Rounds for display only; stored values keep full precision. */
    format(code: string, amount: DecimalInput): Result<string> {
        return attempt(() => {
            const currency = this.require(code);
            return toDecimal(amount, 'amount')
                .toDecimalPlaces(currency.decimalPrecision, Decimal.ROUND_HALF_UP)
                .toFixed(currency.decimalPrecision);
        });
    }

    /** Throwing lookup for code paths already running inside `attempt` or a ledger transaction. */
    require(code: string): Currency {
        const normalized = normalizeCode(code);
        const currency = this.repo.findByCode(normalized);
        if (!currency) {
            throw new NotFoundError('currency', normalized);
        }
        return currency;
    }
}
