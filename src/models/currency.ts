export const ASSET_CLASSES = ['fiat', 'stablecoin', 'crypto'] as const;

export type AssetClass = (typeof ASSET_CLASSES)[number];

export interface Currency {
    code: string; // "USD", "CRC", "BTC"
    name: string;
    symbol: string;
    decimalPrecision: number; // display only
    assetClass: AssetClass;
    enabled: boolean;
    createdAt: Date;
    updatedAt: Date;
}

export interface NewCurrency {
    code: string;
    name: string;
    symbol: string;
    decimalPrecision: number;
    assetClass: AssetClass;
    enabled?: boolean;
}

export type CurrencyUpdate = Partial<Pick<Currency, 'name' | 'symbol' | 'decimalPrecision'>>;

export interface CurrencyFilter {
    assetClass?: AssetClass;
    enabledOnly?: boolean;
}

export const isFiat = (currency: Currency): boolean => currency.assetClass === 'fiat';
