/**
 * GMX Market Data Service
 * Token metadata and price tickers from the GMX V2 infra API
 */

import { formatUnits } from 'ethers';
import { logger } from '../../utils/logger';
import { FetchError, toErrorMessage } from '../../errors';
import { Address } from '../../types';

// GMX prices carry 30 decimals of USD precision per whole token
const PRICE_PRECISION_DECIMALS = 30;

export interface TokenInfo {
    address: Address;
    symbol: string;
    decimals: number;
    synthetic: boolean;
}

export interface PriceQuote {
    min: number;
    max: number;
    mid: number;
    updatedAt: number;
}

export interface MarketDataSource {
    refresh(force?: boolean): Promise<void>;
    getToken(address: Address): TokenInfo | undefined;
    getPrice(address: Address): PriceQuote | undefined;
}

interface GMXTicker {
    tokenAddress: string;
    tokenSymbol: string;
    minPrice: string;
    maxPrice: string;
    updatedAt: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const parseTokens = (body: unknown): TokenInfo[] => {
    const list = isRecord(body) ? body.tokens : body;
    if (!Array.isArray(list)) {
        throw new TypeError('Malformed /tokens response: expected a token list');
    }

    return list.map((entry: unknown) => {
        if (
            !isRecord(entry) ||
            typeof entry.address !== 'string' ||
            typeof entry.symbol !== 'string' ||
            typeof entry.decimals !== 'number'
        ) {
            throw new TypeError('Malformed /tokens response: bad token entry');
        }
        return {
            address: entry.address,
            symbol: entry.symbol,
            decimals: entry.decimals,
            synthetic: entry.isSynthetic === true,
        };
    });
};

const parseTickers = (body: unknown): GMXTicker[] => {
    if (!Array.isArray(body)) {
        throw new TypeError('Malformed /prices/tickers response: expected an array');
    }

    return body.map((entry: unknown) => {
        if (
            !isRecord(entry) ||
            typeof entry.tokenAddress !== 'string' ||
            typeof entry.minPrice !== 'string' ||
            typeof entry.maxPrice !== 'string'
        ) {
            throw new TypeError('Malformed /prices/tickers response: bad ticker entry');
        }
        return {
            tokenAddress: entry.tokenAddress,
            tokenSymbol: typeof entry.tokenSymbol === 'string' ? entry.tokenSymbol : '',
            minPrice: entry.minPrice,
            maxPrice: entry.maxPrice,
            updatedAt: typeof entry.updatedAt === 'number' ? entry.updatedAt : 0,
        };
    });
};

/**
 * Convert a raw GMX price (30 - tokenDecimals decimals) to USD per whole token
 */
export const parseRawPrice = (raw: string, tokenDecimals: number): number =>
    Number(formatUnits(BigInt(raw), PRICE_PRECISION_DECIMALS - tokenDecimals));

export class MarketDataService implements MarketDataSource {
    private tokens: Map<string, TokenInfo> = new Map();
    private prices: Map<string, PriceQuote> = new Map();
    private lastUpdate: number = 0;

    constructor(
        private readonly apiUrl: string,
        private readonly cacheDurationMs: number = 60000,
        private readonly fetchFn: typeof fetch = fetch,
        private readonly now: () => number = Date.now,
    ) {}

    /**
     * Reload tokens and tickers unless the cache is still fresh
     */
    async refresh(force = false): Promise<void> {
        const now = this.now();
        if (!force && this.tokens.size > 0 && now - this.lastUpdate < this.cacheDurationMs) {
            return;
        }

        try {
            logger.debug('Fetching GMX market data...', { apiUrl: this.apiUrl });
            const [tokensBody, tickersBody] = await Promise.all([
                this.getJson('/tokens'),
                this.getJson('/prices/tickers'),
            ]);

            const tokens = new Map<string, TokenInfo>();
            for (const token of parseTokens(tokensBody)) {
                tokens.set(token.address.toLowerCase(), token);
            }

            const prices = new Map<string, PriceQuote>();
            for (const ticker of parseTickers(tickersBody)) {
                const token = tokens.get(ticker.tokenAddress.toLowerCase());
                if (!token) continue;

                const min = parseRawPrice(ticker.minPrice, token.decimals);
                const max = parseRawPrice(ticker.maxPrice, token.decimals);
                prices.set(ticker.tokenAddress.toLowerCase(), {
                    min,
                    max,
                    mid: (min + max) / 2,
                    updatedAt: ticker.updatedAt,
                });
            }

            this.tokens = tokens;
            this.prices = prices;
            this.lastUpdate = now;
            logger.debug(`Updated ${tokens.size} tokens and ${prices.size} prices`);
        } catch (error) {
            logger.error('Failed to update GMX market data', { error: toErrorMessage(error) });
            if (error instanceof FetchError) throw error;
            throw new FetchError(`Failed to load GMX market data: ${toErrorMessage(error)}`, 'prices', undefined, error);
        }
    }

    getToken(address: Address): TokenInfo | undefined {
        return this.tokens.get(address.toLowerCase());
    }

    getPrice(address: Address): PriceQuote | undefined {
        return this.prices.get(address.toLowerCase());
    }

    private async getJson(path: string): Promise<unknown> {
        const response = await this.fetchFn(`${this.apiUrl}${path}`);
        if (!response.ok) {
            throw new FetchError(`GMX API ${path} responded ${response.status} ${response.statusText}`, 'prices');
        }
        return response.json();
    }
}
