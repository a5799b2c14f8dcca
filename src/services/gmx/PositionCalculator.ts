/**
 * GMX Position Calculator
 * Turns raw Reader position structs into display positions
 */

import { AbiCoder, formatUnits, getAddress, keccak256 } from 'ethers';
import { Address, Position, PositionKey } from '../../types';
import { Market, PositionStruct } from '../../contracts/interfaces';
import { FetchError } from '../../errors';
import { MarketDataSource, PriceQuote, TokenInfo } from './MarketDataService';

// sizeInUsd is stored with 30 decimals
const USD_DECIMALS = 30;

const abiCoder = AbiCoder.defaultAbiCoder();

/**
 * Get position key from account, market, and collateral token
 * PositionKey = keccak256(abi.encode(account, market, collateralToken, isLong))
 */
export const getPositionKey = (
  account: Address,
  market: Address,
  collateralToken: Address,
  isLong: boolean,
): PositionKey =>
  keccak256(abiCoder.encode(['address', 'address', 'address', 'bool'], [account, market, collateralToken, isLong]));

type MarketData = Pick<MarketDataSource, 'getToken' | 'getPrice'>;

export class PositionCalculator {
  constructor(private readonly marketData: MarketData) {}

  /**
   * Convert a raw position struct to a frozen Position
   */
  toPosition(raw: PositionStruct, market: Market): Position {
    const indexToken = this.requireToken(market.indexToken, raw.account, 'index');
    const collateralToken = this.requireToken(raw.collateralToken, raw.account, 'collateral');
    const markPrice = this.requirePrice(indexToken, raw.account).mid;
    const collateralPrice = this.requirePrice(collateralToken, raw.account).mid;

    const sizeUsd = Number(formatUnits(raw.sizeInUsd, USD_DECIMALS));
    const sizeInTokens = Number(formatUnits(raw.sizeInTokens, indexToken.decimals));
    const collateralAmount = Number(formatUnits(raw.collateralAmount, collateralToken.decimals));
    const collateralAmountUsd = collateralAmount * collateralPrice;

    const entryPrice = this.calculateEntryPrice(sizeUsd, sizeInTokens);
    const leverage = collateralAmountUsd > 0 ? sizeUsd / collateralAmountUsd : 0;
    const percentProfit = this.calculatePercentProfit(entryPrice, markPrice, leverage, raw.isLong);

    const side = raw.isLong ? 'long' : 'short';
    const account = getAddress(raw.account);
    const marketAddress = getAddress(raw.market);
    const collateralAddress = getAddress(raw.collateralToken);

    return Object.freeze({
      key: getPositionKey(account, marketAddress, collateralAddress, raw.isLong),
      positionId: `${indexToken.symbol}_${side}`,
      account,
      market: marketAddress,
      marketSymbol: indexToken.symbol,
      collateralToken: collateralAddress,
      collateralSymbol: collateralToken.symbol,
      side,
      isLong: raw.isLong,
      sizeUsd,
      sizeInTokens,
      collateralAmount,
      collateralAmountUsd,
      entryPrice,
      markPrice,
      leverage,
      percentProfit,
      borrowingFactor: raw.borrowingFactor,
      fundingFeeAmountPerSize: raw.fundingFeeAmountPerSize,
      longTokenClaimableFundingAmountPerSize: raw.longTokenClaimableFundingAmountPerSize,
      shortTokenClaimableFundingAmountPerSize: raw.shortTokenClaimableFundingAmountPerSize,
      increasedAtBlock: raw.increasedAtBlock,
      decreasedAtBlock: raw.decreasedAtBlock,
      modifiedAtBlock: raw.increasedAtBlock > raw.decreasedAtBlock ? raw.increasedAtBlock : raw.decreasedAtBlock,
    });
  }

  /**
   * Average entry price = position size (USD) / size in index tokens
   */
  calculateEntryPrice(sizeUsd: number, sizeInTokens: number): number {
    return sizeInTokens > 0 ? sizeUsd / sizeInTokens : 0;
  }

  /**
   * Return on collateral, in percent. Shorts gain when the mark price falls.
   */
  calculatePercentProfit(entryPrice: number, markPrice: number, leverage: number, isLong: boolean): number {
    if (entryPrice <= 0) {
      return 0;
    }
    const direction = isLong ? 1 : -1;
    return (markPrice / entryPrice - 1) * leverage * 100 * direction;
  }

  private requireToken(address: Address, account: Address, role: string): TokenInfo {
    const token = this.marketData.getToken(address);
    if (!token) {
      throw new FetchError(`Unknown ${role} token ${address}`, 'markets', account);
    }
    return token;
  }

  private requirePrice(token: TokenInfo, account: Address): PriceQuote {
    const price = this.marketData.getPrice(token.address);
    if (!price) {
      throw new FetchError(`No price available for ${token.symbol} (${token.address})`, 'prices', account);
    }
    return price;
  }
}
