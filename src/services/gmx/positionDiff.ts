import {
  Position,
  PositionDelta,
  PositionSet,
  PositionSetDiff,
} from '../../types';

const SIZE_TOLERANCE = 1e-10;
const PRICE_TOLERANCE = 1e-6;

const sameAddress = (a: string, b: string): boolean => a.toLowerCase() === b.toLowerCase();

/**
 * Value equality for two snapshots of a position.
 *
 * Mark-price driven fields (markPrice, percentProfit, collateralAmountUsd, leverage)
 * are ignored: they move every block without the position itself changing.
 */
export const positionsEqual = (a: Position, b: Position): boolean =>
  a.key === b.key &&
  sameAddress(a.account, b.account) &&
  sameAddress(a.market, b.market) &&
  a.marketSymbol === b.marketSymbol &&
  sameAddress(a.collateralToken, b.collateralToken) &&
  a.isLong === b.isLong &&
  Math.abs(a.sizeUsd - b.sizeUsd) < SIZE_TOLERANCE &&
  a.sizeInTokens === b.sizeInTokens &&
  Math.abs(a.entryPrice - b.entryPrice) < PRICE_TOLERANCE &&
  a.collateralAmount === b.collateralAmount &&
  a.borrowingFactor === b.borrowingFactor &&
  a.fundingFeeAmountPerSize === b.fundingFeeAmountPerSize &&
  a.longTokenClaimableFundingAmountPerSize === b.longTokenClaimableFundingAmountPerSize &&
  a.shortTokenClaimableFundingAmountPerSize === b.shortTokenClaimableFundingAmountPerSize &&
  a.increasedAtBlock === b.increasedAtBlock &&
  a.decreasedAtBlock === b.decreasedAtBlock;

/**
 * True when both sets hold the same positions, in any order
 */
export const positionSetsEqual = (before: PositionSet, after: PositionSet): boolean => {
  if (before.length !== after.length) {
    return false;
  }
  return before.every((position) => after.some((candidate) => positionsEqual(position, candidate)));
};

/**
 * Subtract one snapshot of a position from another (before - after)
 */
export const subtractPositions = (before: Position, after: Position): PositionDelta => {
  if (before.key !== after.key) {
    throw new RangeError(
      `Positions must share a key to be compared (${before.positionId} vs ${after.positionId})`,
    );
  }

  return {
    positionId: after.positionId,
    key: after.key,
    deltaCollateralAmount: before.collateralAmount - after.collateralAmount,
    deltaCollateralAmountUsd: before.collateralAmountUsd - after.collateralAmountUsd,
    deltaLeverage: before.leverage - after.leverage,
    deltaSizeUsd: before.sizeUsd - after.sizeUsd,
  };
};

/**
 * Positions opened, closed and changed between two snapshots, matched by position key
 */
export const diffPositionSets = (before: PositionSet, after: PositionSet): PositionSetDiff => {
  const beforeByKey = new Map(before.map((position) => [position.key, position]));
  const afterKeys = new Set(after.map((position) => position.key));

  const added: Position[] = [];
  const modified: PositionDelta[] = [];

  for (const position of after) {
    const previous = beforeByKey.get(position.key);
    if (!previous) {
      added.push(position);
    } else if (!positionsEqual(previous, position)) {
      modified.push(subtractPositions(previous, position));
    }
  }

  const removed = before.filter((position) => !afterKeys.has(position.key));

  return { added, removed, modified };
};

export interface PositionJSON {
  key: string;
  positionId: string;
  account: string;
  market: string;
  marketSymbol: string;
  collateralToken: string;
  collateralSymbol: string;
  side: string;
  isLong: boolean;
  sizeUsd: number;
  sizeInTokens: number;
  collateralAmount: number;
  collateralAmountUsd: number;
  entryPrice: number;
  markPrice: number;
  leverage: number;
  percentProfit: number;
  borrowingFactor: string;
  fundingFeeAmountPerSize: string;
  longTokenClaimableFundingAmountPerSize: string;
  shortTokenClaimableFundingAmountPerSize: string;
  increasedAtBlock: string;
  decreasedAtBlock: string;
  modifiedAtBlock: string;
}

export const positionToJSON = (position: Position): PositionJSON => ({
  key: position.key,
  positionId: position.positionId,
  account: position.account,
  market: position.market,
  marketSymbol: position.marketSymbol,
  collateralToken: position.collateralToken,
  collateralSymbol: position.collateralSymbol,
  side: position.side,
  isLong: position.isLong,
  sizeUsd: position.sizeUsd,
  sizeInTokens: position.sizeInTokens,
  collateralAmount: position.collateralAmount,
  collateralAmountUsd: position.collateralAmountUsd,
  entryPrice: position.entryPrice,
  markPrice: position.markPrice,
  leverage: position.leverage,
  percentProfit: position.percentProfit,
  borrowingFactor: position.borrowingFactor.toString(),
  fundingFeeAmountPerSize: position.fundingFeeAmountPerSize.toString(),
  longTokenClaimableFundingAmountPerSize: position.longTokenClaimableFundingAmountPerSize.toString(),
  shortTokenClaimableFundingAmountPerSize: position.shortTokenClaimableFundingAmountPerSize.toString(),
  increasedAtBlock: position.increasedAtBlock.toString(),
  decreasedAtBlock: position.decreasedAtBlock.toString(),
  modifiedAtBlock: position.modifiedAtBlock.toString(),
});
