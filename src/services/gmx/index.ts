/**
 * GMX Services Export
 */

export { MarketDataService, parseRawPrice } from './MarketDataService';
export { PositionCalculator, getPositionKey } from './PositionCalculator';
export { PositionReader } from './PositionReader';
export {
  diffPositionSets,
  positionSetsEqual,
  positionsEqual,
  positionToJSON,
  subtractPositions,
} from './positionDiff';
export type { MarketDataSource, PriceQuote, TokenInfo } from './MarketDataService';
export type { PositionJSON } from './positionDiff';
