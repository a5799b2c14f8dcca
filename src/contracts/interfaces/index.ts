export type { Market, PositionStruct } from './IGMXReader';
export { decodeMarket, decodePositionList, decodePositionStruct } from './IGMXReader';
