export { GmxClient } from './client/GmxClient';
export type { GmxClientDependencies, GmxClientServices, PollOptions } from './client/GmxClient';
export { validateRpcUrl, verifyConnection } from './client/connection';

export {
  createClientConfig,
  createProvider,
  loadConfig,
  parseCollateralTokens,
  CHAIN_DEPLOYMENTS,
  DEFAULT_COLLATERAL_TOKENS,
  GMX_ARBITRUM_ADDRESSES,
  getChainDeployment,
} from './config';
export type { ClientConfigInput } from './config';

export {
  ConfigError,
  ConnectionError,
  FetchError,
  GmxClientError,
  toErrorMessage,
} from './errors';
export type { FetchOperation, GmxClientErrorCode } from './errors';

export { GMXContracts, TokenContracts } from './contracts';
export type { BalanceSource, Market, PositionSource, PositionStruct } from './contracts';

export {
  MarketDataService,
  PositionCalculator,
  PositionReader,
  diffPositionSets,
  getPositionKey,
  positionSetsEqual,
  positionsEqual,
  positionToJSON,
  subtractPositions,
} from './services/gmx';
export type { MarketDataSource, PositionJSON, PriceQuote, TokenInfo } from './services/gmx';

export { BalanceAggregator, balanceToJSON } from './services/balances';
export type { BalanceAggregatorOptions, TokenBalanceJSON } from './services/balances';

export { PositionPoller } from './services/monitoring';
export type { PositionPollerOptions, PositionSnapshotSource } from './services/monitoring';

export { logger } from './utils/logger';

export * from './types';
