import { ContractRunner } from 'ethers';

export type Address = string;
export type PositionKey = string;

export enum LogLevel {
  INFO = 'info',
  DEBUG = 'debug',
  WARN = 'warn',
  ERROR = 'error',
}

export enum Chain {
  ARBITRUM = 'ARBITRUM',
}

export const CHAIN_IDS: Record<Chain, number> = {
  [Chain.ARBITRUM]: 42161,
};

// GMX V2 contracts the reader needs
export interface GMXAddresses {
  reader: Address;
  dataStore: Address;
}

export interface CollateralToken {
  name: string;
  address: Address;
}

/**
 * The slice of an ethers provider the client relies on.
 * `JsonRpcProvider` and `WebSocketProvider` both satisfy it.
 */
export interface RpcConnection extends ContractRunner {
  getNetwork(): Promise<{ chainId: bigint }>;
  getBalance(address: string): Promise<bigint>;
  destroy(): void;
}

export type PollFailurePolicy = 'skip' | 'abort';

export interface ClientConfig {
  readonly address: Address;
  readonly privateKey?: string;
  readonly rpcUrl: string;
  readonly chain: Chain;
  readonly chainId: number;
  readonly gmx: Readonly<GMXAddresses>;
  readonly apiUrl: string;
  readonly nativeSymbol: string;
  readonly collateralTokens: readonly CollateralToken[];
  readonly connectTimeoutMs: number;
  readonly pollIntervalMs: number;
  readonly pollFailurePolicy: PollFailurePolicy;
  readonly maxConsecutivePollFailures: number;
  readonly marketCacheTtlMs: number;
}

export type PositionSide = 'long' | 'short';

/**
 * Normalised snapshot of one open GMX V2 position.
 * USD and token amounts are display numbers; on-chain accumulators stay raw.
 */
export interface Position {
  readonly key: PositionKey;
  /** `<INDEX SYMBOL>_<side>`, e.g. `ETH_long` */
  readonly positionId: string;
  readonly account: Address;
  readonly market: Address;
  readonly marketSymbol: string;
  readonly collateralToken: Address;
  readonly collateralSymbol: string;
  readonly side: PositionSide;
  readonly isLong: boolean;
  readonly sizeUsd: number;
  readonly sizeInTokens: number;
  readonly collateralAmount: number;
  readonly collateralAmountUsd: number;
  readonly entryPrice: number;
  readonly markPrice: number;
  readonly leverage: number;
  readonly percentProfit: number;
  readonly borrowingFactor: bigint;
  readonly fundingFeeAmountPerSize: bigint;
  readonly longTokenClaimableFundingAmountPerSize: bigint;
  readonly shortTokenClaimableFundingAmountPerSize: bigint;
  readonly increasedAtBlock: bigint;
  readonly decreasedAtBlock: bigint;
  readonly modifiedAtBlock: bigint;
}

export type PositionSet = readonly Position[];

// before - after, per field
export interface PositionDelta {
  positionId: string;
  key: PositionKey;
  deltaCollateralAmount: number;
  deltaCollateralAmountUsd: number;
  deltaLeverage: number;
  deltaSizeUsd: number;
}

export interface PositionSetDiff {
  added: Position[];
  removed: Position[];
  modified: PositionDelta[];
}

export interface PositionChange extends PositionSetDiff {
  account: Address;
  before: PositionSet;
  after: PositionSet;
  round: number;
  detectedAt: number;
}

interface TokenBalanceBase {
  name: string;
  decimals: number;
  rawBalance: bigint;
  balance: number;
}

export interface Erc20Balance extends TokenBalanceBase {
  kind: 'erc20';
  contractId: Address;
}

export interface NativeBalance extends TokenBalanceBase {
  kind: 'native';
  contractId: '';
}

export type TokenBalance = Erc20Balance | NativeBalance;

export type BalanceList = readonly TokenBalance[];

export interface BalanceFailure {
  name: string;
  contractId: Address | '';
  message: string;
}

export interface BalanceReport {
  balances: TokenBalance[];
  failures: BalanceFailure[];
}

export enum PollerState {
  IDLE = 'IDLE',
  INITIALIZING = 'INITIALIZING',
  WAITING = 'WAITING',
  COMPARING = 'COMPARING',
  EMITTING = 'EMITTING',
  FAILED = 'FAILED',
  STOPPED = 'STOPPED',
}

export interface PollerStats {
  state: PollerState;
  rounds: number;
  changes: number;
  failedPolls: number;
  consecutiveFailures: number;
  lastTickDurationMs: number;
}
