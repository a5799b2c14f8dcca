import dotenv from 'dotenv';
import { JsonRpcProvider, Wallet, WebSocketProvider, getAddress, isAddress } from 'ethers';
import { ConfigError } from '../errors';
import {
  Address,
  Chain,
  ClientConfig,
  CollateralToken,
  GMXAddresses,
  PollFailurePolicy,
  RpcConnection,
} from '../types';
import { getChainDeployment, isChain } from './chains';
import { DEFAULT_COLLATERAL_TOKENS } from './tokens';

dotenv.config();

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;
const DEFAULT_POLL_INTERVAL_MS = 10_000;
const DEFAULT_MARKET_CACHE_TTL_MS = 60_000;

export interface ClientConfigInput {
  rpcUrl: string;
  address?: Address;
  privateKey?: string;
  chain?: Chain;
  gmx?: Partial<GMXAddresses>;
  apiUrl?: string;
  collateralTokens?: readonly CollateralToken[];
  connectTimeoutMs?: number;
  pollIntervalMs?: number;
  pollFailurePolicy?: PollFailurePolicy;
  maxConsecutivePollFailures?: number;
  marketCacheTtlMs?: number;
}

const parseNumber = (name: string, value: string | undefined): number | undefined => {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new ConfigError(`Env ${name} must be a valid number`);
  }
  return parsed;
};

const requiredString = (name: string, value: string | undefined): string => {
  if (!value) {
    throw new ConfigError(`Missing required env: ${name}`);
  }
  return value;
};

const normalizePrivateKey = (pk: string): string => {
  const hexRegex = /^(0x)?[0-9a-fA-F]{64}$/;
  if (!hexRegex.test(pk)) {
    throw new ConfigError('PRIVATE_KEY must be 64 hex characters, optionally 0x-prefixed');
  }
  return pk.startsWith('0x') ? pk : `0x${pk}`;
};

const checksumAddress = (name: string, value: string): Address => {
  if (!isAddress(value)) {
    throw new ConfigError(`${name} is not a valid address: ${value}`);
  }
  return getAddress(value);
};

const requirePositive = (name: string, value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be greater than 0`);
  }
  return value;
};

const requireNonNegativeInteger = (name: string, value: number): number => {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative integer`);
  }
  return value;
};

const parsePollFailurePolicy = (value: string | undefined): PollFailurePolicy | undefined => {
  if (value === undefined || value === '') return undefined;
  const policy = value.toLowerCase();
  if (policy !== 'skip' && policy !== 'abort') {
    throw new ConfigError('POLL_FAILURE_POLICY must be "skip" or "abort"');
  }
  return policy;
};

const parseChain = (value: string | undefined): Chain | undefined => {
  if (value === undefined || value === '') return undefined;
  const chain = value.toUpperCase();
  if (!isChain(chain)) {
    throw new ConfigError(`Unsupported CHAIN: ${value}`);
  }
  return chain;
};

/**
 * Parses `SYMBOL:0xaddress` pairs separated by commas.
 */
export const parseCollateralTokens = (value: string | undefined): CollateralToken[] | undefined => {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const [name, address] = entry.split(':').map((part) => part.trim());
      if (!name || !address) {
        throw new ConfigError(`COLLATERAL_TOKENS entry must be SYMBOL:address, got "${entry}"`);
      }
      return { name, address: checksumAddress(`COLLATERAL_TOKENS[${name}]`, address) };
    });
};

const resolveAccount = (address: string | undefined, privateKey: string | undefined): Address => {
  const configured = address ? checksumAddress('ACCOUNT_ADDRESS', address) : undefined;
  if (!privateKey) {
    if (!configured) {
      throw new ConfigError('Either an account address or a private key is required');
    }
    return configured;
  }

  const derived = new Wallet(privateKey).address;
  if (configured && configured !== derived) {
    throw new ConfigError(`ACCOUNT_ADDRESS ${configured} does not match the address of PRIVATE_KEY (${derived})`);
  }
  return derived;
};

/**
 * Builds the immutable client configuration, filling chain defaults.
 * The RPC url is checked when connecting, not here.
 */
export const createClientConfig = (input: ClientConfigInput): ClientConfig => {
  const chain = input.chain ?? Chain.ARBITRUM;
  const deployment = getChainDeployment(chain);
  const privateKey = input.privateKey ? normalizePrivateKey(input.privateKey) : undefined;
  const address = resolveAccount(input.address, privateKey);

  const gmx: GMXAddresses = {
    reader: checksumAddress('GMX reader', input.gmx?.reader ?? deployment.gmx.reader),
    dataStore: checksumAddress('GMX dataStore', input.gmx?.dataStore ?? deployment.gmx.dataStore),
  };

  const collateralTokens = (input.collateralTokens ?? DEFAULT_COLLATERAL_TOKENS[chain]).map((token) =>
    Object.freeze({ name: token.name, address: checksumAddress(`collateral token ${token.name}`, token.address) }),
  );

  return Object.freeze({
    address,
    privateKey,
    rpcUrl: input.rpcUrl.trim(),
    chain,
    chainId: deployment.chainId,
    gmx: Object.freeze(gmx),
    apiUrl: (input.apiUrl ?? deployment.apiUrl).replace(/\/+$/, ''),
    nativeSymbol: deployment.nativeSymbol,
    collateralTokens: Object.freeze(collateralTokens),
    connectTimeoutMs: requirePositive('CONNECT_TIMEOUT_MS', input.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS),
    pollIntervalMs: requirePositive('POLL_INTERVAL_MS', input.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS),
    pollFailurePolicy: input.pollFailurePolicy ?? 'skip',
    maxConsecutivePollFailures: requireNonNegativeInteger(
      'MAX_CONSECUTIVE_POLL_FAILURES',
      input.maxConsecutivePollFailures ?? 0,
    ),
    marketCacheTtlMs: requireNonNegativeInteger(
      'MARKET_CACHE_TTL_MS',
      input.marketCacheTtlMs ?? DEFAULT_MARKET_CACHE_TTL_MS,
    ),
  });
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ClientConfig => {
  const rpcUrl = requiredString('RPC_URL', env.RPC_URL);

  const readerOverride = env.GMX_READER_ADDRESS || undefined;
  const dataStoreOverride = env.GMX_DATASTORE_ADDRESS || undefined;

  return createClientConfig({
    rpcUrl,
    address: env.ACCOUNT_ADDRESS || undefined,
    privateKey: env.PRIVATE_KEY || undefined,
    chain: parseChain(env.CHAIN),
    gmx: { reader: readerOverride, dataStore: dataStoreOverride },
    apiUrl: env.GMX_API_URL || undefined,
    collateralTokens: parseCollateralTokens(env.COLLATERAL_TOKENS),
    connectTimeoutMs: parseNumber('CONNECT_TIMEOUT_MS', env.CONNECT_TIMEOUT_MS),
    pollIntervalMs: parseNumber('POLL_INTERVAL_MS', env.POLL_INTERVAL_MS),
    pollFailurePolicy: parsePollFailurePolicy(env.POLL_FAILURE_POLICY),
    maxConsecutivePollFailures: parseNumber('MAX_CONSECUTIVE_POLL_FAILURES', env.MAX_CONSECUTIVE_POLL_FAILURES),
    marketCacheTtlMs: parseNumber('MARKET_CACHE_TTL_MS', env.MARKET_CACHE_TTL_MS),
  });
};

/**
 * Create provider from RPC URL
 * Uses WebSocket for ws(s):// URLs, JSON-RPC over HTTP otherwise
 */
export const createProvider = (rpcUrl: string): RpcConnection => {
  if (rpcUrl.startsWith('wss://') || rpcUrl.startsWith('ws://')) {
    return new WebSocketProvider(rpcUrl);
  }
  return new JsonRpcProvider(rpcUrl);
};

export { CHAIN_DEPLOYMENTS, GMX_ARBITRUM_ADDRESSES, getChainDeployment } from './chains';
export { DEFAULT_COLLATERAL_TOKENS } from './tokens';
