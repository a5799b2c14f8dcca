/**
 * GMX V2 read client
 * One verified RPC connection shared by the position reader, balance aggregator and pollers
 */

import { createProvider as createDefaultProvider } from '../config';
import { GMXContracts } from '../contracts/GMXContracts';
import { TokenContracts } from '../contracts/TokenContracts';
import { BalanceAggregator } from '../services/balances';
import { MarketDataService } from '../services/gmx/MarketDataService';
import { PositionReader } from '../services/gmx/PositionReader';
import PositionPoller from '../services/monitoring/PositionPoller';
import {
  Address,
  BalanceList,
  BalanceReport,
  ClientConfig,
  CollateralToken,
  PollFailurePolicy,
  PositionSet,
  RpcConnection,
} from '../types';
import { logClientConnected, logger } from '../utils/logger';
import { SleepFn } from '../utils/sleep';
import { validateRpcUrl, verifyConnection } from './connection';

export interface GmxClientDependencies {
  createProvider: (rpcUrl: string) => RpcConnection;
  fetchFn: typeof fetch;
}

export interface GmxClientServices {
  connection: RpcConnection;
  positionReader: Pick<PositionReader, 'getPositions'>;
  balanceAggregator: Pick<BalanceAggregator, 'getCollateralBalances' | 'getCollateralBalanceReport'>;
}

export interface PollOptions {
  failurePolicy?: PollFailurePolicy;
  maxConsecutiveFailures?: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
}

export class GmxClient {
  private readonly pollers = new Set<PositionPoller>();

  private closed = false;

  constructor(
    readonly config: ClientConfig,
    private readonly services: GmxClientServices,
  ) {}

  /**
   * Connect to the configured RPC endpoint and wire up the readers.
   * Rejects with a ConnectionError when the url is unusable, the endpoint
   * does not answer, or it serves a different chain.
   */
  static async connect(config: ClientConfig, deps: Partial<GmxClientDependencies> = {}): Promise<GmxClient> {
    const url = validateRpcUrl(config.rpcUrl);
    const createProvider = deps.createProvider ?? createDefaultProvider;
    const connection = createProvider(config.rpcUrl);
    const chainId = await verifyConnection(connection, config.rpcUrl, config.chainId, config.connectTimeoutMs);

    const marketData = new MarketDataService(config.apiUrl, config.marketCacheTtlMs, deps.fetchFn ?? fetch);
    const positionReader = new PositionReader(new GMXContracts(connection, config.gmx), marketData);
    const balanceAggregator = new BalanceAggregator(new TokenContracts(connection), {
      nativeSymbol: config.nativeSymbol,
      defaultTokens: config.collateralTokens,
    });

    logClientConnected({ address: config.address, chainId, endpoint: url.origin });
    return new GmxClient(config, { connection, positionReader, balanceAggregator });
  }

  get address(): Address {
    return this.config.address;
  }

  async getPositions(address: Address): Promise<PositionSet> {
    return this.services.positionReader.getPositions(address);
  }

  async getMyPositions(): Promise<PositionSet> {
    return this.getPositions(this.address);
  }

  async getCollateralBalances(address: Address, tokens?: readonly CollateralToken[]): Promise<BalanceList> {
    return this.services.balanceAggregator.getCollateralBalances(address, tokens);
  }

  async getMyCollateralBalances(tokens?: readonly CollateralToken[]): Promise<BalanceList> {
    return this.getCollateralBalances(this.address, tokens);
  }

  async getCollateralBalanceReport(address: Address, tokens?: readonly CollateralToken[]): Promise<BalanceReport> {
    return this.services.balanceAggregator.getCollateralBalanceReport(address, tokens);
  }

  async getMyCollateralBalanceReport(tokens?: readonly CollateralToken[]): Promise<BalanceReport> {
    return this.getCollateralBalanceReport(this.address, tokens);
  }

  /**
   * Watch an account's positions. Iterate the returned poller with `for await`,
   * or hand it callbacks through `start()`.
   */
  pollPositions(
    address: Address,
    intervalMs: number = this.config.pollIntervalMs,
    options: PollOptions = {},
  ): PositionPoller {
    if (this.closed) {
      throw new Error('GMX client is closed');
    }

    const poller = new PositionPoller(this.services.positionReader, address, {
      intervalMs,
      failurePolicy: options.failurePolicy ?? this.config.pollFailurePolicy,
      maxConsecutiveFailures: options.maxConsecutiveFailures ?? this.config.maxConsecutivePollFailures,
      signal: options.signal,
      sleep: options.sleep,
    });

    for (const existing of this.pollers) {
      if (existing.isStopped()) this.pollers.delete(existing);
    }
    this.pollers.add(poller);
    return poller;
  }

  pollMyPositions(intervalMs?: number, options?: PollOptions): PositionPoller {
    return this.pollPositions(this.address, intervalMs, options);
  }

  /**
   * Stop every poller, wait for in-flight reads and release the connection
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    const pollers = [...this.pollers];
    this.pollers.clear();
    pollers.forEach((poller) => poller.stop());
    await Promise.all(pollers.map((poller) => poller.drain()));

    this.services.connection.destroy();
    logger.info('GMX client closed', { address: this.address, pollers: pollers.length });
  }
}

export default GmxClient;
