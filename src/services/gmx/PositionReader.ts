/**
 * GMX Position Reader
 * Reads an account's open positions and normalises them
 */

import { getAddress, isAddress } from 'ethers';
import { PositionSource } from '../../contracts/GMXContracts';
import { Market } from '../../contracts/interfaces';
import { FetchError, toErrorMessage } from '../../errors';
import { Address, Position, PositionSet } from '../../types';
import { logger } from '../../utils/logger';
import { MarketDataSource } from './MarketDataService';
import { PositionCalculator } from './PositionCalculator';

export class PositionReader {
  // Market definitions are immutable once created
  private readonly markets: Map<string, Market> = new Map();

  private readonly calculator: PositionCalculator;

  constructor(
    private readonly source: PositionSource,
    private readonly marketData: MarketDataSource,
  ) {
    this.calculator = new PositionCalculator(marketData);
  }

  /**
   * Fetch every open position owned by `address`.
   * All-or-nothing: any failed or malformed read rejects with a FetchError.
   */
  async getPositions(address: Address): Promise<PositionSet> {
    if (!isAddress(address)) {
      throw new FetchError(`Invalid account address: ${address}`, 'positions', address);
    }
    const account = getAddress(address);

    try {
      const structs = await this.source.getAccountPositions(account);
      const owned = structs.filter((struct) => struct.account.toLowerCase() === account.toLowerCase());

      if (owned.length !== structs.length) {
        logger.warn('Ignoring positions owned by another account', {
          account,
          dropped: structs.length - owned.length,
        });
      }

      if (owned.length === 0) {
        logger.debug('No open positions', { account });
        return Object.freeze([]);
      }

      await this.marketData.refresh();

      const positions: Position[] = [];
      for (const struct of owned) {
        const market = await this.resolveMarket(struct.market);
        positions.push(this.calculator.toPosition(struct, market));
      }

      logger.debug('Fetched positions', {
        account,
        count: positions.length,
        positions: positions.map((position) => position.positionId),
      });

      return Object.freeze(positions);
    } catch (error) {
      logger.error('Failed to fetch positions', { account, error: toErrorMessage(error) });
      if (error instanceof FetchError) throw error;
      throw new FetchError(`Failed to fetch positions for ${account}: ${toErrorMessage(error)}`, 'positions', account, error);
    }
  }

  private async resolveMarket(marketToken: Address): Promise<Market> {
    const key = marketToken.toLowerCase();
    const cached = this.markets.get(key);
    if (cached) {
      return cached;
    }

    const market = await this.source.getMarket(marketToken);
    this.markets.set(key, market);
    return market;
  }
}
