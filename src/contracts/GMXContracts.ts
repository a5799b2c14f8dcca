/**
 * GMX V2 Contract Manager
 * Read-only access to the Reader and DataStore contracts
 */

import { Contract, ContractRunner, getAddress } from 'ethers';
import { Address, GMXAddresses } from '../types';
import { GMX_READER_ABI } from './abis/GMXReader.abi';
import { GMX_DATASTORE_ABI, accountPositionListKey } from './abis/GMXDataStore.abi';
import { Market, PositionStruct, decodeMarket, decodePositionList } from './interfaces';
import { logger } from '../utils/logger';

/**
 * Where raw positions and market definitions come from
 */
export interface PositionSource {
  getAccountPositions(account: Address): Promise<PositionStruct[]>;
  getMarket(marketToken: Address): Promise<Market>;
}

/**
 * GMXContracts wraps the GMX V2 contracts the position reader queries
 */
export class GMXContracts implements PositionSource {
  private readonly reader: Contract;
  private readonly dataStore: Contract;

  constructor(
    runner: ContractRunner,
    private readonly addresses: GMXAddresses,
  ) {
    this.reader = new Contract(addresses.reader, GMX_READER_ABI, runner);
    this.dataStore = new Contract(addresses.dataStore, GMX_DATASTORE_ABI, runner);

    logger.debug('GMXContracts initialized', {
      reader: addresses.reader,
      dataStore: addresses.dataStore,
    });
  }

  /**
   * Get all contract addresses
   */
  getAddresses(): GMXAddresses {
    return { ...this.addresses };
  }

  /**
   * Number of open positions recorded for an account
   */
  async getAccountPositionCount(account: Address): Promise<bigint> {
    const count: unknown = await this.dataStore
      .getFunction('getBytes32Count')
      .staticCall(accountPositionListKey(getAddress(account)));

    if (typeof count !== 'bigint') {
      throw new TypeError('Malformed position count returned by DataStore');
    }
    return count;
  }

  /**
   * Fetch positions directly from the blockchain for an account
   */
  async getAccountPositions(account: Address): Promise<PositionStruct[]> {
    const checksumAccount = getAddress(account);
    const positionCount = await this.getAccountPositionCount(checksumAccount);

    if (positionCount === 0n) {
      return [];
    }

    logger.debug('Fetching on-chain positions', { account: checksumAccount, positionCount });

    const positions: unknown = await this.reader
      .getFunction('getAccountPositions')
      .staticCall(this.addresses.dataStore, checksumAccount, 0n, positionCount);

    return decodePositionList(positions);
  }

  /**
   * Market definition (index, long and short tokens) for a market token
   */
  async getMarket(marketToken: Address): Promise<Market> {
    const market: unknown = await this.reader
      .getFunction('getMarket')
      .staticCall(this.addresses.dataStore, getAddress(marketToken));

    return decodeMarket(market);
  }
}
