import { jest } from '@jest/globals';
import { PositionSource } from '../../src/contracts/GMXContracts';
import { Market, PositionStruct } from '../../src/contracts/interfaces';
import { Address } from '../../src/types';

// In-memory positions and markets keyed by lowercase address
export class MockPositionSource implements PositionSource {
  private positions = new Map<string, PositionStruct[]>();

  private markets = new Map<string, Market>();

  private failure: Error | undefined;

  getAccountPositions = jest.fn(async (account: Address): Promise<PositionStruct[]> => {
    if (this.failure) throw this.failure;
    return [...(this.positions.get(account.toLowerCase()) ?? [])];
  });

  getMarket = jest.fn(async (marketToken: Address): Promise<Market> => {
    const market = this.markets.get(marketToken.toLowerCase());
    if (!market) throw new Error(`Unknown market ${marketToken}`);
    return market;
  });

  setPositions(account: Address, positions: PositionStruct[]): void {
    this.positions.set(account.toLowerCase(), positions);
  }

  setMarket(market: Market): void {
    this.markets.set(market.marketToken.toLowerCase(), market);
  }

  fail(error: Error | undefined): void {
    this.failure = error;
  }
}
