import { Contract, ContractRunner, getAddress } from 'ethers';
import { Address } from '../types';
import { ERC20_ABI } from './abis/ERC20.abi';

/**
 * Where wallet balances come from
 */
export interface BalanceSource {
  getNativeBalance(account: Address): Promise<bigint>;
  getTokenBalance(token: Address, account: Address): Promise<bigint>;
  getTokenDecimals(token: Address): Promise<number>;
}

export type BalanceConnection = ContractRunner & {
  getBalance(address: string): Promise<bigint>;
};

/**
 * ERC20 and native balance reads over one RPC connection
 */
export class TokenContracts implements BalanceSource {
  private readonly contracts = new Map<string, Contract>();

  // decimals never change for a deployed token
  private readonly decimals = new Map<string, number>();

  constructor(private readonly connection: BalanceConnection) {}

  async getNativeBalance(account: Address): Promise<bigint> {
    return this.connection.getBalance(getAddress(account));
  }

  async getTokenBalance(token: Address, account: Address): Promise<bigint> {
    const balance: unknown = await this.getContract(token)
      .getFunction('balanceOf')
      .staticCall(getAddress(account));

    if (typeof balance !== 'bigint') {
      throw new TypeError(`Malformed balanceOf result from ${token}`);
    }
    return balance;
  }

  async getTokenDecimals(token: Address): Promise<number> {
    const key = token.toLowerCase();
    const cached = this.decimals.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value: unknown = await this.getContract(token).getFunction('decimals').staticCall();
    if (typeof value !== 'bigint') {
      throw new TypeError(`Malformed decimals result from ${token}`);
    }

    const decimals = Number(value);
    this.decimals.set(key, decimals);
    return decimals;
  }

  private getContract(token: Address): Contract {
    const key = token.toLowerCase();
    let contract = this.contracts.get(key);
    if (!contract) {
      contract = new Contract(getAddress(token), ERC20_ABI, this.connection);
      this.contracts.set(key, contract);
    }
    return contract;
  }
}
