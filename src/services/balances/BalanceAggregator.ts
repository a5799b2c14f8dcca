import { formatUnits, getAddress, isAddress } from 'ethers';
import { BalanceSource } from '../../contracts/TokenContracts';
import { FetchError, toErrorMessage } from '../../errors';
import {
  Address,
  BalanceFailure,
  BalanceList,
  BalanceReport,
  CollateralToken,
  Erc20Balance,
  NativeBalance,
  TokenBalance,
} from '../../types';
import { logger } from '../../utils/logger';

const NATIVE_DECIMALS = 18;

export interface BalanceAggregatorOptions {
  nativeSymbol: string;
  defaultTokens: readonly CollateralToken[];
}

// First occurrence of each token address wins
const uniqueTokens = (tokens: readonly CollateralToken[]): CollateralToken[] => {
  const seen = new Set<string>();
  return tokens.filter((token) => {
    const key = token.address.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

class BalanceAggregator {
  constructor(
    private readonly source: BalanceSource,
    private readonly options: BalanceAggregatorOptions,
  ) {}

  /**
   * ERC20 balances in token order, then the native balance.
   * A single failed lookup rejects the whole call.
   */
  async getCollateralBalances(
    address: Address,
    tokens: readonly CollateralToken[] = this.options.defaultTokens,
  ): Promise<BalanceList> {
    const account = this.requireAccount(address);
    const unique = uniqueTokens(tokens);

    try {
      const [tokenBalances, nativeBalance] = await Promise.all([
        Promise.all(unique.map((token) => this.getTokenBalance(token, account))),
        this.getNativeBalance(account),
      ]);

      logger.debug('Fetched collateral balances', { account, tokens: unique.length });
      return Object.freeze([...tokenBalances, nativeBalance]);
    } catch (error) {
      logger.error('Failed to fetch collateral balances', { account, error: toErrorMessage(error) });
      throw new FetchError(
        `Failed to fetch collateral balances for ${account}: ${toErrorMessage(error)}`,
        'balances',
        account,
        error,
      );
    }
  }

  /**
   * Same lookups as getCollateralBalances, settled one by one.
   * Failed lookups are reported next to the balances that did load.
   */
  async getCollateralBalanceReport(
    address: Address,
    tokens: readonly CollateralToken[] = this.options.defaultTokens,
  ): Promise<BalanceReport> {
    const account = this.requireAccount(address);
    const unique = uniqueTokens(tokens);

    const results = await Promise.allSettled([
      ...unique.map((token) => this.getTokenBalance(token, account)),
      this.getNativeBalance(account),
    ]);

    const balances: TokenBalance[] = [];
    const failures: BalanceFailure[] = [];

    results.forEach((result, idx) => {
      if (result.status === 'fulfilled') {
        balances.push(result.value);
        return;
      }
      // the native lookup settles last
      const failure: BalanceFailure = idx < unique.length
        ? { name: unique[idx].name, contractId: unique[idx].address, message: toErrorMessage(result.reason) }
        : { name: this.options.nativeSymbol, contractId: '', message: toErrorMessage(result.reason) };
      logger.warn('Balance lookup failed', { account, token: failure.name, error: failure.message });
      failures.push(failure);
    });

    return { balances, failures };
  }

  private requireAccount(address: Address): Address {
    if (!isAddress(address)) {
      throw new FetchError(`Invalid account address: ${address}`, 'balances', address);
    }
    return getAddress(address);
  }

  private async getTokenBalance(token: CollateralToken, account: Address): Promise<Erc20Balance> {
    const [decimals, rawBalance] = await Promise.all([
      this.source.getTokenDecimals(token.address),
      this.source.getTokenBalance(token.address, account),
    ]);

    return Object.freeze({
      kind: 'erc20',
      name: token.name,
      contractId: token.address,
      decimals,
      rawBalance,
      balance: Number(formatUnits(rawBalance, decimals)),
    });
  }

  private async getNativeBalance(account: Address): Promise<NativeBalance> {
    const rawBalance = await this.source.getNativeBalance(account);
    return Object.freeze({
      kind: 'native',
      name: this.options.nativeSymbol,
      contractId: '',
      decimals: NATIVE_DECIMALS,
      rawBalance,
      balance: Number(formatUnits(rawBalance, NATIVE_DECIMALS)),
    });
  }
}

export interface TokenBalanceJSON {
  kind: TokenBalance['kind'];
  name: string;
  contractId: string;
  decimals: number;
  rawBalance: string;
  balance: number;
}

export const balanceToJSON = (balance: TokenBalance): TokenBalanceJSON => ({
  kind: balance.kind,
  name: balance.name,
  contractId: balance.contractId,
  decimals: balance.decimals,
  rawBalance: balance.rawBalance.toString(),
  balance: balance.balance,
});

export default BalanceAggregator;
