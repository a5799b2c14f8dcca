import { BalanceSource } from '../../src/contracts/TokenContracts';
import { Address } from '../../src/types';

type Entry = { decimals: number; balances: Map<string, bigint>; error?: Error };

// In-memory wallet balances; tokens without an entry behave like a reverting contract
export class MockBalanceSource implements BalanceSource {
  private tokens = new Map<string, Entry>();

  private nativeBalances = new Map<string, bigint>();

  private nativeError: Error | undefined;

  tokenCalls: Address[] = [];

  addToken(token: Address, decimals: number): void {
    this.tokens.set(token.toLowerCase(), { decimals, balances: new Map() });
  }

  setTokenBalance(token: Address, account: Address, balance: bigint): void {
    this.tokens.get(token.toLowerCase())?.balances.set(account.toLowerCase(), balance);
  }

  failToken(token: Address, error: Error): void {
    const entry = this.tokens.get(token.toLowerCase());
    if (entry) entry.error = error;
  }

  setNativeBalance(account: Address, balance: bigint): void {
    this.nativeBalances.set(account.toLowerCase(), balance);
  }

  failNative(error: Error): void {
    this.nativeError = error;
  }

  async getNativeBalance(account: Address): Promise<bigint> {
    if (this.nativeError) throw this.nativeError;
    return this.nativeBalances.get(account.toLowerCase()) ?? 0n;
  }

  async getTokenBalance(token: Address, account: Address): Promise<bigint> {
    this.tokenCalls.push(token);
    const entry = this.requireToken(token);
    return entry.balances.get(account.toLowerCase()) ?? 0n;
  }

  async getTokenDecimals(token: Address): Promise<number> {
    return this.requireToken(token).decimals;
  }

  private requireToken(token: Address): Entry {
    const entry = this.tokens.get(token.toLowerCase());
    if (!entry) throw new Error(`execution reverted: no contract at ${token}`);
    if (entry.error) throw entry.error;
    return entry;
  }
}
