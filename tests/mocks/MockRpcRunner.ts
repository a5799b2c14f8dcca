import { Interface, InterfaceAbi, Result, TransactionRequest } from 'ethers';
import { Address, RpcConnection } from '../../src/types';

type CallHandler = (args: Result) => readonly unknown[] | Promise<readonly unknown[]>;

interface MockedContract {
  iface: Interface;
  handlers: Map<string, CallHandler>;
}

/**
 * In-process stand-in for an RPC provider.
 * Contract reads are decoded against the registered ABI and answered by per-function handlers.
 */
export class MockRpcRunner implements RpcConnection {
  readonly provider = null;

  destroyed = false;

  private chainId = 42161n;

  private networkError: Error | undefined;

  private networkPending = false;

  private balances = new Map<string, bigint>();

  private contracts = new Map<string, MockedContract>();

  private history: Record<string, unknown[][]> = {};

  setChainId(chainId: bigint): void {
    this.chainId = chainId;
  }

  failNetwork(error: Error): void {
    this.networkError = error;
  }

  // getNetwork never settles
  hangNetwork(): void {
    this.networkPending = true;
  }

  setBalance(address: Address, balance: bigint): void {
    this.balances.set(address.toLowerCase(), balance);
  }

  mockFunction(address: Address, abi: InterfaceAbi, name: string, handler: CallHandler): void {
    const key = address.toLowerCase();
    const existing = this.contracts.get(key);
    const contract = existing ?? { iface: new Interface(abi), handlers: new Map<string, CallHandler>() };
    contract.handlers.set(name, handler);
    this.contracts.set(key, contract);
  }

  calls(method: string): unknown[][] {
    return this.history[method] ?? [];
  }

  private record(method: string, args: unknown[]): void {
    if (!this.history[method]) this.history[method] = [];
    this.history[method].push(args);
  }

  async call(tx: TransactionRequest): Promise<string> {
    if (typeof tx.to !== 'string' || typeof tx.data !== 'string') {
      throw new Error('Mock call needs a string target and calldata');
    }
    const contract = this.contracts.get(tx.to.toLowerCase());
    if (!contract) throw new Error(`No contract mocked at ${tx.to}`);

    const parsed = contract.iface.parseTransaction({ data: tx.data });
    if (!parsed) throw new Error(`Unknown selector for ${tx.to}`);

    const handler = contract.handlers.get(parsed.name);
    if (!handler) throw new Error(`Call result not mocked: ${parsed.name}`);

    this.record(parsed.name, [tx.to, ...parsed.args.toArray()]);
    const values = await handler(parsed.args);
    return contract.iface.encodeFunctionResult(parsed.fragment, values);
  }

  async getNetwork(): Promise<{ chainId: bigint }> {
    this.record('getNetwork', []);
    if (this.networkPending) return new Promise<never>(() => undefined);
    if (this.networkError) throw this.networkError;
    return { chainId: this.chainId };
  }

  async getBalance(address: string): Promise<bigint> {
    this.record('getBalance', [address]);
    return this.balances.get(address.toLowerCase()) ?? 0n;
  }

  destroy(): void {
    this.destroyed = true;
  }
}
