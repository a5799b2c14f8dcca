import { Address } from '../types';

export type GmxClientErrorCode = 'CONNECTION_FAILED' | 'FETCH_FAILED' | 'INVALID_CONFIG';

export type FetchOperation = 'positions' | 'markets' | 'prices' | 'balances';

export class GmxClientError extends Error {
  constructor(
    message: string,
    public readonly code: GmxClientErrorCode,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'GmxClientError';
  }
}

/**
 * The RPC endpoint is malformed, unreachable, or answers for another chain.
 * Raised while connecting only; never retried.
 */
export class ConnectionError extends GmxClientError {
  constructor(
    message: string,
    public readonly rpcUrl: string,
    cause?: unknown,
  ) {
    super(message, 'CONNECTION_FAILED', cause);
    this.name = 'ConnectionError';
  }
}

/**
 * A read for positions, markets, prices or balances failed or returned malformed data.
 */
export class FetchError extends GmxClientError {
  constructor(
    message: string,
    public readonly operation: FetchOperation,
    public readonly account?: Address,
    cause?: unknown,
  ) {
    super(message, 'FETCH_FAILED', cause);
    this.name = 'FetchError';
  }
}

export class ConfigError extends GmxClientError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

export const toErrorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
