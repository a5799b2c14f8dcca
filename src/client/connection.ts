import { ConnectionError, toErrorMessage } from '../errors';
import { RpcConnection } from '../types';
import { logger } from '../utils/logger';

const SUPPORTED_PROTOCOLS = new Set(['http:', 'https:', 'ws:', 'wss:']);

/**
 * Reject RPC urls the provider could never connect to, before one is created
 */
export const validateRpcUrl = (rpcUrl: string): URL => {
  if (rpcUrl.trim() === '') {
    throw new ConnectionError('RPC url is empty', rpcUrl);
  }

  let url: URL;
  try {
    url = new URL(rpcUrl);
  } catch (error) {
    throw new ConnectionError(`RPC url is not a valid URL: ${rpcUrl}`, rpcUrl, error);
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol)) {
    throw new ConnectionError(`Unsupported RPC protocol ${url.protocol} (expected http(s) or ws(s))`, rpcUrl);
  }
  return url;
};

/**
 * Wait for the endpoint to report its chain id and check it against the configured chain.
 * On any failure the provider is destroyed before the ConnectionError propagates.
 */
export const verifyConnection = async (
  provider: RpcConnection,
  rpcUrl: string,
  expectedChainId: number,
  timeoutMs: number,
): Promise<bigint> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ConnectionError(`RPC endpoint did not answer within ${timeoutMs}ms`, rpcUrl)),
      timeoutMs,
    );
  });

  try {
    const network = await Promise.race([provider.getNetwork(), timeout]);
    if (network.chainId !== BigInt(expectedChainId)) {
      throw new ConnectionError(
        `RPC endpoint serves chain ${network.chainId}, expected ${expectedChainId}`,
        rpcUrl,
      );
    }
    return network.chainId;
  } catch (error) {
    provider.destroy();
    logger.error('RPC connection check failed', { error: toErrorMessage(error) });
    if (error instanceof ConnectionError) throw error;
    throw new ConnectionError(`Cannot reach RPC endpoint: ${toErrorMessage(error)}`, rpcUrl, error);
  } finally {
    clearTimeout(timer);
  }
};
