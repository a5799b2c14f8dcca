/**
 * Watch the configured account's GMX positions
 * Logs the current positions and collateral balances, then every position change until Ctrl+C
 */

import { GmxClient } from '../client/GmxClient';
import { loadConfig } from '../config';
import { toErrorMessage } from '../errors';
import { balanceToJSON } from '../services/balances';
import { positionToJSON } from '../services/gmx/positionDiff';
import { logger } from '../utils/logger';

async function main(): Promise<void> {
  const config = loadConfig();
  const client = await GmxClient.connect(config);

  const positions = await client.getMyPositions();
  logger.info(`Open positions: ${positions.length}`, { positions: positions.map(positionToJSON) });

  const report = await client.getMyCollateralBalanceReport();
  logger.info('Collateral balances', {
    balances: report.balances.map(balanceToJSON),
    failures: report.failures,
  });

  const poller = client.pollMyPositions();

  process.on('SIGINT', () => {
    logger.info('🛑 Stopping position watcher...');
    client.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to close client', { error: toErrorMessage(error) });
        process.exit(1);
      },
    );
  });

  await poller.start((change) => {
    logger.info('Positions changed', {
      round: change.round,
      added: change.added.map(positionToJSON),
      removed: change.removed.map(positionToJSON),
      modified: change.modified,
    });
  });

  await client.close();
}

main().catch((error: unknown) => {
  logger.error('Fatal error:', { error: toErrorMessage(error) });
  process.exit(1);
});
