#!/usr/bin/env node

/**
 * Main server file for the announce proxy
 *
 * Usage:
 *   npm run build && npm start
 *
 * Then point the torrent client's HTTP proxy at localhost:LISTEN_PORT.
 */

import { Config, loadConfig } from '../../config';
import { ConfigInvalidError } from '../../domain/errors';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { UpdateChecker } from '../../infrastructure/update/UpdateChecker';
import { ByteFormatter } from '../../utils/ByteFormatter';
import { VERSION } from '../../version';
import { createApp } from './app';
import { createProxyDependencies } from './composition';
import { describeStartup } from './banner';

let config: Config;
try {
  config = loadConfig(process.env);
} catch (error) {
  if (error instanceof ConfigInvalidError) {
    console.error(error.message);
    process.exit(1);
  }
  throw error;
}

const logger = new CompositeLogger({ logFile: config.LOG_FILE, retentionDays: config.LOG_RETENTION_DAYS });

(async () => {
  const deps = createProxyDependencies(config, logger);
  const app = createApp(deps);

  const server = app.listen(config.LISTEN_PORT, config.LISTEN_HOST, () => {
    for (const line of describeStartup(config, VERSION, logger.logFile)) {
      logger.info(line);
    }
  });

  server.on('error', (error) => {
    logger.error('Proxy listener failed:', error);
    void logger.close().then(() => process.exit(1));
  });

  const updateChecker = new UpdateChecker(config.UPDATE_CHECK_URL, VERSION, logger);
  void updateChecker.check();

  // Process termination handling
  const shutdown = (): void => {
    logger.info('Stopping proxy...');
    server.close();
    const stats = deps.torrentStore.stats();
    logger.info(
      `Tracked ${stats.trackedTorrents} torrents | ` +
      `Downloaded: ${ByteFormatter.toHumanReadable(stats.aggregateRealDownloaded)} | ` +
      `Reported Upload: ${ByteFormatter.toHumanReadable(stats.aggregateFakeUploaded)}`
    );
    void logger.close().then(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
})().catch((error) => {
  logger.error('Failed to start proxy:', error);
  process.exit(1);
});
