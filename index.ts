import logger, { moduleLogger } from './server/logger.js';
import {
  HOST,
  PORT,
  PROVIDER_API_KEY,
  PROVIDER_BASE_URL,
  PROVIDER_TIMEOUT_MS,
  STORE_GRANULARITIES,
  STORE_ROOT,
  SYNC_MAX_ATTEMPTS,
  SYNC_MIN_CALL_SPACING_MS,
  SYNC_THROTTLE_COOLDOWN_MS,
  validateStartupEnvironment,
} from './server/config.js';
import { buildApp, createDownloaders } from './server/app.js';
import { errorMessage } from './server/lib/errors.js';
import { withErrorClassification } from './server/services/dataProvider.js';
import { HttpDataProvider } from './server/services/httpDataProvider.js';
import { createLoggerStatusSink } from './server/services/statusSink.js';

try {
  validateStartupEnvironment();
} catch (err: unknown) {
  logger.fatal(errorMessage(err));
  process.exit(1);
}

const provider = withErrorClassification(
  new HttpDataProvider({ baseUrl: PROVIDER_BASE_URL, apiKey: PROVIDER_API_KEY, timeoutMs: PROVIDER_TIMEOUT_MS }),
);

const downloaders = createDownloaders(STORE_GRANULARITIES, {
  root: STORE_ROOT,
  provider,
  minCallSpacingMs: SYNC_MIN_CALL_SPACING_MS,
  throttleCooldownMs: SYNC_THROTTLE_COOLDOWN_MS,
  maxAttempts: SYNC_MAX_ATTEMPTS,
  statusSink: createLoggerStatusSink(moduleLogger('status')),
});

const app = buildApp({ downloaders, logLevel: process.env.LOG_LEVEL || 'info' });
let isShuttingDown = false;

async function shutdownServer(signal: string): Promise<void> {
  if (isShuttingDown) return;
  isShuttingDown = true;
  logger.info(`Received ${signal}; shutting down gracefully...`);

  // Stop in-flight syncs so they don't block shutdown
  for (const downloader of downloaders.values()) {
    downloader.cancel();
  }

  const forceExitTimer = setTimeout(() => {
    logger.error('Graceful shutdown timed out; forcing exit');
    process.exit(1);
  }, 15000);
  forceExitTimer.unref();

  try {
    await app.close();
    logger.info('Shutdown complete');
    clearTimeout(forceExitTimer);
    process.exit(0);
  } catch (err: unknown) {
    logger.error(`Graceful shutdown failed: ${errorMessage(err)}`);
    clearTimeout(forceExitTimer);
    process.exit(1);
  }
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
});
process.on('SIGINT', () => {
  void shutdownServer('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdownServer('SIGTERM');
});

try {
  await app.listen({ port: PORT, host: HOST });
  logger.info(`Store control server running on ${HOST}:${PORT} (root ${STORE_ROOT}, stores: ${STORE_GRANULARITIES.join(', ')})`);
} catch (err: unknown) {
  logger.fatal(`Failed to start server: ${errorMessage(err)}`);
  process.exit(1);
}
