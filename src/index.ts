import { ConfigService } from './services/config';
import { Logger } from './utils/logger';
import { MonitorController } from './services/core/monitor';

async function main(): Promise<void> {
  let config: ConfigService;
  try {
    config = new ConfigService();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const env = config.getEnv();
  const logger = new Logger(env.LOG_FILE, { maxLogSizeMB: Number(env.LOG_MAX_SIZE_MB) || 10 });
  logger.info(`Using config file: ${env.CONFIG_PATH}`);

  const baseDirectory = process.argv[2] || env.BASE_DIR;
  if (!baseDirectory) {
    logger.error('No base directory given. Usage: file-sorter <base-directory> (or set BASE_DIR)');
    process.exit(1);
  }

  const monitor = new MonitorController(config.getConfig(), logger, {
    watchMode: env.WATCH_MODE,
    pollIntervalMs: Number(env.POLL_INTERVAL_MS) || 1000,
    writeStabilityMs: Number(env.WRITE_STABILITY_MS) || 0,
  });

  const shutdown = async (): Promise<void> => {
    console.log('\nShutting down...');
    await monitor.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  });

  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${error instanceof Error ? error.message : String(error)}`);
      process.exit(1);
    });
  });

  try {
    monitor.selectDirectory(baseDirectory);
    await monitor.start();
    console.log('Press Ctrl+C to stop');
  } catch (error) {
    logger.error(`Failed to start monitoring: ${error instanceof Error ? error.message : String(error)}`);
    await monitor.stop();
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
