import { config as loadEnv } from 'dotenv';
import path from 'path';
import { getErrorMessage } from '@sidecar-launcher/core';
import { getDesktopConfig, type DesktopConfig } from './config.js';
import { getAppRoot, getLogDir } from './paths.js';
import { runLauncher } from './launcher.js';
import {
  createLauncherLogger,
  getLogFileWriter,
  initializeLogFileWriter,
  shutdownLogFileWriter,
  type LogFileWriter,
} from './logging/index.js';

// Load .env file from app root
loadEnv({ path: path.join(getAppRoot(), '.env') });

process.on('uncaughtException', (error) => {
  // File only: the console may be the thing that failed
  getLogFileWriter()?.write('ERROR', 'main', `Uncaught exception: ${error.name}: ${error.message}`);
});

process.on('unhandledRejection', (reason) => {
  getLogFileWriter()?.write('ERROR', 'main', `Unhandled promise rejection: ${getErrorMessage(reason)}`);
});

function openLogFile(config: DesktopConfig): LogFileWriter | null {
  try {
    return initializeLogFileWriter(getLogDir(config.dataDir));
  } catch (err) {
    console.warn('[Main] File logging disabled:', getErrorMessage(err));
    return null;
  }
}

async function main(): Promise<number> {
  let config: DesktopConfig;
  try {
    config = getDesktopConfig();
  } catch (err) {
    console.error('[Main]', getErrorMessage(err));
    return 1;
  }

  const writer = openLogFile(config);
  const logger = createLauncherLogger({ writer, minLevel: 'info' });
  logger.info('Launcher starting', {
    platform: process.platform,
    arch: process.arch,
    nodeVersion: process.version,
    logFile: writer?.getCurrentLogPath(),
  });

  return runLauncher({ config, logger });
}

main().then(
  (code) => {
    shutdownLogFileWriter();
    process.exit(code);
  },
  (err) => {
    console.error('[Main] Launcher crashed:', err);
    shutdownLogFileWriter();
    process.exit(1);
  }
);
