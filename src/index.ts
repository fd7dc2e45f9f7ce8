#!/usr/bin/env node
/**
 * webhook-irc-bridge entry point
 *
 * Picks a run mode from the first argument.
 */

import { config } from 'dotenv';
import { dumpDefaultSettings, DEFAULT_SETTINGS_FILE } from './core/config.js';
import { createLogger } from './utils/logger.js';
import { NAME, VERSION } from './version.js';

config();

const logger = createLogger('Main');
const mode = process.argv[2] || 'serve';

async function main() {
  switch (mode) {
    case 'serve': {
      const { serve } = await import('./interfaces/webhook-server.js');
      await serve();
      break;
    }

    case 'dump-config':
      await dumpDefaultSettings(process.argv[3] || DEFAULT_SETTINGS_FILE);
      break;

    case 'version':
    case '-v':
    case '--version':
      logger.raw(`${NAME} ${VERSION}`);
      break;

    case 'help':
    case '-h':
    case '--help':
      logger.raw(`
${NAME} - relays GitHub webhook events to IRC channels

Usage: ${NAME} [mode]

Modes:
  serve               Start the webhook server and IRC connection (default)
  dump-config [path]  Write default settings to path (default: ${DEFAULT_SETTINGS_FILE})
  version             Print the version

Settings come from ${DEFAULT_SETTINGS_FILE} (or SETTINGS_FILE), overridden by
environment variables and .env. Set LOG_LEVEL=debug for verbose output.
`);
      break;

    default:
      logger.error(`Unknown mode: ${mode}`);
      logger.raw(`Use "${NAME} help" for usage information`);
      process.exit(1);
  }
}

main().catch((error) => {
  logger.error('Fatal error:', error);
  process.exit(1);
});
