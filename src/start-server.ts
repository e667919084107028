#!/usr/bin/env node

import { runCli } from './cli.js';
import { ConfigError, loadConfig, loadEnvFile } from './config.js';

async function main(): Promise<number> {
  loadEnvFile();
  try {
    return await runCli(process.argv.slice(2), { config: loadConfig() });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`[ERROR] ${error.message}`);
      return 2;
    }
    throw error;
  }
}

// Handle uncaught errors to prevent server crash
process.on('unhandledRejection', (reason) => {
  console.error('[CRITICAL] Unhandled promise rejection:', reason);
});

main()
  .then(code => process.exit(code))
  .catch(error => {
    console.error('Fatal error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
