/**
 * Accent Detector — Entry Point
 */

import dotenv from 'dotenv';
// Load .env — fill only env vars that are unset or empty in the shell
const _dotenvResult = dotenv.config();
if (_dotenvResult.parsed) {
  for (const [k, v] of Object.entries(_dotenvResult.parsed)) {
    if (process.env[k] === '' || process.env[k] === undefined) process.env[k] = v;
  }
}

import { join } from 'path';
import { loadConfig, type AppConfig } from './core/config.js';
import { ConfigurationError } from './core/errors.js';
import { createOrchestrator } from './orchestrator/bootstrap.js';
import { createServer } from './api/server.js';
import { createLogger } from './services/logger.js';

const VERSION = process.env.npm_package_version ?? '0.3.0';

let config: AppConfig;
try {
  config = loadConfig(process.env);
} catch (err) {
  if (err instanceof ConfigurationError) {
    console.error(`❌ ${err.message}`);
    console.error('   Set ASSEMBLYAI_API_KEY in the environment or in .env');
    process.exit(1);
  }
  throw err;
}

const logger = createLogger(join(config.dataDir, 'logs'), config.logLevel);

const orchestrator = await createOrchestrator(config, logger);

const { server } = createServer(orchestrator, config.port, {
  dataDir: config.dataDir,
  logger,
  version: VERSION,
});

// Graceful shutdown
const shutdown = () => {
  logger.info('Shutting down');
  server.close(() => {
    logger.info('Shutdown complete');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
