#!/usr/bin/env node
/**
 * Vulnerability Test Case API - Main Entry Point
 * Provides CLI for starting the server and loading sample data
 */

import { loadConfig, type AppConfig } from './config.js';
import { ApiServer } from './server/express.js';
import { DatabaseManager, TestCaseStore } from './storage/index.js';
import { seedFromFile } from './seed.js';
import { logger, errorFields } from './utils/logger.js';

function printHelp(): void {
  console.log(`
Vulnerability Test Case API

Usage: vulncase-api [command] [options]

Commands:
  serve     Start the REST API server (default)
  seed      Load sample test cases into the database
  help      Show this help message

Options:
  -p, --port <port>   Server port (default: 5000, env PORT)
  --host <host>       Bind address (default: 0.0.0.0, env HOST)
  --db <path>         SQLite database file (default: ./data/test_cases.db, env DB_PATH)
  --file <path>       Sample file for seed (default: ./sample/test_cases.json, env SAMPLE_FILE)
  -h, --help          Show help

Environment:
  CORS_ORIGINS        Comma-separated allowed origins (default: *)
  LOG_LEVEL           debug | info | warn | error | silent (default: info)
`);
}

// ============================================
// Commands
// ============================================

function openDatabase(config: AppConfig): DatabaseManager {
  const db = new DatabaseManager({ path: config.dbPath });
  db.initialize();
  return db;
}

async function runSeed(config: AppConfig): Promise<void> {
  const db = openDatabase(config);
  try {
    const summary = await seedFromFile(new TestCaseStore(db), config.sampleFile);
    console.log(`Inserted ${summary.inserted}, skipped ${summary.skipped} existing, ${summary.invalid} invalid`);
  } finally {
    db.close();
  }
}

async function runServe(config: AppConfig): Promise<void> {
  const db = openDatabase(config);
  const server = new ApiServer(
    { db, store: new TestCaseStore(db) },
    { port: config.port, host: config.host, corsOrigins: config.corsOrigins }
  );

  const shutdown = (signal: string): void => {
    logger.info('server.shutdown', { signal });
    server.stop()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('server.shutdown_failed', errorFields(error));
        db.close();
        process.exit(1);
      });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await server.start();
}

// ============================================
// Main
// ============================================

async function main(): Promise<void> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);

  switch (config.command) {
    case 'help':
      printHelp();
      break;

    case 'seed':
      await runSeed(config);
      break;

    case 'serve':
      await runServe(config);
      break;
  }
}

main().catch((error: unknown) => {
  logger.error('startup.failed', errorFields(error));
  process.exit(1);
});
