/**
 * Configuration resolution
 * Priority: CLI flag > environment variable > default
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export type Command = 'serve' | 'seed' | 'help';

export interface AppConfig {
  command: Command;
  port: number;
  host: string;
  dbPath: string;
  corsOrigins: string[] | '*';
  logLevel: LogLevel;
  sampleFile: string;
}

const DEFAULTS = {
  port: 5000,
  host: '0.0.0.0',
  dbPath: './data/test_cases.db',
  sampleFile: './sample/test_cases.json',
} as const;

const ConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535),
  host: z.string().min(1),
  dbPath: z.string().min(1),
  corsOrigins: z.string(),
  logLevel: z.enum(LOG_LEVELS),
  sampleFile: z.string().min(1),
});

interface CliArgs {
  command: Command;
  port?: string;
  host?: string;
  dbPath?: string;
  sampleFile?: string;
}

function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { command: 'serve' };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === 'serve' || arg === 'seed' || arg === 'help') {
      result.command = arg;
    } else if (arg === '--port' || arg === '-p') {
      result.port = argv[++i];
    } else if (arg === '--host') {
      result.host = argv[++i];
    } else if (arg === '--db') {
      result.dbPath = argv[++i];
    } else if (arg === '--file') {
      result.sampleFile = argv[++i];
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function parseOrigins(value: string): string[] | '*' {
  const origins = value.split(',').map((origin) => origin.trim()).filter(Boolean);
  return origins.length === 0 || origins.includes('*') ? '*' : origins;
}

/**
 * Resolve configuration from CLI arguments (without node and script) and the environment
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  const args = parseArgs(argv);

  const parsed = ConfigSchema.safeParse({
    port: args.port ?? env.PORT ?? DEFAULTS.port,
    host: args.host ?? env.HOST ?? DEFAULTS.host,
    dbPath: args.dbPath ?? env.DB_PATH ?? DEFAULTS.dbPath,
    corsOrigins: env.CORS_ORIGINS ?? '*',
    logLevel: env.LOG_LEVEL ?? 'info',
    sampleFile: args.sampleFile ?? env.SAMPLE_FILE ?? DEFAULTS.sampleFile,
  });

  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join(', ')}`);
  }

  const config = parsed.data;
  return {
    command: args.command,
    port: config.port,
    host: config.host,
    dbPath: config.dbPath === ':memory:' ? config.dbPath : path.resolve(config.dbPath),
    corsOrigins: parseOrigins(config.corsOrigins),
    logLevel: config.logLevel,
    sampleFile: path.resolve(config.sampleFile),
  };
}
