/**
 * Express REST API Server
 * Provides the test case collection endpoints and a health check
 */

import express, { type Express, type Request, type Response, type NextFunction } from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import type { DatabaseManager } from '../storage/sqlite.js';
import type { TestCaseStore } from '../storage/test-case-store.js';
import {
  BadRequestError,
  DuplicateKeyError,
  StorageError,
  ValidationError,
  type StorageOperation,
} from '../errors.js';
import {
  normalizePlatform,
  validateBatch,
  validatePatch,
  validateTestCase,
} from '../schemas/test-case.js';
import type { FindFilter, ValidationResult } from '../types/index.js';
import { insertItems, updateItems, deleteKeys } from './payload.js';
import { logger, errorFields } from '../utils/logger.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[] | '*';
  /** Mount point of the test case routes */
  basePath: string;
}

export interface ServerDeps {
  db: DatabaseManager;
  store: TestCaseStore;
}

const STORAGE_MESSAGES: Record<StorageOperation, string> = {
  read: 'Database read error',
  write: 'Database write error',
  update: 'Database update error',
  delete: 'Database delete error',
  ping: 'Database unavailable',
};

function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new ValidationError(result.errors);
  }
  return result.value;
}

/**
 * Errors raised by express.json() carry a `type` such as 'entity.parse.failed'
 */
function isBodyParserError(err: Error): boolean {
  return 'type' in err && typeof err.type === 'string' && err.type.startsWith('entity.');
}

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private db: DatabaseManager;
  private store: TestCaseStore;

  constructor(deps: ServerDeps, config: Partial<ServerConfig> = {}) {
    this.config = {
      port: 5000,
      host: '0.0.0.0',
      corsOrigins: '*',
      basePath: '/api/v1',
      ...config,
    };
    this.db = deps.db;
    this.store = deps.store;

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  private getQueryAsString(query: unknown): string | undefined {
    const value = Array.isArray(query) ? query[0] : query;
    return typeof value === 'string' ? value : undefined;
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    this.app.use(cors({
      origin: this.config.corsOrigins,
    }));
    this.app.use(express.json());

    this.app.use((req: Request, res: Response, next: NextFunction) => {
      const startedAt = Date.now();
      res.on('finish', () => {
        logger.debug('http.request', {
          method: req.method,
          path: req.originalUrl,
          status: res.statusCode,
          duration_ms: Date.now() - startedAt,
        });
      });
      next();
    });
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Health check
    this.app.get('/health', (_req: Request, res: Response) => {
      try {
        this.db.ping();
        res.json({ status: 'ok' });
      } catch (error) {
        logger.warn('health.failed', errorFields(error));
        res.status(503).json({ status: 'unhealthy' });
      }
    });

    const router = express.Router();

    // List test cases, optionally by platform
    router.get('/test_cases', (req: Request, res: Response) => {
      const filter: FindFilter = {};
      const platform = req.query.platform;

      if (platform !== undefined && platform !== '') {
        const normalized = normalizePlatform(this.getQueryAsString(platform));
        if (!normalized) {
          return res.status(400).json({ error: 'Invalid platform value' });
        }
        filter.platform = normalized;
      }

      res.json({ test_cases: this.store.find(filter) });
    });

    // Add one or many test cases
    router.post('/test_cases', (req: Request, res: Response) => {
      const payload = insertItems(req.body);

      if (!payload.batch) {
        const record = unwrap(validateTestCase(payload.item));
        const result = this.store.insert([record]);
        return res.status(201).json({ ...result, vuln_id: record.vuln_id });
      }

      const records = unwrap(validateBatch(payload.items, validateTestCase));
      const result = this.store.insert(records);
      if (records.length === 1) {
        return res.status(201).json({ ...result, vuln_id: records[0].vuln_id });
      }
      res.status(201).json(result);
    });

    // Partially update one or many test cases
    router.put('/test_cases', (req: Request, res: Response) => {
      const payload = updateItems(req.body);

      const patches = payload.batch
        ? unwrap(validateBatch(payload.items, validatePatch))
        : [unwrap(validatePatch(payload.item))];
      res.json(this.store.batchUpdate(patches));
    });

    // Delete one or many test cases
    router.delete('/test_cases', (req: Request, res: Response) => {
      const keys = deleteKeys(req.body);
      res.json(this.store.delete(keys));
    });

    this.app.use(this.config.basePath, router);

    this.app.use((_req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    // Error handler
    this.app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (err instanceof ValidationError) {
        return res.status(400).json({ error: 'Validation failed', message: err.errors });
      }
      if (err instanceof BadRequestError) {
        return res.status(400).json({ error: err.message });
      }
      if (isBodyParserError(err)) {
        return res.status(400).json({ error: 'Invalid or missing JSON' });
      }
      if (err instanceof DuplicateKeyError) {
        return res.status(409).json({ error: 'Duplicate vuln_id detected', vuln_id: err.vulnId });
      }
      if (err instanceof StorageError) {
        logger.error('storage.error', { operation: err.operation, ...errorFields(err) });
        return res.status(500).json({ error: STORAGE_MESSAGES[err.operation] });
      }

      logger.error('api.error', errorFields(err));
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  getApp(): Express {
    return this.app;
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        logger.info('server.started', {
          url: `http://${this.config.host}:${this.config.port}`,
          base_path: this.config.basePath,
        });
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) {
      return;
    }

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) {
          reject(err);
        } else {
          logger.info('server.stopped');
          resolve();
        }
      });
    });
  }

  getPort(): number {
    return this.config.port;
  }
}
