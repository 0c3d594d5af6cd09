import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import dotenv from 'dotenv';
import { createServer, Server as HttpServer } from 'http';

import { DatabaseService } from '@/config/database';
import { RedisService } from '@/config/redis';
import logger from '@/config/logger';

import { createApiRouter } from '@/controllers/api';
import { createError, errorHandler } from '@/middleware/errorHandler';
import { createRateLimiter, getRateLimitOptionsFromEnv, type RateLimitCounter } from '@/middleware/rateLimiter';
import { systemClock } from '@/middleware/dateUtils';
import { InMemorySchedulingStore } from '@/repositories/InMemorySchedulingStore';
import { PostgresSchedulingStore } from '@/repositories/PostgresSchedulingStore';
import type { SchedulingStore } from '@/repositories/types';
import { createSchedulingServices } from '@/scheduling';
import type { Clock } from '@/types';

dotenv.config();

type StoreDriver = 'postgres' | 'memory';

export interface ServerOptions {
  store?: SchedulingStore;
  clock?: Clock;
  /** Counter behind the /api rate limiter; Redis when omitted. */
  rateLimitCounter?: RateLimitCounter;
}

interface HealthCheckResult {
  status: 'healthy' | 'degraded' | 'unhealthy';
  store: { driver: StoreDriver; ok: boolean };
  redis: boolean;
  uptime: number;
  timestamp: string;
}

class Server {
  private readonly app: express.Express;
  private readonly httpServer: HttpServer;
  private readonly port: number;
  private readonly driver: StoreDriver;
  private readonly store: SchedulingStore;
  private readonly redis: RedisService;
  private isShuttingDown = false;

  constructor(options: ServerOptions = {}) {
    const clock = options.clock ?? systemClock;

    this.app = express();
    this.httpServer = createServer(this.app);
    this.port = parseInt(process.env.PORT || '3000');
    this.driver = options.store instanceof InMemorySchedulingStore || process.env.STORE_DRIVER === 'memory'
      ? 'memory'
      : 'postgres';
    this.store = options.store ?? this.createStore(clock);
    this.redis = RedisService.getInstance();

    this.setupMiddleware(options.rateLimitCounter);
    this.setupRoutes(clock);
    this.app.use(errorHandler);
  }

  private setupMiddleware(rateLimitCounter?: RateLimitCounter): void {
    // JSON API: HTML-oriented CSP не нужен
    this.app.use(helmet({ contentSecurityPolicy: false }));

    this.app.use(cors({
      origin: this.getCorsOrigins(),
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key']
    }));

    this.app.use(compression());

    this.app.use(morgan(process.env.NODE_ENV === 'production' ? 'combined' : 'dev', {
      stream: {
        write: (message: string) => logger.info(message.trim())
      },
      skip: (req: express.Request) => req.url === '/health' || req.url === '/ready'
    }));

    this.app.use(express.json({ limit: '100kb' }));

    this.app.use('/api/', createRateLimiter({
      ...getRateLimitOptionsFromEnv(),
      counter: rateLimitCounter
    }));

    this.app.use((req: express.Request, res: express.Response, next: express.NextFunction) => {
      const timeout = parseInt(process.env.REQUEST_TIMEOUT || '30000');
      req.setTimeout(timeout, () => {
        next(createError('Request timeout', 408, 'REQUEST_TIMEOUT'));
      });
      next();
    });
  }

  private setupRoutes(clock: Clock): void {
    this.app.get('/', (req: express.Request, res: express.Response): void => {
      res.json({
        service: 'clinic-slots-api',
        version: process.env.npm_package_version || '1.0.0',
        status: 'running',
        timestamp: clock().toISOString()
      });
    });

    this.app.get('/health', async (req: express.Request, res: express.Response): Promise<void> => {
      const health = await this.performHealthCheck(clock);
      res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
    });

    this.app.get('/ready', (req: express.Request, res: express.Response): void => {
      if (this.isShuttingDown) {
        res.status(503).json({ status: 'shutting down' });
      } else {
        res.json({ status: 'ready' });
      }
    });

    this.app.use('/api/v1', createApiRouter(createSchedulingServices(this.store, clock)));

    this.app.use((req: express.Request, res: express.Response): void => {
      res.status(404).json({
        success: false,
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          path: req.originalUrl,
          method: req.method
        },
        timestamp: clock().toISOString()
      });
    });
  }

  // Без хранилища сервис не работает; без Redis работает, но без rate limit
  private async performHealthCheck(clock: Clock): Promise<HealthCheckResult> {
    const [storeOk, redisOk] = await Promise.all([
      this.store.healthCheck().catch((error: unknown) => {
        logger.error('Store health check failed:', error);
        return false;
      }),
      this.redis.healthCheck()
    ]);

    return {
      status: !storeOk ? 'unhealthy' : redisOk ? 'healthy' : 'degraded',
      store: { driver: this.driver, ok: storeOk },
      redis: redisOk,
      uptime: Math.floor(process.uptime()),
      timestamp: clock().toISOString()
    };
  }

  private getCorsOrigins(): string | string[] {
    const origins = process.env.CORS_ORIGIN;

    if (!origins || origins === '*') {
      return '*';
    }

    return origins.split(',').map(origin => origin.trim());
  }

  private registerProcessHandlers(): void {
    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled Promise Rejection:', { reason });
    });

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught Exception:', error);
      void this.gracefulShutdown(1);
    });

    for (const signal of ['SIGTERM', 'SIGINT'] as const) {
      process.on(signal, () => {
        logger.info(`${signal} received`);
        void this.gracefulShutdown(0);
      });
    }
  }

  async start(): Promise<void> {
    try {
      this.validateEnvironment();
      this.registerProcessHandlers();

      if (!(await this.store.healthCheck())) {
        throw new Error(`Store connection failed (${this.driver})`);
      }
      if (this.store instanceof PostgresSchedulingStore) {
        const applied = await DatabaseService.getInstance().runMigrations();
        if (applied.length > 0) {
          logger.info(`Applied migrations: ${applied.join(', ')}`);
        }
      }
      logger.info(`Store ready (${this.driver})`);

      if (!(await this.redis.healthCheck())) {
        logger.warn('Redis unavailable, rate limiting is disabled until it comes back');
      }

      await new Promise<void>((resolve, reject) => {
        this.httpServer.once('error', (error: NodeJS.ErrnoException) => {
          if (error.code === 'EADDRINUSE') {
            logger.error(`Port ${this.port} is already in use`);
          }
          reject(error);
        });
        this.httpServer.listen(this.port, '0.0.0.0', () => resolve());
      });

      this.httpServer.keepAliveTimeout = 65000;
      this.httpServer.headersTimeout = 66000;

      logger.info(`Server listening on port ${this.port} (${process.env.NODE_ENV || 'development'})`);
    } catch (error) {
      logger.error('Failed to start server:', error);
      await this.gracefulShutdown(1);
    }
  }

  private validateEnvironment(): void {
    const required = this.driver === 'postgres'
      ? ['DATABASE_URL', 'JWT_SECRET']
      : ['JWT_SECRET'];

    const missing = required.filter(key => !process.env[key]);
    if (missing.length > 0) {
      throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
    }

    const recommended = ['REDIS_URL', 'API_KEY', 'CORS_ORIGIN'].filter(key => !process.env[key]);
    if (recommended.length > 0) {
      logger.warn(`Missing recommended environment variables: ${recommended.join(', ')}`);
    }
  }

  /** Stops accepting requests and closes the store and Redis. */
  async stop(): Promise<void> {
    this.isShuttingDown = true;

    if (this.httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        this.httpServer.close(error => (error ? reject(error) : resolve()));
      });
    }

    await Promise.all([
      this.store.close().catch((error: unknown) => {
        logger.error('Error closing store:', error);
      }),
      this.redis.close().catch((error: unknown) => {
        logger.error('Error closing Redis:', error);
      })
    ]);
  }

  private async gracefulShutdown(exitCode: number): Promise<void> {
    if (this.isShuttingDown) {
      logger.warn('Shutdown already in progress...');
      return;
    }

    logger.info('Starting graceful shutdown...');

    const timer = setTimeout(() => {
      logger.error('Shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, parseInt(process.env.SHUTDOWN_TIMEOUT || '10000'));

    try {
      await this.stop();
      logger.info('Graceful shutdown completed');
    } catch (error) {
      logger.error('Error during shutdown:', error);
      exitCode = 1;
    } finally {
      clearTimeout(timer);
    }
    process.exit(exitCode);
  }

  private createStore(clock: Clock): SchedulingStore {
    if (this.driver === 'memory') {
      logger.warn('Using the in-memory store: data is lost on restart');
      return new InMemorySchedulingStore(clock);
    }
    return new PostgresSchedulingStore(DatabaseService.getInstance());
  }

  public getApp(): express.Express {
    return this.app;
  }
}

export { Server };

if (require.main === module) {
  void new Server().start();
}
