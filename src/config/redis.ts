import { createClient } from 'redis';
import logger from './logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisService {
  private client: RedisClient;
  private static instance: RedisService;

  constructor(url: string = process.env.REDIS_URL || 'redis://localhost:6379') {
    this.client = createClient({
      url,
      // Команды без соединения сразу падают, а не ждут в очереди переподключений
      disableOfflineQueue: true,
      socket: {
        connectTimeout: 2000,
        reconnectStrategy: (retries: number, cause: Error) => {
          if (retries > 10) {
            logger.error('Redis retry limit exhausted', { cause: cause.message });
            return new Error('Retry limit exhausted');
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });

    this.setupEventListeners();
  }

  public static getInstance(): RedisService {
    if (!RedisService.instance) {
      RedisService.instance = new RedisService();
    }
    return RedisService.instance;
  }

  private setupEventListeners(): void {
    this.client.on('connect', () => {
      logger.info('Redis client connected');
    });

    this.client.on('error', (err: Error) => {
      logger.error('Redis client error:', err);
    });

    this.client.on('ready', () => {
      logger.info('Redis client ready');
    });
  }

  async connect(): Promise<void> {
    if (!this.client.isOpen) {
      await this.client.connect();
    }
  }

  // Запускает подключение в фоне; запрос, пришедший до готовности, получит ошибку
  private ensureConnecting(): void {
    if (!this.client.isOpen) {
      this.client.connect().catch((error: Error) => {
        logger.warn('Redis connection attempt failed', { error: error.message });
      });
    }
  }

  async incr(key: string): Promise<number> {
    this.ensureConnecting();
    return await this.client.incr(key);
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    this.ensureConnecting();
    return await this.client.expire(key, seconds);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.connect();
      await this.client.ping();
      return true;
    } catch (error) {
      logger.error('Redis health check failed:', error);
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.client.isReady) {
      await this.client.quit();
    } else if (this.client.isOpen) {
      await this.client.disconnect();
    }
  }
}
