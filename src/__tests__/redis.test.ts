import { describe, it, expect, afterEach } from 'vitest';
import { RedisService } from '@/config/redis';

describe('RedisService as a rate-limit counter', () => {
  // Порт 1 закрыт: соединение отклоняется, сервер не нужен
  const redis = new RedisService('redis://127.0.0.1:1');

  afterEach(async () => {
    await redis.close();
  });

  it('fails a command at once while the connection is down', async () => {
    const started = Date.now();

    await expect(redis.incr('rate_limit:test-client')).rejects.toThrow();

    expect(Date.now() - started).toBeLessThan(500);
  });

  it('fails expire the same way', async () => {
    await expect(redis.expire('rate_limit:test-client', 60)).rejects.toThrow();
  });
});
