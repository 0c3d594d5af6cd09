import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import express from 'express';
import {
  SlotAlreadyBookedError,
  ValidationError,
  asyncHandler,
  errorHandler
} from '@/middleware/errorHandler';
import { listen, type RunningApp } from './support';

describe('errorHandler', () => {
  let running: RunningApp;
  const originalEnv = process.env.NODE_ENV;

  beforeAll(async () => {
    const app = express();
    app.get('/validation', asyncHandler(async () => {
      throw new ValidationError('Invalid availability range', ['startTime must be before endTime']);
    }));
    app.get('/conflict', asyncHandler(async () => {
      throw new SlotAlreadyBookedError('2024-06-03T09:00:00');
    }));
    app.get('/crash', asyncHandler(async () => {
      throw new Error('connection reset by peer');
    }));
    app.use(errorHandler);
    running = await listen(app);
  });

  afterAll(async () => {
    await running.close();
  });

  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
  });

  const get = async (path: string) => {
    const response = await fetch(`${running.baseUrl}${path}`);
    return { status: response.status, body: await response.json() };
  };

  it('maps application errors to their status and code', async () => {
    const { status, body } = await get('/validation');

    expect(status).toBe(400);
    expect(body).toMatchObject({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid availability range',
        details: ['startTime must be before endTime']
      }
    });
  });

  it('reports a slot conflict as 409', async () => {
    const { status, body } = await get('/conflict');

    expect(status).toBe(409);
    expect(body).toMatchObject({
      error: {
        code: 'SLOT_ALREADY_BOOKED',
        message: 'This slot was just taken. Please pick another time.',
        details: { timeSlot: '2024-06-03T09:00:00' }
      }
    });
  });

  it('turns unexpected errors into a 500', async () => {
    const { status, body } = await get('/crash');

    expect(status).toBe(500);
    expect(body).toMatchObject({
      error: { code: 'INTERNAL_ERROR', message: 'connection reset by peer' }
    });
  });

  it('hides internal messages in production', async () => {
    process.env.NODE_ENV = 'production';

    const { body } = await get('/crash');

    expect(body).toMatchObject({
      error: { code: 'INTERNAL_ERROR', message: 'Internal server error' }
    });
  });
});
