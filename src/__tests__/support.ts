import { afterAll, beforeAll } from 'vitest';
import express, { Express } from 'express';
import type { AddressInfo } from 'net';
import jwt from 'jsonwebtoken';
import { createApiRouter } from '@/controllers/api';
import { errorHandler } from '@/middleware/errorHandler';
import { InMemorySchedulingStore } from '@/repositories/InMemorySchedulingStore';
import { createSchedulingServices, type SchedulingServices } from '@/scheduling';
import type { Clock, Professional, UserRole } from '@/types';

export const PROFESSIONAL_ID = '5f0c3a57-2f59-4a4e-9d58-0d4a3c1b7e21';
export const OTHER_PROFESSIONAL_ID = '8d7e2b1a-4c3f-4e5d-a6b7-c8d9e0f1a2b3';

/** Monday, 3 June 2024, 08:00 local time. */
export const MONDAY_8AM = new Date(2024, 5, 3, 8, 0, 0);

/**
 * Runs the enclosing describe block in another time zone. Needs the forks
 * pool: Node only re-reads TZ for the real process environment.
 */
export function useTimeZone(zone: string): void {
  const original = process.env.TZ;

  beforeAll(() => {
    process.env.TZ = zone;
  });

  afterAll(() => {
    if (original === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = original;
    }
  });
}

export interface TestClock {
  clock: Clock;
  set(date: Date): void;
}

export function createTestClock(start: Date = MONDAY_8AM): TestClock {
  let current = start;
  return {
    clock: () => current,
    set: (date: Date) => {
      current = date;
    }
  };
}

export function makeProfessional(overrides: Partial<Professional> = {}): Professional {
  return {
    id: PROFESSIONAL_ID,
    userId: 'user-dr-ivanova',
    name: 'Dr. Ivanova',
    specialization: 'Cardiology',
    consultationFee: 2500,
    isActive: true,
    ...overrides
  };
}

export interface TestContext extends SchedulingServices {
  memory: InMemorySchedulingStore;
  time: TestClock;
}

export function createTestContext(time: TestClock = createTestClock()): TestContext {
  const memory = new InMemorySchedulingStore(time.clock);
  memory.addProfessional(makeProfessional());
  memory.addProfessional(makeProfessional({
    id: OTHER_PROFESSIONAL_ID,
    userId: 'user-dr-petrov',
    name: 'Dr. Petrov',
    specialization: 'Dermatology',
    consultationFee: null
  }));

  const services = createSchedulingServices(memory, time.clock, { windowDays: 28, maxWindowDays: 180 });
  return { ...services, memory, time };
}

/** Monday 09:00-10:00 every 30 minutes. */
export const MONDAY_MORNING = {
  dayOfWeek: 1,
  startTime: '09:00',
  endTime: '10:00',
  intervalMinutes: 30
};

export function tokenFor(sub: string, role: UserRole, professionalId?: string): string {
  const claims = professionalId ? { sub, role, professionalId } : { sub, role };
  return jwt.sign(claims, 'test-secret', { expiresIn: '1h' });
}

export function buildApp(services: SchedulingServices): Express {
  const app = express();
  app.use(express.json());
  app.use('/api/v1', createApiRouter(services));
  app.use(errorHandler);
  return app;
}

export interface RunningApp {
  baseUrl: string;
  close(): Promise<void>;
}

export function listen(app: Express): Promise<RunningApp> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Test server has no TCP address'));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () => new Promise<void>((done, fail) => {
          server.close(error => (error ? fail(error) : done()));
        })
      });
    });
  });
}
