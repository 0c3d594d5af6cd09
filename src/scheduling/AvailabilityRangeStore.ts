import { v4 as uuidv4 } from 'uuid';
import logger from '@/config/logger';
import { DateUtils } from '@/middleware/dateUtils';
import { NotFoundError, ValidationError } from '@/middleware/errorHandler';
import type { SchedulingStore } from '@/repositories/types';
import type { AvailabilityRange, NewAvailabilityRange } from '@/types';

export const MIN_INTERVAL_MINUTES = 5;
export const MAX_INTERVAL_MINUTES = 120;

export function validateRange(range: NewAvailabilityRange): void {
  const problems: string[] = [];

  if (!Number.isInteger(range.dayOfWeek) || range.dayOfWeek < 1 || range.dayOfWeek > 7) {
    problems.push('dayOfWeek must be between 1 (Monday) and 7 (Sunday)');
  }

  const startValid = DateUtils.isValidTime(range.startTime);
  const endValid = DateUtils.isValidTime(range.endTime);
  if (!startValid) problems.push('startTime must be in HH:MM format');
  if (!endValid) problems.push('endTime must be in HH:MM format');

  if (startValid && endValid && DateUtils.toMinutes(range.startTime) >= DateUtils.toMinutes(range.endTime)) {
    problems.push('startTime must be before endTime');
  }

  if (
    !Number.isInteger(range.intervalMinutes) ||
    range.intervalMinutes < MIN_INTERVAL_MINUTES ||
    range.intervalMinutes > MAX_INTERVAL_MINUTES
  ) {
    problems.push(`intervalMinutes must be a whole number between ${MIN_INTERVAL_MINUTES} and ${MAX_INTERVAL_MINUTES}`);
  }

  if (problems.length > 0) {
    throw new ValidationError('Invalid availability range', problems);
  }
}

/**
 * A professional's ordered list of recurring weekly ranges. Removing a range
 * leaves the slots it already generated in the inventory.
 */
export class AvailabilityRangeStore {
  constructor(private readonly store: SchedulingStore) {}

  async addRange(professionalId: string, range: NewAvailabilityRange): Promise<AvailabilityRange> {
    validateRange(range);

    const created = await this.store.withProfessional(professionalId, (repos) =>
      repos.ranges.append(professionalId, uuidv4(), {
        dayOfWeek: range.dayOfWeek,
        startTime: range.startTime,
        endTime: range.endTime,
        intervalMinutes: range.intervalMinutes,
      })
    );

    logger.info('Availability range added', { professionalId, rangeId: created.id, dayOfWeek: created.dayOfWeek });
    return created;
  }

  /** Removes the range at `index` of the ordered list (0-based). */
  async removeRange(professionalId: string, index: number): Promise<AvailabilityRange> {
    const removed = await this.store.withProfessional(professionalId, async (repos) => {
      const ranges = await repos.ranges.listByProfessional(professionalId);
      const target = Number.isInteger(index) ? ranges[index] : undefined;
      if (!target) {
        throw new NotFoundError(`Availability range #${index} not found`);
      }
      await repos.ranges.delete(professionalId, target.id);
      return target;
    });

    logger.info('Availability range removed', { professionalId, rangeId: removed.id, index });
    return removed;
  }

  async removeRangeById(professionalId: string, rangeId: string): Promise<void> {
    await this.store.withProfessional(professionalId, async (repos) => {
      const deleted = await repos.ranges.delete(professionalId, rangeId);
      if (!deleted) {
        throw new NotFoundError(`Availability range ${rangeId} not found`);
      }
    });

    logger.info('Availability range removed', { professionalId, rangeId });
  }

  async listRanges(professionalId: string): Promise<AvailabilityRange[]> {
    const professional = await this.store.professionals.findById(professionalId);
    if (!professional) {
      throw new NotFoundError(`Professional ${professionalId} not found`);
    }
    return this.store.ranges.listByProfessional(professionalId);
  }
}
