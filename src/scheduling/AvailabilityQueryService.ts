import { DateUtils, systemClock } from '@/middleware/dateUtils';
import { NotFoundError, ValidationError } from '@/middleware/errorHandler';
import type { SchedulingStore } from '@/repositories/types';
import type { AvailabilityStats, Clock, Professional } from '@/types';

/**
 * Read-only views over the slot inventory. Slot strings share one fixed
 * format, so comparing them as strings orders them in time.
 */
export class AvailabilityQueryService {
  constructor(
    private readonly store: SchedulingStore,
    private readonly clock: Clock = systemClock
  ) {}

  async listSlots(professionalId: string): Promise<string[]> {
    await this.requireProfessional(professionalId);
    const slots = await this.store.inventory(professionalId).list();
    return slots.map(slot => slot.timeSlot);
  }

  async stats(professionalId: string): Promise<AvailabilityStats> {
    const slots = await this.listSlots(professionalId);
    const now = DateUtils.formatSlot(this.clock());

    const future = slots.filter(slot => slot > now);
    const dates = new Set(future.map(slot => DateUtils.slotDate(slot)));

    return {
      totalSlots: slots.length,
      futureSlots: future.length,
      pastSlots: slots.length - future.length,
      datesWithAvailability: dates.size,
      averageSlotsPerDay: dates.size > 0
        ? Math.round(future.length / dates.size * 10) / 10
        : 0,
      nextAvailableSlot: future.length > 0 ? future.reduce((min, slot) => slot < min ? slot : min) : null,
    };
  }

  async nextAvailableSlot(professionalId: string): Promise<string | null> {
    return (await this.stats(professionalId)).nextAvailableSlot;
  }

  /** Every slot on `date` (YYYY-MM-DD), past ones included. */
  async slotsForDate(professionalId: string, date: string): Promise<string[]> {
    if (!DateUtils.isValidDate(date)) {
      throw new ValidationError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const slots = await this.listSlots(professionalId);
    return slots.filter(slot => DateUtils.slotDate(slot) === date);
  }

  /** Slots between `start` and `end`, both inclusive. */
  async slotsForRange(professionalId: string, start: Date, end: Date): Promise<string[]> {
    if (start > end) {
      throw new ValidationError('Range start must not be after its end');
    }
    const from = DateUtils.formatSlot(start);
    const to = DateUtils.formatSlot(end);
    const slots = await this.listSlots(professionalId);
    return slots.filter(slot => slot >= from && slot <= to);
  }

  async isSlotAvailable(professionalId: string, timestamp: string): Promise<boolean> {
    if (!DateUtils.isValidSlot(timestamp)) {
      throw new ValidationError(`Invalid time slot "${timestamp}", expected YYYY-MM-DDTHH:mm:ss`);
    }
    await this.requireProfessional(professionalId);

    const timeSlot = DateUtils.normalizeSlot(timestamp);
    if (timeSlot <= DateUtils.formatSlot(this.clock())) {
      return false;
    }
    return this.store.inventory(professionalId).contains(timeSlot);
  }

  async professionalsWithAvailability(): Promise<Professional[]> {
    return this.store.professionals.findWithSlotsAfter(DateUtils.formatSlot(this.clock()));
  }

  private async requireProfessional(professionalId: string): Promise<Professional> {
    const professional = await this.store.professionals.findById(professionalId);
    if (!professional) {
      throw new NotFoundError(`Professional ${professionalId} not found`);
    }
    return professional;
  }
}
