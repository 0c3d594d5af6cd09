import logger from '@/config/logger';
import { getSchedulingConfig, type SchedulingConfig } from '@/config/scheduling';
import { DateUtils, systemClock } from '@/middleware/dateUtils';
import { ValidationError } from '@/middleware/errorHandler';
import type { SchedulingStore } from '@/repositories/types';
import type {
  AvailabilityRange,
  Clock,
  RegenerationOptions,
  RegenerationResult,
  SlotRecord,
} from '@/types';

type RangePattern = Pick<AvailabilityRange, 'id' | 'dayOfWeek' | 'startTime' | 'endTime' | 'intervalMinutes'>;

/**
 * Expands recurring weekly ranges into concrete slots.
 *
 * Every calendar day from the start of `windowStart` through `windowDays`
 * days later (both ends included) is matched against the ranges by ISO day
 * of week. A range contributes one slot per interval step that starts before
 * its end time. Wall-clock times skipped by a daylight-saving change are
 * left out. Only slots strictly after `now` are kept. The result is
 * ordered by time and holds each timestamp once; when two ranges produce the
 * same timestamp the earlier range in the list is recorded as its source.
 */
export function expandRanges(
  ranges: readonly RangePattern[],
  windowStart: Date,
  windowDays: number,
  now: Date
): SlotRecord[] {
  const seen = new Map<string, string | null>();
  const firstDay = DateUtils.getStartOfDay(windowStart);

  for (let offset = 0; offset <= windowDays; offset++) {
    const day = DateUtils.addDays(firstDay, offset);
    const dayOfWeek = DateUtils.dayOfWeek(day);

    for (const range of ranges) {
      if (range.dayOfWeek !== dayOfWeek) continue;

      for (const minutes of DateUtils.createTimeSlots(range.startTime, range.endTime, range.intervalMinutes)) {
        const startsAt = DateUtils.combine(day, minutes);
        if (startsAt === null || startsAt <= now) continue;

        const timeSlot = DateUtils.formatSlot(startsAt);
        if (!seen.has(timeSlot)) {
          seen.set(timeSlot, range.id);
        }
      }
    }
  }

  return [...seen.entries()]
    .map(([timeSlot, rangeId]) => ({ timeSlot, rangeId }))
    .sort((a, b) => a.timeSlot.localeCompare(b.timeSlot));
}

export class SlotGenerator {
  private readonly config: SchedulingConfig;

  constructor(
    private readonly store: SchedulingStore,
    private readonly clock: Clock = systemClock,
    config?: SchedulingConfig
  ) {
    this.config = config ?? getSchedulingConfig();
  }

  generateSlots(ranges: readonly RangePattern[], windowStart: Date, windowDays: number = this.config.windowDays): SlotRecord[] {
    this.assertWindow(windowDays);
    return expandRanges(ranges, windowStart, windowDays, this.clock());
  }

  /**
   * Materializes the professional's ranges into the slot inventory, starting
   * today. `additive` only adds; `replace` clears the inventory first, manual
   * slots included. Either way a timestamp held by a scheduled or confirmed
   * appointment is never put back.
   */
  async regenerate(professionalId: string, options: RegenerationOptions = {}): Promise<RegenerationResult> {
    const strategy = options.strategy ?? 'additive';
    const windowDays = options.windowDays ?? this.config.windowDays;
    this.assertWindow(windowDays);

    return this.store.withProfessional(professionalId, async (repos) => {
      const ranges = await repos.ranges.listByProfessional(professionalId);
      const now = this.clock();
      const generated = expandRanges(ranges, now, windowDays, now);

      const consumed = new Set(await repos.appointments.listLiveSlots(professionalId));
      const inventory = repos.inventory(professionalId);

      const removed = strategy === 'replace' ? await inventory.clear() : 0;

      let added = 0;
      for (const slot of generated) {
        if (consumed.has(slot.timeSlot)) continue;
        if (await inventory.addSlot(slot.timeSlot, slot.rangeId)) {
          added++;
        }
      }

      const totalSlots = (await inventory.list()).length;

      logger.info('Slots regenerated', {
        professionalId,
        strategy,
        ranges: ranges.length,
        generated: generated.length,
        added,
        removed,
        totalSlots
      });

      return { strategy, generated: generated.length, added, removed, totalSlots };
    });
  }

  private assertWindow(windowDays: number): void {
    if (!Number.isInteger(windowDays) || windowDays < 0 || windowDays > this.config.maxWindowDays) {
      throw new ValidationError(`windowDays must be a whole number between 0 and ${this.config.maxWindowDays}`);
    }
  }
}
