import { describe, it, expect, beforeEach } from 'vitest';
import { expandRanges } from '@/scheduling/SlotGenerator';
import { NotFoundError, ValidationError } from '@/middleware/errorHandler';
import type { DayOfWeek } from '@/types';
import {
  MONDAY_8AM,
  MONDAY_MORNING,
  PROFESSIONAL_ID,
  createTestContext,
  useTimeZone,
  type TestContext
} from './support';

function range(id: string, dayOfWeek: DayOfWeek, startTime: string, endTime: string, intervalMinutes: number) {
  return { id, dayOfWeek, startTime, endTime, intervalMinutes };
}

const slotsOf = (records: { timeSlot: string }[]) => records.map(record => record.timeSlot);

describe('expandRanges', () => {
  it('excludes the end boundary of a range', () => {
    const slots = expandRanges([range('r1', 1, '09:00', '10:00', 30)], MONDAY_8AM, 0, MONDAY_8AM);

    expect(slots).toEqual([
      { timeSlot: '2024-06-03T09:00:00', rangeId: 'r1' },
      { timeSlot: '2024-06-03T09:30:00', rangeId: 'r1' }
    ]);
  });

  it('drops slots that are not strictly after now', () => {
    const now = new Date(2024, 5, 3, 9, 0, 0);
    const slots = expandRanges([range('r1', 1, '09:00', '10:00', 30)], now, 0, now);

    expect(slotsOf(slots)).toEqual(['2024-06-03T09:30:00']);
  });

  it('still produces later matching days when today\'s slots have elapsed', () => {
    const now = new Date(2024, 5, 3, 10, 30, 0);
    const slots = expandRanges([range('r1', 1, '09:00', '10:00', 30)], now, 7, now);

    expect(slotsOf(slots)).toEqual(['2024-06-10T09:00:00', '2024-06-10T09:30:00']);
  });

  it('covers the whole window, both ends included', () => {
    const slots = expandRanges([range('r1', 1, '09:00', '09:30', 30)], MONDAY_8AM, 7, MONDAY_8AM);

    expect(slotsOf(slots)).toEqual(['2024-06-03T09:00:00', '2024-06-10T09:00:00']);
  });

  it('keeps one slot per timestamp when ranges overlap, attributed to the earlier range', () => {
    const slots = expandRanges([
      range('r1', 1, '09:00', '10:00', 30),
      range('r2', 1, '09:30', '10:30', 30)
    ], MONDAY_8AM, 0, MONDAY_8AM);

    expect(slots).toEqual([
      { timeSlot: '2024-06-03T09:00:00', rangeId: 'r1' },
      { timeSlot: '2024-06-03T09:30:00', rangeId: 'r1' },
      { timeSlot: '2024-06-03T10:00:00', rangeId: 'r2' }
    ]);
  });

  it('orders slots from several days chronologically', () => {
    const slots = expandRanges([
      range('tue', 2, '14:00', '15:00', 60),
      range('mon', 1, '16:00', '17:00', 60)
    ], MONDAY_8AM, 1, MONDAY_8AM);

    expect(slotsOf(slots)).toEqual(['2024-06-03T16:00:00', '2024-06-04T14:00:00']);
  });

  it('returns nothing without ranges', () => {
    expect(expandRanges([], MONDAY_8AM, 28, MONDAY_8AM)).toEqual([]);
  });

  describe('on the day clocks spring forward', () => {
    useTimeZone('America/New_York');

    it('skips the times that do not exist', () => {
      const midnight = new Date(2024, 2, 10, 0, 0, 0);
      const slots = expandRanges([range('night', 7, '01:30', '04:00', 30)], midnight, 0, midnight);

      expect(slots).toEqual([
        { timeSlot: '2024-03-10T01:30:00', rangeId: 'night' },
        { timeSlot: '2024-03-10T03:00:00', rangeId: 'night' },
        { timeSlot: '2024-03-10T03:30:00', rangeId: 'night' }
      ]);
    });
  });
});

describe('SlotGenerator', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('produces two slots on each of four Wednesdays', () => {
    const slots = ctx.generator.generateSlots(
      [range('wed', 3, '09:00', '11:00', 60)],
      MONDAY_8AM
    );

    expect(slotsOf(slots)).toEqual([
      '2024-06-05T09:00:00',
      '2024-06-05T10:00:00',
      '2024-06-12T09:00:00',
      '2024-06-12T10:00:00',
      '2024-06-19T09:00:00',
      '2024-06-19T10:00:00',
      '2024-06-26T09:00:00',
      '2024-06-26T10:00:00'
    ]);
    expect(new Set(slotsOf(slots)).size).toBe(8);
  });

  it('rejects windows outside 0..180 days', () => {
    const ranges = [range('r1', 1, '09:00', '10:00', 30)];

    expect(() => ctx.generator.generateSlots(ranges, MONDAY_8AM, -1)).toThrow(ValidationError);
    expect(() => ctx.generator.generateSlots(ranges, MONDAY_8AM, 181)).toThrow(ValidationError);
    expect(() => ctx.generator.generateSlots(ranges, MONDAY_8AM, 1.5)).toThrow(ValidationError);
  });

  describe('regenerate', () => {
    beforeEach(async () => {
      await ctx.ranges.addRange(PROFESSIONAL_ID, MONDAY_MORNING);
    });

    it('fills the inventory from the stored ranges', async () => {
      const result = await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });

      expect(result).toEqual({ strategy: 'additive', generated: 4, added: 4, removed: 0, totalSlots: 4 });
      expect(await ctx.queries.listSlots(PROFESSIONAL_ID)).toEqual([
        '2024-06-03T09:00:00',
        '2024-06-03T09:30:00',
        '2024-06-10T09:00:00',
        '2024-06-10T09:30:00'
      ]);
    });

    it('is idempotent in additive mode', async () => {
      await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });
      const second = await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });

      expect(second).toEqual({ strategy: 'additive', generated: 4, added: 0, removed: 0, totalSlots: 4 });
    });

    it('never re-offers a slot held by a live appointment', async () => {
      await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });
      await ctx.coordinator.bookAppointment('patient-1', PROFESSIONAL_ID, '2024-06-03T09:00:00');

      const result = await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });

      expect(result.added).toBe(0);
      expect(result.totalSlots).toBe(3);
      expect(await ctx.memory.inventory(PROFESSIONAL_ID).contains('2024-06-03T09:00:00')).toBe(false);
    });

    it('replace drops manual slots and rebuilds from ranges', async () => {
      await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 7 });
      await ctx.coordinator.addManualSlot(PROFESSIONAL_ID, '2024-06-04T15:00:00');
      await ctx.coordinator.bookAppointment('patient-1', PROFESSIONAL_ID, '2024-06-03T09:30:00');

      const result = await ctx.generator.regenerate(PROFESSIONAL_ID, { strategy: 'replace', windowDays: 7 });

      expect(result).toEqual({ strategy: 'replace', generated: 4, added: 3, removed: 4, totalSlots: 3 });
      expect(await ctx.queries.listSlots(PROFESSIONAL_ID)).toEqual([
        '2024-06-03T09:00:00',
        '2024-06-10T09:00:00',
        '2024-06-10T09:30:00'
      ]);
    });

    it('records which range produced each slot', async () => {
      const [stored] = await ctx.ranges.listRanges(PROFESSIONAL_ID);
      await ctx.generator.regenerate(PROFESSIONAL_ID, { windowDays: 0 });

      expect(await ctx.memory.inventory(PROFESSIONAL_ID).list()).toEqual([
        { timeSlot: '2024-06-03T09:00:00', rangeId: stored.id },
        { timeSlot: '2024-06-03T09:30:00', rangeId: stored.id }
      ]);
    });

    it('fails for an unknown professional', async () => {
      await expect(ctx.generator.regenerate('missing-professional'))
        .rejects.toBeInstanceOf(NotFoundError);
    });
  });
});
