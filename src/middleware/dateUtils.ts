import { addDays, format, getISODay, isValid, parse, startOfDay } from 'date-fns';
import type { Clock, DayOfWeek } from '@/types';

const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const SLOT_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2})?$/;

const SLOT_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";
const DATE_FORMAT = 'yyyy-MM-dd';

export const systemClock: Clock = () => new Date();

export class DateUtils {
  static isValidTime(value: string): boolean {
    return TIME_PATTERN.test(value);
  }

  static parseTimeString(timeString: string): { hours: number; minutes: number } {
    const match = TIME_PATTERN.exec(timeString);
    if (!match) {
      throw new RangeError(`Invalid time of day: "${timeString}"`);
    }
    return { hours: Number(match[1]), minutes: Number(match[2]) };
  }

  /** "09:30" -> 570 */
  static toMinutes(timeString: string): number {
    const { hours, minutes } = this.parseTimeString(timeString);
    return hours * 60 + minutes;
  }

  /**
   * Start offsets (minutes after midnight) of every slot that begins before
   * `endTime`. The end itself is exclusive, and a trailing remainder shorter
   * than the interval still gets its slot.
   */
  static createTimeSlots(startTime: string, endTime: string, intervalMinutes: number): number[] {
    if (!Number.isInteger(intervalMinutes) || intervalMinutes <= 0) {
      throw new RangeError(`Interval must be a positive whole number of minutes, got ${intervalMinutes}`);
    }

    const slots: number[] = [];
    const end = this.toMinutes(endTime);

    for (let current = this.toMinutes(startTime); current < end; current += intervalMinutes) {
      slots.push(current);
    }

    return slots;
  }

  /**
   * Local date + minutes after midnight, or null when that wall-clock time
   * does not exist on the date (skipped by a daylight-saving change).
   */
  static combine(date: Date, minutesOfDay: number): Date | null {
    const hours = Math.floor(minutesOfDay / 60);
    const minutes = minutesOfDay % 60;
    const combined = new Date(date.getFullYear(), date.getMonth(), date.getDate(), hours, minutes, 0, 0);

    if (combined.getHours() !== hours || combined.getMinutes() !== minutes) {
      return null;
    }
    return combined;
  }

  static dayOfWeek(date: Date): DayOfWeek {
    const day = getISODay(date);
    switch (day) {
      case 1: case 2: case 3: case 4: case 5: case 6: case 7:
        return day;
      default:
        throw new RangeError(`Invalid date: ${String(date)}`);
    }
  }

  static isValidSlot(value: string): boolean {
    return SLOT_PATTERN.test(value) && isValid(this.parseLoose(value));
  }

  /**
   * Parses a local ISO datetime ("2024-01-15T09:00" or "2024-01-15T09:00:00").
   * Strings carrying a zone offset are rejected: slots are wall-clock times.
   */
  static parseSlot(value: string): Date {
    if (!SLOT_PATTERN.test(value)) {
      throw new RangeError(`Invalid slot timestamp: "${value}"`);
    }
    const parsed = this.parseLoose(value);
    if (!isValid(parsed)) {
      throw new RangeError(`Invalid slot timestamp: "${value}"`);
    }
    return parsed;
  }

  /** Canonical slot string, e.g. "2024-01-15T09:00:00". */
  static formatSlot(date: Date): string {
    return format(date, SLOT_FORMAT);
  }

  static normalizeSlot(value: string): string {
    return this.formatSlot(this.parseSlot(value));
  }

  static isValidDate(value: string): boolean {
    return DATE_PATTERN.test(value) && isValid(parse(value, DATE_FORMAT, new Date(0)));
  }

  static parseDate(value: string): Date {
    const parsed = parse(value, DATE_FORMAT, new Date(0));
    if (!DATE_PATTERN.test(value) || !isValid(parsed)) {
      throw new RangeError(`Invalid date: "${value}"`);
    }
    return parsed;
  }

  static formatDate(date: Date): string {
    return format(date, DATE_FORMAT);
  }

  /** Date part of a slot string. */
  static slotDate(timeSlot: string): string {
    return timeSlot.slice(0, 10);
  }

  static addDays(date: Date, days: number): Date {
    return addDays(date, days);
  }

  static getStartOfDay(date: Date): Date {
    return startOfDay(date);
  }

  private static parseLoose(value: string): Date {
    const pattern = value.length === 16 ? "yyyy-MM-dd'T'HH:mm" : SLOT_FORMAT;
    return parse(value, pattern, new Date(0));
  }
}
