import logger from './logger';

export interface SchedulingConfig {
  /** Days ahead of today covered by slot generation (today included). */
  windowDays: number;
  maxWindowDays: number;
}

const DEFAULT_WINDOW_DAYS = 28;
const MAX_WINDOW_DAYS = 180;

export function getSchedulingConfig(): SchedulingConfig {
  const raw = process.env.SLOT_GENERATION_WINDOW_DAYS;
  const parsed = raw ? parseInt(raw) : DEFAULT_WINDOW_DAYS;

  if (!Number.isInteger(parsed) || parsed < 1 || parsed > MAX_WINDOW_DAYS) {
    logger.warn(`Ignoring SLOT_GENERATION_WINDOW_DAYS=${raw}, using ${DEFAULT_WINDOW_DAYS}`);
    return { windowDays: DEFAULT_WINDOW_DAYS, maxWindowDays: MAX_WINDOW_DAYS };
  }

  return { windowDays: parsed, maxWindowDays: MAX_WINDOW_DAYS };
}
