import { getSchedulingConfig, type SchedulingConfig } from '@/config/scheduling';
import { systemClock } from '@/middleware/dateUtils';
import type { SchedulingStore } from '@/repositories/types';
import type { Clock } from '@/types';
import { AvailabilityQueryService } from './AvailabilityQueryService';
import { AvailabilityRangeStore } from './AvailabilityRangeStore';
import { BookingCoordinator } from './BookingCoordinator';
import { SlotGenerator } from './SlotGenerator';

export { AvailabilityQueryService } from './AvailabilityQueryService';
export { AvailabilityRangeStore, validateRange } from './AvailabilityRangeStore';
export { BookingCoordinator, type AppointmentQuery } from './BookingCoordinator';
export { SlotGenerator, expandRanges } from './SlotGenerator';

export interface SchedulingServices {
  store: SchedulingStore;
  ranges: AvailabilityRangeStore;
  generator: SlotGenerator;
  coordinator: BookingCoordinator;
  queries: AvailabilityQueryService;
}

/** Wires every scheduling service onto one store and one clock. */
export function createSchedulingServices(
  store: SchedulingStore,
  clock: Clock = systemClock,
  config: SchedulingConfig = getSchedulingConfig()
): SchedulingServices {
  return {
    store,
    ranges: new AvailabilityRangeStore(store),
    generator: new SlotGenerator(store, clock, config),
    coordinator: new BookingCoordinator(store, clock),
    queries: new AvailabilityQueryService(store, clock),
  };
}
