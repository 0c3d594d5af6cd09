import logger from '@/config/logger';
import { systemClock } from '@/middleware/dateUtils';
import { NotFoundError, SlotAlreadyBookedError } from '@/middleware/errorHandler';
import {
  LIVE_STATUSES,
  type Appointment,
  type AppointmentFilter,
  type AvailabilityRange,
  type Clock,
  type DayOfWeek,
  type NewAvailabilityRange,
  type Professional,
  type SlotRecord,
} from '@/types';
import { KeyedMutex } from './KeyedMutex';
import type {
  AppointmentChanges,
  AppointmentRepository,
  AvailabilityRangeRepository,
  NewAppointment,
  ProfessionalRepository,
  SchedulingRepositories,
  SchedulingStore,
  SlotInventory,
} from './types';

interface Snapshot {
  ranges: AvailabilityRange[] | undefined;
  slots: Map<string, string | null> | undefined;
  appointments: Appointment[];
}

function toDayOfWeek(value: number): DayOfWeek {
  switch (value) {
    case 1: case 2: case 3: case 4: case 5: case 6: case 7:
      return value;
    default:
      throw new RangeError(`Invalid day of week: ${value}`);
  }
}

function matchesFilter(appointment: Appointment, filter: AppointmentFilter): boolean {
  if (filter.status && appointment.status !== filter.status) return false;
  if (filter.from && appointment.appointmentDateTime < filter.from) return false;
  if (filter.to && appointment.appointmentDateTime > filter.to) return false;
  return true;
}

function byDateTime(a: Appointment, b: Appointment): number {
  return a.appointmentDateTime.getTime() - b.appointmentDateTime.getTime();
}

/**
 * Process-local store for development (`STORE_DRIVER=memory`) and tests.
 * Work for one professional is serialized by a mutex and rolled back from a
 * snapshot when it throws.
 */
export class InMemorySchedulingStore implements SchedulingStore {
  private professionalsById = new Map<string, Professional>();
  private rangesByProfessional = new Map<string, AvailabilityRange[]>();
  private slotsByProfessional = new Map<string, Map<string, string | null>>();
  private appointmentsById = new Map<string, Appointment>();
  private mutex = new KeyedMutex();

  public readonly professionals: ProfessionalRepository;
  public readonly ranges: AvailabilityRangeRepository;
  public readonly appointments: AppointmentRepository;

  constructor(private readonly clock: Clock = systemClock) {
    this.professionals = {
      findById: async (id) => {
        const professional = this.professionalsById.get(id);
        return professional ? { ...professional } : null;
      },
      findWithSlotsAfter: async (after) => [...this.professionalsById.values()]
        .filter(professional => professional.isActive)
        .filter(professional => [...(this.slotsByProfessional.get(professional.id)?.keys() ?? [])]
          .some(timeSlot => timeSlot > after))
        .sort((a, b) => a.name.localeCompare(b.name))
        .map(professional => ({ ...professional })),
    };

    this.ranges = {
      listByProfessional: async (professionalId) =>
        (this.rangesByProfessional.get(professionalId) ?? []).map(range => ({ ...range })),
      append: async (professionalId, id, range) => this.appendRange(professionalId, id, range),
      delete: async (professionalId, rangeId) => {
        const list = this.rangesByProfessional.get(professionalId) ?? [];
        const index = list.findIndex(range => range.id === rangeId);
        if (index === -1) return false;
        list.splice(index, 1);
        return true;
      },
    };

    this.appointments = {
      findById: async (id) => {
        const appointment = this.appointmentsById.get(id);
        return appointment ? { ...appointment } : null;
      },
      findLiveBySlot: async (professionalId, timeSlot) => {
        const appointment = this.liveAppointments(professionalId).find(item => item.timeSlot === timeSlot);
        return appointment ? { ...appointment } : null;
      },
      listLiveSlots: async (professionalId) =>
        this.liveAppointments(professionalId).map(item => item.timeSlot),
      listByPatient: async (patientId, filter = {}) => this.listAppointments(
        item => item.patientId === patientId, filter
      ),
      listByProfessional: async (professionalId, filter = {}) => this.listAppointments(
        item => item.professionalId === professionalId, filter
      ),
      insert: async (appointment) => this.insertAppointment(appointment),
      update: async (id, changes) => this.updateAppointment(id, changes),
    };
  }

  addProfessional(professional: Professional): void {
    this.professionalsById.set(professional.id, { ...professional });
  }

  inventory(professionalId: string): SlotInventory {
    const slots = (): Map<string, string | null> => {
      let map = this.slotsByProfessional.get(professionalId);
      if (!map) {
        map = new Map();
        this.slotsByProfessional.set(professionalId, map);
      }
      return map;
    };

    return {
      list: async (): Promise<SlotRecord[]> => [...slots().entries()]
        .map(([timeSlot, rangeId]) => ({ timeSlot, rangeId }))
        .sort((a, b) => a.timeSlot.localeCompare(b.timeSlot)),
      contains: async (timeSlot) => slots().has(timeSlot),
      addSlot: async (timeSlot, rangeId = null) => {
        const map = slots();
        if (map.has(timeSlot)) return false;
        map.set(timeSlot, rangeId);
        return true;
      },
      removeSlot: async (timeSlot) => slots().delete(timeSlot),
      clear: async () => {
        const map = slots();
        const size = map.size;
        map.clear();
        return size;
      },
    };
  }

  async withProfessional<T>(
    professionalId: string,
    work: (repos: SchedulingRepositories, professional: Professional) => Promise<T>
  ): Promise<T> {
    return this.mutex.runExclusive(professionalId, async () => {
      const professional = this.professionalsById.get(professionalId);
      if (!professional) {
        throw new NotFoundError(`Professional ${professionalId} not found`);
      }

      const snapshot = this.takeSnapshot(professionalId);
      try {
        return await work(this, { ...professional });
      } catch (error) {
        this.restoreSnapshot(professionalId, snapshot);
        logger.debug('In-memory work rolled back', {
          professionalId,
          reason: error instanceof Error ? error.message : String(error)
        });
        throw error;
      }
    });
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.professionalsById.clear();
    this.rangesByProfessional.clear();
    this.slotsByProfessional.clear();
    this.appointmentsById.clear();
  }

  private appendRange(professionalId: string, id: string, range: NewAvailabilityRange): AvailabilityRange {
    const list = this.rangesByProfessional.get(professionalId) ?? [];
    const position = list.reduce((max, item) => Math.max(max, item.position), 0) + 1;
    const created: AvailabilityRange = {
      id,
      professionalId,
      position,
      dayOfWeek: toDayOfWeek(range.dayOfWeek),
      startTime: range.startTime,
      endTime: range.endTime,
      intervalMinutes: range.intervalMinutes,
      createdAt: this.clock(),
    };
    list.push(created);
    this.rangesByProfessional.set(professionalId, list);
    return { ...created };
  }

  private liveAppointments(professionalId: string): Appointment[] {
    return [...this.appointmentsById.values()].filter(item =>
      item.professionalId === professionalId && LIVE_STATUSES.includes(item.status)
    );
  }

  private listAppointments(predicate: (item: Appointment) => boolean, filter: AppointmentFilter): Appointment[] {
    return [...this.appointmentsById.values()]
      .filter(predicate)
      .filter(item => matchesFilter(item, filter))
      .sort(byDateTime)
      .map(item => ({ ...item }));
  }

  // Та же гарантия, что и частичный уникальный индекс в Postgres
  private assertSlotFree(professionalId: string, timeSlot: string, exceptId?: string): void {
    const holder = this.liveAppointments(professionalId)
      .find(item => item.timeSlot === timeSlot && item.id !== exceptId);
    if (holder) {
      throw new SlotAlreadyBookedError(timeSlot);
    }
  }

  private insertAppointment(appointment: NewAppointment): Appointment {
    this.assertSlotFree(appointment.professionalId, appointment.timeSlot);
    const now = this.clock();
    const created: Appointment = {
      ...appointment,
      status: 'scheduled',
      createdAt: now,
      updatedAt: now,
    };
    this.appointmentsById.set(created.id, created);
    return { ...created };
  }

  private updateAppointment(id: string, changes: AppointmentChanges): Appointment {
    const existing = this.appointmentsById.get(id);
    if (!existing) {
      throw new NotFoundError(`Appointment ${id} not found`);
    }

    const next: Appointment = { ...existing, ...changes, updatedAt: this.clock() };
    if (LIVE_STATUSES.includes(next.status)) {
      this.assertSlotFree(next.professionalId, next.timeSlot, id);
    }
    this.appointmentsById.set(id, next);
    return { ...next };
  }

  private takeSnapshot(professionalId: string): Snapshot {
    const ranges = this.rangesByProfessional.get(professionalId);
    const slots = this.slotsByProfessional.get(professionalId);
    return {
      ranges: ranges?.map(range => ({ ...range })),
      slots: slots ? new Map(slots) : undefined,
      appointments: [...this.appointmentsById.values()]
        .filter(item => item.professionalId === professionalId)
        .map(item => ({ ...item })),
    };
  }

  private restoreSnapshot(professionalId: string, snapshot: Snapshot): void {
    if (snapshot.ranges) {
      this.rangesByProfessional.set(professionalId, snapshot.ranges);
    } else {
      this.rangesByProfessional.delete(professionalId);
    }

    if (snapshot.slots) {
      this.slotsByProfessional.set(professionalId, snapshot.slots);
    } else {
      this.slotsByProfessional.delete(professionalId);
    }

    for (const [id, appointment] of this.appointmentsById) {
      if (appointment.professionalId === professionalId) {
        this.appointmentsById.delete(id);
      }
    }
    for (const appointment of snapshot.appointments) {
      this.appointmentsById.set(appointment.id, appointment);
    }
  }
}
