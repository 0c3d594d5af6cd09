import type {
  Appointment,
  AppointmentFilter,
  AvailabilityRange,
  NewAvailabilityRange,
  Professional,
  SlotRecord,
} from '@/types';

/**
 * The live set of unbooked slots of one professional. Add and remove are
 * idempotent and report whether anything changed.
 */
export interface SlotInventory {
  list(): Promise<SlotRecord[]>;
  contains(timeSlot: string): Promise<boolean>;
  addSlot(timeSlot: string, rangeId?: string | null): Promise<boolean>;
  removeSlot(timeSlot: string): Promise<boolean>;
  clear(): Promise<number>;
}

export interface ProfessionalRepository {
  findById(id: string): Promise<Professional | null>;
  /** Active professionals holding at least one slot after `after`. */
  findWithSlotsAfter(after: string): Promise<Professional[]>;
}

export interface AvailabilityRangeRepository {
  /** Ordered by position. */
  listByProfessional(professionalId: string): Promise<AvailabilityRange[]>;
  /** Appends after the last range of the professional. */
  append(professionalId: string, id: string, range: NewAvailabilityRange): Promise<AvailabilityRange>;
  delete(professionalId: string, rangeId: string): Promise<boolean>;
}

export interface NewAppointment {
  id: string;
  patientId: string;
  professionalId: string;
  appointmentDateTime: Date;
  timeSlot: string;
  reason?: string;
  consultationFee: number | null;
}

export type AppointmentChanges = Partial<Pick<Appointment, 'status' | 'timeSlot' | 'appointmentDateTime' | 'reason' | 'notes'>>;

export interface AppointmentRepository {
  findById(id: string): Promise<Appointment | null>;
  /** A scheduled or confirmed appointment holding the slot, if any. */
  findLiveBySlot(professionalId: string, timeSlot: string): Promise<Appointment | null>;
  listLiveSlots(professionalId: string): Promise<string[]>;
  listByPatient(patientId: string, filter?: AppointmentFilter): Promise<Appointment[]>;
  listByProfessional(professionalId: string, filter?: AppointmentFilter): Promise<Appointment[]>;
  insert(appointment: NewAppointment): Promise<Appointment>;
  update(id: string, changes: AppointmentChanges): Promise<Appointment>;
}

export interface SchedulingRepositories {
  professionals: ProfessionalRepository;
  ranges: AvailabilityRangeRepository;
  appointments: AppointmentRepository;
  inventory(professionalId: string): SlotInventory;
}

/**
 * Persistence port. Reads may go through the plain repositories; every write
 * goes through `withProfessional`, which serializes work per professional and
 * applies it all-or-nothing.
 */
export interface SchedulingStore extends SchedulingRepositories {
  /** Rejects with NotFoundError when the professional does not exist. */
  withProfessional<T>(
    professionalId: string,
    work: (repos: SchedulingRepositories, professional: Professional) => Promise<T>
  ): Promise<T>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}
