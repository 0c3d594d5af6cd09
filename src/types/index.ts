/** 1 = Monday … 7 = Sunday */
export type DayOfWeek = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/** Injectable wall clock; everything time-dependent reads "now" through it. */
export type Clock = () => Date;

export interface Professional {
  id: string;
  userId: string;
  name: string;
  specialization: string;
  consultationFee: number | null;
  isActive: boolean;
}

export interface AvailabilityRange {
  id: string;
  professionalId: string;
  position: number;
  dayOfWeek: DayOfWeek;
  startTime: string; // "09:00"
  endTime: string;   // "18:00"
  intervalMinutes: number;
  createdAt: Date;
}

export interface NewAvailabilityRange {
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  intervalMinutes: number;
}

/**
 * One bookable timestamp in a professional's inventory. `rangeId` is the range
 * that generated it, or null for a slot the professional published by hand.
 */
export interface SlotRecord {
  timeSlot: string; // "2024-01-15T09:00:00"
  rangeId: string | null;
}

export interface Appointment {
  id: string;
  patientId: string;
  professionalId: string;
  appointmentDateTime: Date;
  timeSlot: string;
  status: AppointmentStatus;
  reason?: string;
  notes?: string;
  consultationFee: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AppointmentStatus =
  | 'scheduled'
  | 'confirmed'
  | 'cancelled'
  | 'completed'
  | 'no_show';

export const APPOINTMENT_STATUSES: readonly AppointmentStatus[] = [
  'scheduled',
  'confirmed',
  'cancelled',
  'completed',
  'no_show',
];

/** Statuses that hold a slot. */
export const LIVE_STATUSES: readonly AppointmentStatus[] = ['scheduled', 'confirmed'];

export interface AppointmentFilter {
  status?: AppointmentStatus;
  from?: Date;
  to?: Date;
}

export type RegenerationStrategy = 'additive' | 'replace';

export interface RegenerationOptions {
  strategy?: RegenerationStrategy;
  windowDays?: number;
}

export interface RegenerationResult {
  strategy: RegenerationStrategy;
  generated: number;
  added: number;
  removed: number;
  totalSlots: number;
}

export interface AvailabilityStats {
  totalSlots: number;
  futureSlots: number;
  pastSlots: number;
  datesWithAvailability: number;
  averageSlotsPerDay: number;
  nextAvailableSlot: string | null;
}

export type UserRole = 'patient' | 'professional' | 'admin';

export interface AuthUser {
  id: string;
  role: UserRole;
  professionalId?: string;
}
