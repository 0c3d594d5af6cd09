import type { AppointmentStatus, RegenerationStrategy } from './index';

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: APIError;
  message?: string;
  timestamp: Date;
}

export interface APIError {
  code: string;
  message: string;
  details?: unknown;
}

export interface CreateRangeDto {
  dayOfWeek: number;
  startTime: string;
  endTime: string;
  intervalMinutes: number;
}

export interface GenerateSlotsDto {
  strategy?: RegenerationStrategy;
  windowDays?: number;
}

export interface TimeSlotDto {
  timeSlot: string;
}

export interface CreateAppointmentDto {
  professionalId: string;
  timeSlot: string;
  reason?: string;
}

export interface UpdateAppointmentDto {
  timeSlot: string;
  reason?: string;
}

export interface AppointmentListQuery {
  status?: AppointmentStatus;
  from?: string;
  to?: string;
  upcoming?: boolean;
}

export interface SlotListQuery {
  date?: string;
  from?: string;
  to?: string;
}
