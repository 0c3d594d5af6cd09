import { v4 as uuidv4 } from 'uuid';
import logger from '@/config/logger';
import { DateUtils, systemClock } from '@/middleware/dateUtils';
import {
  AuthorizationError,
  InvalidStateError,
  NotFoundError,
  SlotAlreadyBookedError,
  SlotUnavailableError,
  ValidationError,
} from '@/middleware/errorHandler';
import type { SchedulingRepositories, SchedulingStore } from '@/repositories/types';
import {
  LIVE_STATUSES,
  type Appointment,
  type AppointmentFilter,
  type AppointmentStatus,
  type Clock,
} from '@/types';

export interface AppointmentQuery extends AppointmentFilter {
  /** Only live appointments from now on. */
  upcoming?: boolean;
}

function parseTimestamp(timestamp: string): { timeSlot: string; startsAt: Date } {
  if (!DateUtils.isValidSlot(timestamp)) {
    throw new ValidationError(`Invalid time slot "${timestamp}", expected YYYY-MM-DDTHH:mm:ss`);
  }
  const startsAt = DateUtils.parseSlot(timestamp);
  return { timeSlot: DateUtils.formatSlot(startsAt), startsAt };
}

function isLive(status: AppointmentStatus): boolean {
  return LIVE_STATUSES.includes(status);
}

/**
 * Sole writer of slot inventory and appointments taken together. Every
 * operation runs inside the professional's critical section, so the
 * "is it free → take it → record the booking" sequence cannot interleave
 * with another booking, cancellation or regeneration for the same
 * professional.
 */
export class BookingCoordinator {
  constructor(
    private readonly store: SchedulingStore,
    private readonly clock: Clock = systemClock
  ) {}

  async bookAppointment(
    patientId: string,
    professionalId: string,
    timestamp: string,
    reason?: string
  ): Promise<Appointment> {
    const { timeSlot, startsAt } = parseTimestamp(timestamp);

    const appointment = await this.store.withProfessional(professionalId, async (repos, professional) => {
      await this.claimSlot(repos, professionalId, timeSlot, startsAt);

      return repos.appointments.insert({
        id: uuidv4(),
        patientId,
        professionalId,
        appointmentDateTime: startsAt,
        timeSlot,
        reason,
        consultationFee: professional.consultationFee,
      });
    });

    logger.info('Appointment booked', {
      appointmentId: appointment.id,
      professionalId,
      patientId,
      timeSlot
    });

    return appointment;
  }

  async cancelAppointment(appointmentId: string, actingUserId: string): Promise<Appointment> {
    const existing = await this.requireAppointment(appointmentId);

    const cancelled = await this.store.withProfessional(existing.professionalId, async (repos) => {
      // Перечитываем под замком: статус мог измениться
      const appointment = await this.requireAppointment(appointmentId, repos);
      this.assertPatientMayModify(appointment, actingUserId, 'cancel');

      const updated = await repos.appointments.update(appointmentId, { status: 'cancelled' });
      await repos.inventory(appointment.professionalId).addSlot(appointment.timeSlot);
      return updated;
    });

    logger.info('Appointment cancelled', {
      appointmentId,
      professionalId: cancelled.professionalId,
      timeSlot: cancelled.timeSlot
    });

    return cancelled;
  }

  /**
   * Moves the appointment to `newTimestamp` (if it differs) and records the
   * new reason. The old slot is returned and the new one consumed in the same
   * unit of work; on any failure both stay as they were.
   */
  async updateAppointment(
    appointmentId: string,
    newTimestamp: string,
    reason: string | undefined,
    actingUserId: string
  ): Promise<Appointment> {
    const { timeSlot, startsAt } = parseTimestamp(newTimestamp);
    const existing = await this.requireAppointment(appointmentId);

    const updated = await this.store.withProfessional(existing.professionalId, async (repos) => {
      const appointment = await this.requireAppointment(appointmentId, repos);
      this.assertPatientMayModify(appointment, actingUserId, 'modify');

      const reasonChange = reason !== undefined ? { reason } : {};

      if (appointment.timeSlot === timeSlot) {
        return repos.appointments.update(appointmentId, reasonChange);
      }

      await this.claimSlot(repos, appointment.professionalId, timeSlot, startsAt);
      const moved = await repos.appointments.update(appointmentId, {
        timeSlot,
        appointmentDateTime: startsAt,
        ...reasonChange,
      });
      await repos.inventory(appointment.professionalId).addSlot(appointment.timeSlot);

      logger.info('Appointment rescheduled', {
        appointmentId,
        professionalId: appointment.professionalId,
        from: appointment.timeSlot,
        to: timeSlot
      });

      return moved;
    });

    return updated;
  }

  async confirmAppointment(appointmentId: string, actingProfessionalId: string): Promise<Appointment> {
    return this.transition(appointmentId, actingProfessionalId, 'scheduled', 'confirmed');
  }

  async completeAppointment(appointmentId: string, actingProfessionalId: string): Promise<Appointment> {
    return this.transition(appointmentId, actingProfessionalId, 'confirmed', 'completed');
  }

  /** Publishes a one-off slot outside any range. Idempotent. */
  async addManualSlot(professionalId: string, timestamp: string): Promise<boolean> {
    const { timeSlot } = parseTimestamp(timestamp);

    const added = await this.store.withProfessional(professionalId, async (repos) => {
      if (await repos.appointments.findLiveBySlot(professionalId, timeSlot)) {
        throw new SlotAlreadyBookedError(timeSlot);
      }
      return repos.inventory(professionalId).addSlot(timeSlot, null);
    });

    logger.info('Manual slot added', { professionalId, timeSlot, added });
    return added;
  }

  /** Withdraws an unbooked slot. Idempotent. */
  async retractSlot(professionalId: string, timestamp: string): Promise<boolean> {
    const { timeSlot } = parseTimestamp(timestamp);

    const removed = await this.store.withProfessional(professionalId, (repos) =>
      repos.inventory(professionalId).removeSlot(timeSlot)
    );

    logger.info('Slot retracted', { professionalId, timeSlot, removed });
    return removed;
  }

  /** Drops inventory slots that start at or before now. */
  async expirePastSlots(professionalId: string): Promise<number> {
    const expired = await this.store.withProfessional(professionalId, async (repos) => {
      const cutoff = DateUtils.formatSlot(this.clock());
      const inventory = repos.inventory(professionalId);
      let count = 0;

      for (const slot of await inventory.list()) {
        if (slot.timeSlot > cutoff) break;
        if (await inventory.removeSlot(slot.timeSlot)) count++;
      }
      return count;
    });

    if (expired > 0) {
      logger.info('Past slots expired', { professionalId, expired });
    }
    return expired;
  }

  async getAppointment(appointmentId: string): Promise<Appointment> {
    return this.requireAppointment(appointmentId);
  }

  async listPatientAppointments(patientId: string, query: AppointmentQuery = {}): Promise<Appointment[]> {
    const appointments = await this.store.appointments.listByPatient(patientId, this.toFilter(query));
    return query.upcoming ? appointments.filter(item => isLive(item.status)) : appointments;
  }

  async listProfessionalAppointments(professionalId: string, query: AppointmentQuery = {}): Promise<Appointment[]> {
    const appointments = await this.store.appointments.listByProfessional(professionalId, this.toFilter(query));
    return query.upcoming ? appointments.filter(item => isLive(item.status)) : appointments;
  }

  private toFilter(query: AppointmentQuery): AppointmentFilter {
    const filter: AppointmentFilter = { status: query.status, from: query.from, to: query.to };
    if (query.upcoming) {
      const now = this.clock();
      filter.from = query.from && query.from > now ? query.from : now;
    }
    return filter;
  }

  /**
   * Removes `timeSlot` from the inventory on behalf of a new or moved
   * booking. Fails when the slot is not offered, already passed, or held by a
   * live appointment.
   */
  private async claimSlot(
    repos: SchedulingRepositories,
    professionalId: string,
    timeSlot: string,
    startsAt: Date
  ): Promise<void> {
    const inventory = repos.inventory(professionalId);

    if (!(await inventory.contains(timeSlot))) {
      throw new SlotUnavailableError(timeSlot);
    }

    if (startsAt <= this.clock()) {
      throw new SlotUnavailableError(timeSlot, 'This slot has already passed. Please pick another time.');
    }

    if (await repos.appointments.findLiveBySlot(professionalId, timeSlot)) {
      logger.warn('Slot offered while held by an appointment', { professionalId, timeSlot });
      throw new SlotAlreadyBookedError(timeSlot);
    }

    await inventory.removeSlot(timeSlot);
  }

  private async transition(
    appointmentId: string,
    actingProfessionalId: string,
    from: AppointmentStatus,
    to: AppointmentStatus
  ): Promise<Appointment> {
    const existing = await this.requireAppointment(appointmentId);
    if (existing.professionalId !== actingProfessionalId) {
      throw new AuthorizationError(`Only the appointment's professional can mark it ${to}`);
    }

    const updated = await this.store.withProfessional(existing.professionalId, async (repos) => {
      const appointment = await this.requireAppointment(appointmentId, repos);
      if (appointment.status !== from) {
        throw new InvalidStateError(`Cannot mark a ${appointment.status} appointment as ${to}`);
      }
      return repos.appointments.update(appointmentId, { status: to });
    });

    logger.info(`Appointment ${to}`, { appointmentId, professionalId: updated.professionalId });
    return updated;
  }

  private assertPatientMayModify(appointment: Appointment, actingUserId: string, action: string): void {
    if (appointment.patientId !== actingUserId) {
      throw new AuthorizationError(`You are not authorized to ${action} this appointment`);
    }
    if (!isLive(appointment.status)) {
      throw new InvalidStateError(`A ${appointment.status} appointment cannot be changed`);
    }
  }

  private async requireAppointment(
    appointmentId: string,
    repos: Pick<SchedulingRepositories, 'appointments'> = this.store
  ): Promise<Appointment> {
    const appointment = await repos.appointments.findById(appointmentId);
    if (!appointment) {
      throw new NotFoundError(`Appointment ${appointmentId} not found`);
    }
    return appointment;
  }
}
