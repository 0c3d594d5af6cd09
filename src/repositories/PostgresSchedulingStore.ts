import { DatabaseService } from '@/config/database';
import logger from '@/config/logger';
import { DateUtils } from '@/middleware/dateUtils';
import { NotFoundError, SlotAlreadyBookedError } from '@/middleware/errorHandler';
import {
  APPOINTMENT_STATUSES,
  type Appointment,
  type AppointmentFilter,
  type AppointmentStatus,
  type AvailabilityRange,
  type DayOfWeek,
  type NewAvailabilityRange,
  type Professional,
  type SlotRecord,
} from '@/types';
import type {
  AppointmentRow,
  AvailabilityRangeRow,
  ProfessionalRow,
  Queryable,
  SlotRow,
  TransactionalDatabase,
} from '@/types/database';
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

const UNIQUE_VIOLATION = '23505';

const APPOINTMENT_COLUMNS = `
  id, patient_id, professional_id, appointment_date_time, time_slot, status,
  reason, notes, consultation_fee, created_at, updated_at
`;

function toNumber(value: string | null): number | null {
  return value === null ? null : Number(value);
}

function toDayOfWeek(value: number): DayOfWeek {
  switch (value) {
    case 1: case 2: case 3: case 4: case 5: case 6: case 7:
      return value;
    default:
      throw new Error(`Corrupt day_of_week in availability_ranges: ${value}`);
  }
}

function toStatus(value: string): AppointmentStatus {
  const status = APPOINTMENT_STATUSES.find(candidate => candidate === value);
  if (!status) {
    throw new Error(`Corrupt appointment status: ${value}`);
  }
  return status;
}

function mapProfessional(row: ProfessionalRow): Professional {
  return {
    id: row.id,
    userId: row.user_id,
    name: row.name,
    specialization: row.specialization,
    consultationFee: toNumber(row.consultation_fee),
    isActive: row.is_active,
  };
}

function mapRange(row: AvailabilityRangeRow): AvailabilityRange {
  return {
    id: row.id,
    professionalId: row.professional_id,
    position: row.position,
    dayOfWeek: toDayOfWeek(row.day_of_week),
    startTime: row.start_time,
    endTime: row.end_time,
    intervalMinutes: row.interval_minutes,
    createdAt: row.created_at,
  };
}

function mapAppointment(row: AppointmentRow): Appointment {
  return {
    id: row.id,
    patientId: row.patient_id,
    professionalId: row.professional_id,
    appointmentDateTime: row.appointment_date_time,
    timeSlot: row.time_slot,
    status: toStatus(row.status),
    reason: row.reason ?? undefined,
    notes: row.notes ?? undefined,
    consultationFee: toNumber(row.consultation_fee),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === UNIQUE_VIOLATION;
}

class PostgresProfessionalRepository implements ProfessionalRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: string): Promise<Professional | null> {
    const result = await this.db.query<ProfessionalRow>(`
      SELECT id, user_id, name, specialization, consultation_fee, is_active
      FROM professionals
      WHERE id = $1
    `, [id]);
    return result.rows[0] ? mapProfessional(result.rows[0]) : null;
  }

  async findWithSlotsAfter(after: string): Promise<Professional[]> {
    const result = await this.db.query<ProfessionalRow>(`
      SELECT p.id, p.user_id, p.name, p.specialization, p.consultation_fee, p.is_active
      FROM professionals p
      WHERE p.is_active = true
        AND EXISTS (
          SELECT 1 FROM available_slots s
          WHERE s.professional_id = p.id AND s.time_slot > $1
        )
      ORDER BY p.name ASC
    `, [after]);
    return result.rows.map(mapProfessional);
  }
}

class PostgresRangeRepository implements AvailabilityRangeRepository {
  constructor(private readonly db: Queryable) {}

  async listByProfessional(professionalId: string): Promise<AvailabilityRange[]> {
    const result = await this.db.query<AvailabilityRangeRow>(`
      SELECT id, professional_id, position, day_of_week, start_time, end_time, interval_minutes, created_at
      FROM availability_ranges
      WHERE professional_id = $1
      ORDER BY position ASC
    `, [professionalId]);
    return result.rows.map(mapRange);
  }

  async append(professionalId: string, id: string, range: NewAvailabilityRange): Promise<AvailabilityRange> {
    const result = await this.db.query<AvailabilityRangeRow>(`
      INSERT INTO availability_ranges (
        id, professional_id, position, day_of_week, start_time, end_time, interval_minutes
      )
      SELECT $1, $2, COALESCE(MAX(position), 0) + 1, $3, $4, $5, $6
      FROM availability_ranges
      WHERE professional_id = $2
      RETURNING id, professional_id, position, day_of_week, start_time, end_time, interval_minutes, created_at
    `, [id, professionalId, range.dayOfWeek, range.startTime, range.endTime, range.intervalMinutes]);
    return mapRange(result.rows[0]);
  }

  async delete(professionalId: string, rangeId: string): Promise<boolean> {
    const result = await this.db.query(`
      DELETE FROM availability_ranges
      WHERE id = $1 AND professional_id = $2
    `, [rangeId, professionalId]);
    return result.rowCount > 0;
  }
}

class PostgresSlotInventory implements SlotInventory {
  constructor(private readonly db: Queryable, private readonly professionalId: string) {}

  async list(): Promise<SlotRecord[]> {
    const result = await this.db.query<SlotRow>(`
      SELECT time_slot, range_id
      FROM available_slots
      WHERE professional_id = $1
      ORDER BY time_slot ASC
    `, [this.professionalId]);
    return result.rows.map(row => ({ timeSlot: row.time_slot, rangeId: row.range_id }));
  }

  async contains(timeSlot: string): Promise<boolean> {
    const result = await this.db.query(`
      SELECT 1 FROM available_slots
      WHERE professional_id = $1 AND time_slot = $2
    `, [this.professionalId, timeSlot]);
    return result.rowCount > 0;
  }

  async addSlot(timeSlot: string, rangeId: string | null = null): Promise<boolean> {
    const result = await this.db.query(`
      INSERT INTO available_slots (professional_id, time_slot, range_id)
      VALUES ($1, $2, $3)
      ON CONFLICT (professional_id, time_slot) DO NOTHING
    `, [this.professionalId, timeSlot, rangeId]);
    return result.rowCount > 0;
  }

  async removeSlot(timeSlot: string): Promise<boolean> {
    const result = await this.db.query(`
      DELETE FROM available_slots
      WHERE professional_id = $1 AND time_slot = $2
    `, [this.professionalId, timeSlot]);
    return result.rowCount > 0;
  }

  async clear(): Promise<number> {
    const result = await this.db.query(`
      DELETE FROM available_slots WHERE professional_id = $1
    `, [this.professionalId]);
    return result.rowCount;
  }
}

class PostgresAppointmentRepository implements AppointmentRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: string): Promise<Appointment | null> {
    const result = await this.db.query<AppointmentRow>(`
      SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE id = $1
    `, [id]);
    return result.rows[0] ? mapAppointment(result.rows[0]) : null;
  }

  async findLiveBySlot(professionalId: string, timeSlot: string): Promise<Appointment | null> {
    const result = await this.db.query<AppointmentRow>(`
      SELECT ${APPOINTMENT_COLUMNS} FROM appointments
      WHERE professional_id = $1 AND time_slot = $2 AND status IN ('scheduled', 'confirmed')
    `, [professionalId, timeSlot]);
    return result.rows[0] ? mapAppointment(result.rows[0]) : null;
  }

  async listLiveSlots(professionalId: string): Promise<string[]> {
    const result = await this.db.query<{ time_slot: string }>(`
      SELECT time_slot FROM appointments
      WHERE professional_id = $1 AND status IN ('scheduled', 'confirmed')
    `, [professionalId]);
    return result.rows.map(row => row.time_slot);
  }

  listByPatient(patientId: string, filter: AppointmentFilter = {}): Promise<Appointment[]> {
    return this.list('patient_id', patientId, filter);
  }

  listByProfessional(professionalId: string, filter: AppointmentFilter = {}): Promise<Appointment[]> {
    return this.list('professional_id', professionalId, filter);
  }

  async insert(appointment: NewAppointment): Promise<Appointment> {
    try {
      const result = await this.db.query<AppointmentRow>(`
        INSERT INTO appointments (
          id, patient_id, professional_id, appointment_date_time, time_slot,
          status, reason, consultation_fee
        )
        VALUES ($1, $2, $3, $4::timestamp, $5, 'scheduled', $6, $7)
        RETURNING ${APPOINTMENT_COLUMNS}
      `, [
        appointment.id,
        appointment.patientId,
        appointment.professionalId,
        appointment.timeSlot,
        appointment.timeSlot,
        appointment.reason ?? null,
        appointment.consultationFee
      ]);
      return mapAppointment(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new SlotAlreadyBookedError(appointment.timeSlot);
      }
      throw error;
    }
  }

  async update(id: string, changes: AppointmentChanges): Promise<Appointment> {
    // Формируем запрос обновления
    const updates: string[] = [];
    const params: unknown[] = [];
    let paramIndex = 1;

    if (changes.status) {
      updates.push(`status = $${paramIndex}`);
      params.push(changes.status);
      paramIndex++;
    }

    if (changes.timeSlot) {
      updates.push(`time_slot = $${paramIndex}`, `appointment_date_time = $${paramIndex}::timestamp`);
      params.push(changes.timeSlot);
      paramIndex++;
    }

    if (changes.reason !== undefined) {
      updates.push(`reason = $${paramIndex}`);
      params.push(changes.reason);
      paramIndex++;
    }

    if (changes.notes !== undefined) {
      updates.push(`notes = $${paramIndex}`);
      params.push(changes.notes);
      paramIndex++;
    }

    updates.push('updated_at = NOW()');
    params.push(id);

    try {
      const result = await this.db.query<AppointmentRow>(`
        UPDATE appointments
        SET ${updates.join(', ')}
        WHERE id = $${paramIndex}
        RETURNING ${APPOINTMENT_COLUMNS}
      `, params);

      if (!result.rows[0]) {
        throw new NotFoundError(`Appointment ${id} not found`);
      }
      return mapAppointment(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error) && changes.timeSlot) {
        throw new SlotAlreadyBookedError(changes.timeSlot);
      }
      throw error;
    }
  }

  private async list(
    column: 'patient_id' | 'professional_id',
    value: string,
    filter: AppointmentFilter
  ): Promise<Appointment[]> {
    let query = `SELECT ${APPOINTMENT_COLUMNS} FROM appointments WHERE ${column} = $1`;
    const params: unknown[] = [value];
    let paramIndex = 2;

    if (filter.status) {
      query += ` AND status = $${paramIndex}`;
      params.push(filter.status);
      paramIndex++;
    }

    if (filter.from) {
      query += ` AND appointment_date_time >= $${paramIndex}::timestamp`;
      params.push(DateUtils.formatSlot(filter.from));
      paramIndex++;
    }

    if (filter.to) {
      query += ` AND appointment_date_time <= $${paramIndex}::timestamp`;
      params.push(DateUtils.formatSlot(filter.to));
      paramIndex++;
    }

    query += ' ORDER BY appointment_date_time ASC';

    const result = await this.db.query<AppointmentRow>(query, params);
    return result.rows.map(mapAppointment);
  }
}

function createRepositories(db: Queryable): SchedulingRepositories {
  return {
    professionals: new PostgresProfessionalRepository(db),
    ranges: new PostgresRangeRepository(db),
    appointments: new PostgresAppointmentRepository(db),
    inventory: (professionalId: string) => new PostgresSlotInventory(db, professionalId),
  };
}

export class PostgresSchedulingStore implements SchedulingStore {
  public readonly professionals: ProfessionalRepository;
  public readonly ranges: AvailabilityRangeRepository;
  public readonly appointments: AppointmentRepository;

  constructor(private readonly db: TransactionalDatabase = DatabaseService.getInstance()) {
    const repos = createRepositories(db);
    this.professionals = repos.professionals;
    this.ranges = repos.ranges;
    this.appointments = repos.appointments;
  }

  inventory(professionalId: string): SlotInventory {
    return new PostgresSlotInventory(this.db, professionalId);
  }

  async withProfessional<T>(
    professionalId: string,
    work: (repos: SchedulingRepositories, professional: Professional) => Promise<T>
  ): Promise<T> {
    return this.db.transaction(async (trx) => {
      // Строка врача служит замком: все записи по одному врачу идут друг за другом
      const locked = await trx.query<ProfessionalRow>(`
        SELECT id, user_id, name, specialization, consultation_fee, is_active
        FROM professionals
        WHERE id = $1
        FOR UPDATE
      `, [professionalId]);

      if (!locked.rows[0]) {
        throw new NotFoundError(`Professional ${professionalId} not found`);
      }

      logger.debug('Professional locked', { professionalId });
      return work(createRepositories(trx), mapProfessional(locked.rows[0]));
    });
  }

  healthCheck(): Promise<boolean> {
    return this.db.healthCheck();
  }

  close(): Promise<void> {
    return this.db.close();
  }
}
