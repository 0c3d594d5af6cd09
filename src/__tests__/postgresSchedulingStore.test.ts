import { describe, it, expect, vi } from 'vitest';
import type { QueryResultRow } from 'pg';
import { PostgresSchedulingStore } from '@/repositories/PostgresSchedulingStore';
import { NotFoundError, SlotAlreadyBookedError } from '@/middleware/errorHandler';
import type { QueryResult, Transaction, TransactionalDatabase } from '@/types/database';
import { PROFESSIONAL_ID } from './support';

interface RecordedQuery {
  text: string;
  params: unknown[];
}

/**
 * Records every statement and answers with no rows. `failWith` picks the
 * statements that reject instead, the way pg rejects with a coded error.
 */
function recordingDatabase(failWith: (text: string) => unknown = () => undefined) {
  const queries: RecordedQuery[] = [];
  const transactions = { opened: 0 };

  const db: TransactionalDatabase = {
    async query<T extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []): Promise<QueryResult<T>> {
      const sql = text.replace(/\s+/g, ' ').trim();
      queries.push({ text: sql, params });
      const failure = failWith(sql);
      if (failure !== undefined) {
        throw failure;
      }
      return { rows: [], rowCount: 0, command: sql.split(' ')[0] };
    },
    transaction<T>(callback: (trx: Transaction) => Promise<T>): Promise<T> {
      transactions.opened++;
      return callback(db);
    },
    healthCheck: async () => true,
    close: async () => undefined
  };

  return { store: new PostgresSchedulingStore(db), queries, transactions };
}

const uniqueViolation = { code: '23505', constraint: 'appointments_live_slot_unique' };

const newAppointment = {
  id: 'appt-1',
  patientId: 'patient-1',
  professionalId: PROFESSIONAL_ID,
  appointmentDateTime: new Date(2024, 5, 3, 9, 0, 0),
  timeSlot: '2024-06-03T09:00:00',
  consultationFee: 2500
};

describe('PostgresSchedulingStore', () => {
  describe('appointments.insert', () => {
    it('reports a unique violation on the live slot as a booking conflict', async () => {
      const { store } = recordingDatabase(sql => (sql.startsWith('INSERT INTO appointments') ? uniqueViolation : undefined));

      const attempt = store.appointments.insert(newAppointment);

      await expect(attempt).rejects.toBeInstanceOf(SlotAlreadyBookedError);
      await expect(attempt).rejects.toMatchObject({ timeSlot: '2024-06-03T09:00:00', statusCode: 409 });
    });

    it('passes other database errors through', async () => {
      const foreignKey = { code: '23503' };
      const { store } = recordingDatabase(() => foreignKey);

      await expect(store.appointments.insert(newAppointment)).rejects.toBe(foreignKey);
    });

    it('stores the slot string as both the slot and the timestamp', async () => {
      const { store, queries } = recordingDatabase(() => uniqueViolation);

      await expect(store.appointments.insert({ ...newAppointment, reason: 'Check-up' })).rejects.toThrow();

      expect(queries[0].params).toEqual([
        'appt-1',
        'patient-1',
        PROFESSIONAL_ID,
        '2024-06-03T09:00:00',
        '2024-06-03T09:00:00',
        'Check-up',
        2500
      ]);
    });
  });

  describe('appointments.update', () => {
    it('builds one statement for status, slot and reason', async () => {
      const { store, queries } = recordingDatabase();

      await expect(store.appointments.update('appt-1', {
        status: 'scheduled',
        timeSlot: '2024-06-10T09:00:00',
        reason: 'Follow-up'
      })).rejects.toBeInstanceOf(NotFoundError);

      expect(queries).toHaveLength(1);
      expect(queries[0].text).toContain(
        'SET status = $1, time_slot = $2, appointment_date_time = $2::timestamp, reason = $3, updated_at = NOW() WHERE id = $4'
      );
      expect(queries[0].params).toEqual(['scheduled', '2024-06-10T09:00:00', 'Follow-up', 'appt-1']);
    });

    it('numbers parameters from one when only the status changes', async () => {
      const { store, queries } = recordingDatabase();

      await expect(store.appointments.update('appt-1', { status: 'cancelled' })).rejects.toBeInstanceOf(NotFoundError);

      expect(queries[0].text).toContain('SET status = $1, updated_at = NOW() WHERE id = $2');
      expect(queries[0].params).toEqual(['cancelled', 'appt-1']);
    });

    it('reports a move onto a taken slot as a booking conflict', async () => {
      const { store } = recordingDatabase(() => uniqueViolation);

      await expect(store.appointments.update('appt-1', { timeSlot: '2024-06-10T09:30:00' }))
        .rejects.toMatchObject({ code: 'SLOT_ALREADY_BOOKED', timeSlot: '2024-06-10T09:30:00' });
    });

    it('leaves a unique violation untouched when the slot did not change', async () => {
      const { store } = recordingDatabase(() => uniqueViolation);

      await expect(store.appointments.update('appt-1', { notes: 'Bring referral' })).rejects.toBe(uniqueViolation);
    });
  });

  describe('withProfessional', () => {
    it('locks the professional row inside a transaction', async () => {
      const { store, queries, transactions } = recordingDatabase();

      await expect(store.withProfessional(PROFESSIONAL_ID, async () => 'done')).rejects.toThrow();

      expect(transactions.opened).toBe(1);
      expect(queries[0].text).toMatch(/FROM professionals WHERE id = \$1 FOR UPDATE$/);
      expect(queries[0].params).toEqual([PROFESSIONAL_ID]);
    });

    it('fails with NotFoundError when the professional does not exist', async () => {
      const { store } = recordingDatabase();
      const work = vi.fn(async () => 'done');

      await expect(store.withProfessional('missing-professional', work)).rejects.toBeInstanceOf(NotFoundError);
      expect(work).not.toHaveBeenCalled();
    });
  });

  it('filters appointment listings with numbered parameters', async () => {
    const { store, queries } = recordingDatabase();

    await store.appointments.listByProfessional(PROFESSIONAL_ID, {
      status: 'scheduled',
      from: new Date(2024, 5, 3, 0, 0, 0),
      to: new Date(2024, 5, 9, 23, 59, 0)
    });

    expect(queries[0].text).toBe(
      'SELECT id, patient_id, professional_id, appointment_date_time, time_slot, status, reason, notes, consultation_fee, created_at, updated_at' +
      ' FROM appointments WHERE professional_id = $1 AND status = $2' +
      ' AND appointment_date_time >= $3::timestamp AND appointment_date_time <= $4::timestamp' +
      ' ORDER BY appointment_date_time ASC'
    );
    expect(queries[0].params).toEqual([PROFESSIONAL_ID, 'scheduled', '2024-06-03T00:00:00', '2024-06-09T23:59:00']);
  });
});
