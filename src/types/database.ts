import type { QueryResultRow } from 'pg';

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  username: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
}

export interface QueryResult<T = QueryResultRow> {
  rows: T[];
  rowCount: number;
  command: string;
}

/**
 * Anything that can run a parameterized statement: the pool itself or an
 * open transaction.
 */
export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export type Transaction = Queryable;

/** Pool-level access a store needs: statements, transactions and lifecycle. */
export interface TransactionalDatabase extends Queryable {
  transaction<T>(callback: (trx: Transaction) => Promise<T>): Promise<T>;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

// Строки таблиц в том виде, в каком их возвращает pg

export interface ProfessionalRow {
  id: string;
  user_id: string;
  name: string;
  specialization: string;
  consultation_fee: string | null;
  is_active: boolean;
}

export interface AvailabilityRangeRow {
  id: string;
  professional_id: string;
  position: number;
  day_of_week: number;
  start_time: string;
  end_time: string;
  interval_minutes: number;
  created_at: Date;
}

export interface SlotRow {
  time_slot: string;
  range_id: string | null;
}

export interface AppointmentRow {
  id: string;
  patient_id: string;
  professional_id: string;
  appointment_date_time: Date;
  time_slot: string;
  status: string;
  reason: string | null;
  notes: string | null;
  consultation_fee: string | null;
  created_at: Date;
  updated_at: Date;
}
