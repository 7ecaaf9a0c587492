export const APPOINTMENT_STATUSES = ['scheduled', 'confirmed', 'completed', 'cancelled'] as const;

export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

export interface Patient {
  id: string;
  name: string;
  national_id: string;
  phone: string;
  email: string;
  registered_at: string;
}

export interface Provider {
  id: string;
  name: string;
  license_code: string;
  specialty: string;
  available_slots: string[];
  registered_at: string;
}

export interface Appointment {
  id: string;
  patient_id: string;
  provider_id: string;
  date: string;
  slot: string;
  notes: string;
  status: AppointmentStatus;
  created_at: string;
  updated_at: string;
}

/** Flat key-value shape every entity is persisted as */
export type StoredRecord = Record<string, string | string[]>;

export type Collection = 'patients' | 'providers' | 'appointments';

export interface IdempotencyRecord {
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_body: string;
  created_at: string;
}

export interface BookingRequest {
  patient_id: string;
  provider_id: string;
  date: string;
  slot: string;
  notes?: string;
}

export enum ErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  SLOT_UNAVAILABLE = 'SLOT_UNAVAILABLE',
  SLOT_TAKEN = 'SLOT_TAKEN',
  DUPLICATE_KEY = 'DUPLICATE_KEY',
  PRECONDITION_FAILED = 'PRECONDITION_FAILED',
  PERSISTENCE_FAILURE = 'PERSISTENCE_FAILURE',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  MISSING_IDEMPOTENCY_KEY = 'MISSING_IDEMPOTENCY_KEY',
  IDEMPOTENCY_KEY_MISMATCH = 'IDEMPOTENCY_KEY_MISMATCH',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/** Business rejections a service call can end in */
export type RejectionCode =
  | ErrorCode.NOT_FOUND
  | ErrorCode.SLOT_UNAVAILABLE
  | ErrorCode.SLOT_TAKEN
  | ErrorCode.DUPLICATE_KEY
  | ErrorCode.PRECONDITION_FAILED;

/**
 * Outcome of every service operation.
 * Expected business outcomes are values, never thrown errors.
 */
export type ServiceResult<T> =
  | { kind: 'success'; data: T; message: string }
  | { kind: 'rejected'; code: RejectionCode; message: string }
  | { kind: 'failed'; code: ErrorCode.PERSISTENCE_FAILURE; message: string; cause: string };

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
  hitRate: number;
}

export interface SchedulerStatistics {
  totalPatients: number;
  totalProviders: number;
  totalAppointments: number;
  appointmentsByStatus: Record<AppointmentStatus, number>;
  cache: CacheStats;
}
