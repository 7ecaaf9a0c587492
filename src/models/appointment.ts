import { z } from 'zod';
import {
  APPOINTMENT_STATUSES,
  type Appointment,
  type AppointmentStatus,
  type StoredRecord,
} from '../types/index.js';
import { generateId, timestamp } from './common.js';

const appointmentRecordSchema = z.object({
  id: z.string().min(1),
  patient_id: z.string(),
  provider_id: z.string(),
  date: z.string(),
  slot: z.string(),
  notes: z.string().default(''),
  status: z.enum(APPOINTMENT_STATUSES).default('scheduled'),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export interface AppointmentInput {
  patient_id: string;
  provider_id: string;
  date: string;
  slot: string;
  notes?: string;
}

export function newAppointment(input: AppointmentInput, now?: Date): Appointment {
  const createdAt = timestamp(now);
  return {
    id: generateId('C'),
    patient_id: input.patient_id,
    provider_id: input.provider_id,
    date: input.date,
    slot: input.slot,
    notes: input.notes ?? '',
    status: 'scheduled',
    created_at: createdAt,
    updated_at: createdAt,
  };
}

/**
 * Copy of the appointment in the given status.
 * Any status may follow any other; updated_at always moves.
 */
export function withStatus(appointment: Appointment, status: AppointmentStatus, now?: Date): Appointment {
  return { ...appointment, status, updated_at: timestamp(now) };
}

/** Live appointments hold their slot */
export function isLive(appointment: Appointment): boolean {
  return appointment.status !== 'cancelled';
}

/** Active appointments still need to happen */
export function isActive(appointment: Appointment): boolean {
  return appointment.status === 'scheduled' || appointment.status === 'confirmed';
}

export function appointmentToRecord(appointment: Appointment): StoredRecord {
  return {
    id: appointment.id,
    patient_id: appointment.patient_id,
    provider_id: appointment.provider_id,
    date: appointment.date,
    slot: appointment.slot,
    notes: appointment.notes,
    status: appointment.status,
    created_at: appointment.created_at,
    updated_at: appointment.updated_at,
  };
}

export function appointmentFromRecord(record: StoredRecord): Appointment | null {
  const parsed = appointmentRecordSchema.safeParse(record);
  if (!parsed.success) return null;

  const { created_at, updated_at, ...fields } = parsed.data;
  const fallback = timestamp();
  return {
    ...fields,
    created_at: created_at ?? fallback,
    updated_at: updated_at ?? fallback,
  };
}
