import { z } from 'zod';
import type { Patient, StoredRecord } from '../types/index.js';
import { generateId, timestamp } from './common.js';

const patientRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  national_id: z.string(),
  phone: z.string(),
  email: z.string(),
  registered_at: z.string().optional(),
});

export interface PatientInput {
  name: string;
  national_id: string;
  phone: string;
  email: string;
}

export function newPatient(input: PatientInput, now?: Date): Patient {
  return {
    id: generateId('P'),
    name: input.name,
    national_id: input.national_id,
    phone: input.phone,
    email: input.email,
    registered_at: timestamp(now),
  };
}

export function patientToRecord(patient: Patient): StoredRecord {
  return {
    id: patient.id,
    name: patient.name,
    national_id: patient.national_id,
    phone: patient.phone,
    email: patient.email,
    registered_at: patient.registered_at,
  };
}

/** Returns null when the record does not describe a patient */
export function patientFromRecord(record: StoredRecord): Patient | null {
  const parsed = patientRecordSchema.safeParse(record);
  if (!parsed.success) return null;

  const { registered_at, ...fields } = parsed.data;
  return { ...fields, registered_at: registered_at ?? timestamp() };
}
