import { z } from 'zod';
import { APPOINTMENT_STATUSES } from '../types/index.js';

function isCalendarDate(value: string): boolean {
  const [year, month, day] = value.split('-').map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

export const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date as YYYY-MM-DD')
  .refine(isCalendarDate, 'Not a calendar date');

export const slotLabel = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected a slot as HH:MM');

const requiredText = z.string().trim().min(1);

export const bookingSchema = z.object({
  patient_id: requiredText,
  provider_id: requiredText,
  date: isoDate,
  slot: slotLabel,
  notes: z.string().max(2000).optional(),
});

export const patientSchema = z.object({
  name: requiredText,
  national_id: requiredText,
  phone: requiredText,
  email: z.string().trim().email(),
});

export const patientUpdateSchema = patientSchema.partial();

export const providerSchema = z.object({
  name: requiredText,
  license_code: requiredText,
  specialty: requiredText,
  available_slots: z.array(slotLabel).default([]),
});

export const providerUpdateSchema = providerSchema.partial();

export const statusBodySchema = z.object({ status: z.enum(APPOINTMENT_STATUSES) });

export const appointmentQuerySchema = z.object({
  patient_id: z.string().min(1).optional(),
  provider_id: z.string().min(1).optional(),
});

export const conflictQuerySchema = z.object({
  provider_id: requiredText,
  date: isoDate,
  slot: slotLabel,
});

export const availabilityQuerySchema = z.object({ date: isoDate });
