import { describe, it, expect } from 'vitest';
import {
  appointmentFromRecord,
  appointmentToRecord,
  isActive,
  isLive,
  newAppointment,
  withStatus,
} from '../src/models/appointment.js';
import { generateId } from '../src/models/common.js';
import { newPatient, patientFromRecord, patientToRecord } from '../src/models/patient.js';
import { addSlot, newProvider, providerFromRecord, providerToRecord, removeSlot } from '../src/models/provider.js';

const NOW = new Date('2025-11-20T10:00:00.000Z');

describe('generateId()', () => {
  it('prefixes eight characters of a random UUID', () => {
    expect(generateId('P')).toMatch(/^P[0-9a-f]{8}$/);
    expect(generateId('M')).toMatch(/^M[0-9a-f]{8}$/);
    expect(generateId('C')).not.toBe(generateId('C'));
  });
});

describe('patients', () => {
  it('creates and round-trips a patient record', () => {
    const patient = newPatient(
      { name: 'Ana Souza', national_id: '123', phone: '555-0100', email: 'ana@example.com' },
      NOW
    );

    expect(patient.registered_at).toBe('2025-11-20T10:00:00.000Z');
    expect(patientFromRecord(patientToRecord(patient))).toEqual(patient);
  });

  it('rejects records missing required fields', () => {
    expect(patientFromRecord({ id: 'P1', name: 'Ana' })).toBeNull();
  });
});

describe('providers', () => {
  const input = { name: 'Dr. Lima', license_code: 'CRM-1', specialty: 'Cardiology', available_slots: ['09:00', '10:00', '09:00'] };

  it('keeps slot labels unique in first-seen order', () => {
    expect(newProvider(input, NOW).available_slots).toEqual(['09:00', '10:00']);
  });

  it('adds and removes slots on its own copy', () => {
    const provider = newProvider(input, NOW);

    expect(addSlot(provider, '11:00')).toBe(true);
    expect(addSlot(provider, '11:00')).toBe(false);
    expect(removeSlot(provider, '09:00')).toBe(true);
    expect(removeSlot(provider, '09:00')).toBe(false);
    expect(provider.available_slots).toEqual(['10:00', '11:00']);
  });

  it('does not share the slot array with its record', () => {
    const provider = newProvider(input, NOW);
    const record = providerToRecord(provider);
    addSlot(provider, '14:00');

    expect(record.available_slots).toEqual(['09:00', '10:00']);
  });

  it('defaults missing slots when decoding', () => {
    const provider = providerFromRecord({
      id: 'M1',
      name: 'Dr. Lima',
      license_code: 'CRM-1',
      specialty: 'Cardiology',
      registered_at: '2025-01-01T00:00:00.000Z',
    });

    expect(provider).toEqual({
      id: 'M1',
      name: 'Dr. Lima',
      license_code: 'CRM-1',
      specialty: 'Cardiology',
      available_slots: [],
      registered_at: '2025-01-01T00:00:00.000Z',
    });
  });
});

describe('appointments', () => {
  const input = { patient_id: 'P1', provider_id: 'M1', date: '2025-11-25', slot: '09:00' };

  it('starts scheduled with matching timestamps', () => {
    const appointment = newAppointment(input, NOW);

    expect(appointment.status).toBe('scheduled');
    expect(appointment.notes).toBe('');
    expect(appointment.created_at).toBe(appointment.updated_at);
    expect(appointment.id).toMatch(/^C[0-9a-f]{8}$/);
  });

  it('moves updated_at on a status change and leaves the original alone', () => {
    const appointment = newAppointment(input, NOW);
    const later = new Date('2025-11-21T08:30:00.000Z');
    const cancelled = withStatus(appointment, 'cancelled', later);

    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.updated_at).toBe('2025-11-21T08:30:00.000Z');
    expect(cancelled.created_at).toBe('2025-11-20T10:00:00.000Z');
    expect(appointment.status).toBe('scheduled');
  });

  it('classifies live and active statuses', () => {
    const appointment = newAppointment(input, NOW);

    expect(isLive(appointment)).toBe(true);
    expect(isActive(appointment)).toBe(true);
    expect(isLive(withStatus(appointment, 'completed'))).toBe(true);
    expect(isActive(withStatus(appointment, 'completed'))).toBe(false);
    expect(isLive(withStatus(appointment, 'cancelled'))).toBe(false);
    expect(isActive(withStatus(appointment, 'confirmed'))).toBe(true);
  });

  it('round-trips and rejects unknown statuses', () => {
    const appointment = newAppointment({ ...input, notes: 'first visit' }, NOW);

    expect(appointmentFromRecord(appointmentToRecord(appointment))).toEqual(appointment);
    expect(appointmentFromRecord({ ...appointmentToRecord(appointment), status: 'lost' })).toBeNull();
  });
});
