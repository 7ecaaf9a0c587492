import { randomUUID } from 'crypto';

/**
 * Short prefixed identifier, e.g. "P1a2b3c4d" for a patient.
 * The prefix tells entity kinds apart at a glance.
 */
export function generateId(prefix: 'P' | 'M' | 'C'): string {
  return `${prefix}${randomUUID().slice(0, 8)}`;
}

export function timestamp(now: Date = new Date()): string {
  return now.toISOString();
}
