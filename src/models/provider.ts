import { z } from 'zod';
import type { Provider, StoredRecord } from '../types/index.js';
import { generateId, timestamp } from './common.js';

const providerRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  license_code: z.string(),
  specialty: z.string(),
  available_slots: z.array(z.string()).default([]),
  registered_at: z.string().optional(),
});

export interface ProviderInput {
  name: string;
  license_code: string;
  specialty: string;
  available_slots: string[];
}

/** Drops repeated labels, keeping first-seen order */
function uniqueSlots(slots: string[]): string[] {
  return [...new Set(slots)];
}

export function newProvider(input: ProviderInput, now?: Date): Provider {
  return {
    id: generateId('M'),
    name: input.name,
    license_code: input.license_code,
    specialty: input.specialty,
    available_slots: uniqueSlots(input.available_slots),
    registered_at: timestamp(now),
  };
}

/**
 * Adds a slot label to the provider's own copy.
 * Returns false when the slot is already offered.
 */
export function addSlot(provider: Provider, slot: string): boolean {
  if (provider.available_slots.includes(slot)) return false;
  provider.available_slots.push(slot);
  return true;
}

/** Returns false when the slot was not offered */
export function removeSlot(provider: Provider, slot: string): boolean {
  const index = provider.available_slots.indexOf(slot);
  if (index === -1) return false;
  provider.available_slots.splice(index, 1);
  return true;
}

export function providerToRecord(provider: Provider): StoredRecord {
  return {
    id: provider.id,
    name: provider.name,
    license_code: provider.license_code,
    specialty: provider.specialty,
    available_slots: [...provider.available_slots],
    registered_at: provider.registered_at,
  };
}

export function providerFromRecord(record: StoredRecord): Provider | null {
  const parsed = providerRecordSchema.safeParse(record);
  if (!parsed.success) return null;

  const { registered_at, available_slots, ...fields } = parsed.data;
  return {
    ...fields,
    available_slots: uniqueSlots(available_slots),
    registered_at: registered_at ?? timestamp(),
  };
}
