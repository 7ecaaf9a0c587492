import { Mutex } from '../concurrency/mutex.js';
import type { LruCache } from '../cache/lru-cache.js';
import { createLogger, describeError, type Logger } from '../logger.js';
import {
  appointmentFromRecord,
  appointmentToRecord,
  isActive,
  isLive,
  newAppointment,
  withStatus,
} from '../models/appointment.js';
import { newPatient, patientFromRecord, patientToRecord, type PatientInput } from '../models/patient.js';
import {
  addSlot,
  newProvider,
  providerFromRecord,
  providerToRecord,
  removeSlot,
  type ProviderInput,
} from '../models/provider.js';
import { rejectWrite, type JsonStore, type WriteFailure } from '../storage/json-store.js';
import {
  ErrorCode,
  type Appointment,
  type AppointmentStatus,
  type BookingRequest,
  type CacheStats,
  type Collection,
  type Patient,
  type Provider,
  type RejectionCode,
  type SchedulerStatistics,
  type ServiceResult,
  type StoredRecord,
} from '../types/index.js';

export type CacheEntry = StoredRecord | StoredRecord[];

export interface BookingServiceDeps {
  store: JsonStore;
  cache: LruCache<CacheEntry>;
  logger?: Logger;
}

const COLLECTIONS: readonly Collection[] = ['patients', 'providers', 'appointments'];

const SINGULAR: Record<Collection, string> = {
  patients: 'patient',
  providers: 'provider',
  appointments: 'appointment',
};

function ok<T>(data: T, message: string): ServiceResult<T> {
  return { kind: 'success', data, message };
}

function rejected(code: RejectionCode, message: string): ServiceResult<never> {
  return { kind: 'rejected', code, message };
}

function decodeAll<T>(records: StoredRecord[], decode: (record: StoredRecord) => T | null, logger: Logger): T[] {
  const entities: T[] = [];
  for (const record of records) {
    const entity = decode(record);
    if (entity) entities.push(entity);
    else logger.warn('Skipping undecodable record', { id: record.id });
  }
  return entities;
}

/**
 * Scheduling operations over patients, providers and appointments.
 *
 * Reads go through the cache and fall back to the store; writes go to the
 * store and then invalidate the affected cache keys. Booking runs inside one
 * process-wide mutex so the conflict scan and the insert that follows it
 * can never interleave with another booking.
 *
 * Every public method resolves to a ServiceResult and never rejects.
 */
export class BookingService {
  private store: JsonStore;
  private cache: LruCache<CacheEntry>;
  private logger: Logger;
  private bookingLock = new Mutex();
  private completedWrites = 0;

  constructor(deps: BookingServiceDeps) {
    this.store = deps.store;
    this.cache = deps.cache;
    this.logger = deps.logger ?? createLogger('booking');
  }

  // ==================== Booking ====================

  /**
   * Books a slot for a patient with a provider.
   * Conflict check and insert run under the booking lock, so of two
   * concurrent requests for the same provider/date/slot exactly one wins.
   */
  async book(request: BookingRequest): Promise<ServiceResult<Appointment>> {
    return this.guarded<Appointment>('book', () =>
      this.bookingLock.runExclusive(async () => {
        this.logger.info('Booking attempt', {
          patientId: request.patient_id,
          providerId: request.provider_id,
          date: request.date,
          slot: request.slot,
        });

        const patient = await this.findPatient(request.patient_id);
        if (!patient) return rejected(ErrorCode.NOT_FOUND, 'Patient not found');

        const provider = await this.findProvider(request.provider_id);
        if (!provider) return rejected(ErrorCode.NOT_FOUND, 'Provider not found');

        if (!provider.available_slots.includes(request.slot)) {
          return rejected(ErrorCode.SLOT_UNAVAILABLE, 'Slot not available for this provider');
        }

        const conflict = await this.findConflict(provider.id, request.date, request.slot);
        if (conflict) {
          this.logger.warn('Booking conflict detected', { conflictingId: conflict.id });
          return rejected(ErrorCode.SLOT_TAKEN, 'Slot already booked for this provider');
        }

        const appointment = newAppointment({
          patient_id: patient.id,
          provider_id: provider.id,
          date: request.date,
          slot: request.slot,
          notes: request.notes,
        });

        const write = await this.store.append('appointments', appointmentToRecord(appointment));
        if (!write.success) return this.fromWriteFailure('book', write);

        this.afterWrite('appointments');
        this.logger.info('Appointment booked', { appointmentId: appointment.id });
        return ok(appointment, 'Appointment booked successfully');
      })
    );
  }

  /** The live appointment holding the slot, or null when it is free */
  async checkConflict(
    providerId: string,
    date: string,
    slot: string,
    excludeId?: string
  ): Promise<ServiceResult<Appointment | null>> {
    return this.guarded<Appointment | null>('checkConflict', async () => {
      const conflict = await this.findConflict(providerId, date, slot, excludeId);
      return conflict ? ok(conflict, 'Slot already booked for this provider') : ok(null, 'Slot available');
    });
  }

  /** Provider slots on the given date not held by a live appointment */
  async availableSlots(providerId: string, date: string): Promise<ServiceResult<string[]>> {
    return this.guarded<string[]>('availableSlots', async () => {
      const provider = await this.findProvider(providerId);
      if (!provider) return rejected(ErrorCode.NOT_FOUND, 'Provider not found');

      const taken = new Set(
        (await this.appointments())
          .filter((a) => isLive(a) && a.provider_id === providerId && a.date === date)
          .map((a) => a.slot)
      );
      const free = provider.available_slots.filter((slot) => !taken.has(slot));
      return ok(free, `${free.length} slot(s) available`);
    });
  }

  // ==================== Appointments ====================

  async listAppointments(filter: { patientId?: string; providerId?: string } = {}): Promise<ServiceResult<Appointment[]>> {
    return this.guarded<Appointment[]>('listAppointments', async () => {
      const all = await this.appointments();
      const matching = all.filter(
        (a) =>
          (filter.patientId === undefined || a.patient_id === filter.patientId) &&
          (filter.providerId === undefined || a.provider_id === filter.providerId)
      );
      return ok(matching, `${matching.length} appointment(s)`);
    });
  }

  async listAppointmentsForPatient(patientId: string): Promise<ServiceResult<Appointment[]>> {
    return this.listAppointments({ patientId });
  }

  async listAppointmentsForProvider(providerId: string): Promise<ServiceResult<Appointment[]>> {
    return this.listAppointments({ providerId });
  }

  async getAppointment(id: string): Promise<ServiceResult<Appointment>> {
    return this.guarded<Appointment>('getAppointment', async () => {
      const appointment = await this.findAppointment(id);
      return appointment ? ok(appointment, 'Appointment found') : rejected(ErrorCode.NOT_FOUND, 'Appointment not found');
    });
  }

  /**
   * Moves an appointment to any status.
   * Moving a cancelled appointment back to a live status re-runs the
   * conflict check under the booking lock, since its slot may have been
   * booked again in the meantime.
   */
  async updateAppointmentStatus(id: string, status: AppointmentStatus): Promise<ServiceResult<Appointment>> {
    const run = async (): Promise<ServiceResult<Appointment>> => {
      const current = await this.findAppointment(id);
      if (!current) return rejected(ErrorCode.NOT_FOUND, 'Appointment not found');

      if (status !== 'cancelled' && !isLive(current)) {
        const conflict = await this.findConflict(current.provider_id, current.date, current.slot, current.id);
        if (conflict) return rejected(ErrorCode.SLOT_TAKEN, 'Slot already booked for this provider');
      }

      const updated = withStatus(current, status);
      const write = await this.store.update('appointments', id, appointmentToRecord(updated));
      if (!write.success) return this.fromWriteFailure('updateAppointmentStatus', write);

      this.afterWrite('appointments', id);
      this.logger.info('Appointment status updated', { appointmentId: id, status });
      return ok(updated, `Status updated to ${status}`);
    };

    return this.guarded<Appointment>('updateAppointmentStatus', () =>
      status === 'cancelled' ? run() : this.bookingLock.runExclusive(run)
    );
  }

  async cancelAppointment(id: string): Promise<ServiceResult<Appointment>> {
    return this.updateAppointmentStatus(id, 'cancelled');
  }

  async confirmAppointment(id: string): Promise<ServiceResult<Appointment>> {
    return this.updateAppointmentStatus(id, 'confirmed');
  }

  async completeAppointment(id: string): Promise<ServiceResult<Appointment>> {
    return this.updateAppointmentStatus(id, 'completed');
  }

  // ==================== Patients ====================

  async createPatient(input: PatientInput): Promise<ServiceResult<Patient>> {
    return this.guarded<Patient>('createPatient', async () => {
      const patient = newPatient(input);
      const write = await this.store.modify('patients', (records) => {
        if (records.some((r) => r.national_id === input.national_id)) {
          return rejectWrite('National ID already registered');
        }
        return [...records, patientToRecord(patient)];
      });
      if (!write.success) return this.fromWriteFailure('createPatient', write);

      this.afterWrite('patients');
      this.logger.info('Patient created', { patientId: patient.id });
      return ok(patient, 'Patient registered successfully');
    });
  }

  async listPatients(): Promise<ServiceResult<Patient[]>> {
    return this.guarded<Patient[]>('listPatients', async () => {
      const patients = await this.patients();
      return ok(patients, `${patients.length} patient(s)`);
    });
  }

  async getPatient(id: string): Promise<ServiceResult<Patient>> {
    return this.guarded<Patient>('getPatient', async () => {
      const patient = await this.findPatient(id);
      return patient ? ok(patient, 'Patient found') : rejected(ErrorCode.NOT_FOUND, 'Patient not found');
    });
  }

  async updatePatient(id: string, changes: Partial<PatientInput>): Promise<ServiceResult<Patient>> {
    return this.guarded<Patient>('updatePatient', async () => {
      const result: { patient?: Patient } = {};
      const write = await this.store.modify('patients', (records) => {
        const index = records.findIndex((r) => r.id === id);
        const current = index === -1 ? null : patientFromRecord(records[index]);
        if (!current) return { success: false, error: 'not_found', message: 'Patient not found' };

        const next: Patient = {
          ...current,
          name: changes.name ?? current.name,
          national_id: changes.national_id ?? current.national_id,
          phone: changes.phone ?? current.phone,
          email: changes.email ?? current.email,
        };
        if (records.some((r) => r.id !== id && r.national_id === next.national_id)) {
          return rejectWrite('National ID already registered');
        }

        result.patient = next;
        const updated = [...records];
        updated[index] = patientToRecord(next);
        return updated;
      });
      if (!write.success) return this.fromWriteFailure('updatePatient', write);
      if (!result.patient) return rejected(ErrorCode.NOT_FOUND, 'Patient not found');

      this.afterWrite('patients', id);
      this.logger.info('Patient updated', { patientId: id });
      return ok(result.patient, 'Patient updated successfully');
    });
  }

  /**
   * Deletes a patient without active (scheduled or confirmed) appointments.
   * Runs under the booking lock so no booking can slip in between the
   * check and the delete.
   */
  async deletePatient(id: string): Promise<ServiceResult<null>> {
    return this.guarded<null>('deletePatient', () =>
      this.bookingLock.runExclusive(async () => {
        const active = (await this.appointments()).filter((a) => a.patient_id === id && isActive(a));
        if (active.length > 0) {
          return rejected(ErrorCode.PRECONDITION_FAILED, 'Patient has active appointments');
        }

        const write = await this.store.delete('patients', id);
        if (!write.success) return this.fromWriteFailure('deletePatient', write, 'Patient not found');

        this.afterWrite('patients', id);
        this.logger.info('Patient deleted', { patientId: id });
        return ok(null, 'Patient removed successfully');
      })
    );
  }

  // ==================== Providers ====================

  async createProvider(input: ProviderInput): Promise<ServiceResult<Provider>> {
    return this.guarded<Provider>('createProvider', async () => {
      const provider = newProvider(input);
      const write = await this.store.modify('providers', (records) => {
        if (records.some((r) => r.license_code === input.license_code)) {
          return rejectWrite('License code already registered');
        }
        return [...records, providerToRecord(provider)];
      });
      if (!write.success) return this.fromWriteFailure('createProvider', write);

      this.afterWrite('providers');
      this.logger.info('Provider created', { providerId: provider.id });
      return ok(provider, 'Provider registered successfully');
    });
  }

  async listProviders(): Promise<ServiceResult<Provider[]>> {
    return this.guarded<Provider[]>('listProviders', async () => {
      const providers = await this.providers();
      return ok(providers, `${providers.length} provider(s)`);
    });
  }

  async getProvider(id: string): Promise<ServiceResult<Provider>> {
    return this.guarded<Provider>('getProvider', async () => {
      const provider = await this.findProvider(id);
      return provider ? ok(provider, 'Provider found') : rejected(ErrorCode.NOT_FOUND, 'Provider not found');
    });
  }

  /**
   * Applies changes to a provider. Runs under the booking lock because the
   * slot set may change, and a booking must see the set it validated against.
   */
  async updateProvider(id: string, changes: Partial<ProviderInput>): Promise<ServiceResult<Provider>> {
    return this.guarded<Provider>('updateProvider', () =>
      this.bookingLock.runExclusive(() =>
        this.modifyProvider('updateProvider', id, (current, records) => {
          const next: Provider = {
            ...current,
            name: changes.name ?? current.name,
            license_code: changes.license_code ?? current.license_code,
            specialty: changes.specialty ?? current.specialty,
            available_slots: changes.available_slots
              ? [...new Set(changes.available_slots)]
              : current.available_slots,
          };
          if (records.some((r) => r.id !== id && r.license_code === next.license_code)) {
            return rejectWrite('License code already registered');
          }
          return next;
        })
      )
    );
  }

  async addProviderSlot(id: string, slot: string): Promise<ServiceResult<Provider>> {
    return this.guarded<Provider>('addProviderSlot', () =>
      this.modifyProvider('addProviderSlot', id, (current) => {
        addSlot(current, slot);
        return current;
      })
    );
  }

  async removeProviderSlot(id: string, slot: string): Promise<ServiceResult<Provider>> {
    return this.guarded<Provider>('removeProviderSlot', () =>
      this.bookingLock.runExclusive(() =>
        this.modifyProvider('removeProviderSlot', id, (current) => {
          removeSlot(current, slot);
          return current;
        })
      )
    );
  }

  /**
   * Deletes a provider. Appointments referencing it are left as they are.
   */
  async deleteProvider(id: string): Promise<ServiceResult<null>> {
    return this.guarded<null>('deleteProvider', async () => {
      const write = await this.store.delete('providers', id);
      if (!write.success) return this.fromWriteFailure('deleteProvider', write, 'Provider not found');

      this.afterWrite('providers', id);
      this.logger.info('Provider deleted', { providerId: id });
      return ok(null, 'Provider removed successfully');
    });
  }

  // ==================== Statistics & maintenance ====================

  async getStatistics(): Promise<ServiceResult<SchedulerStatistics>> {
    return this.guarded<SchedulerStatistics>('getStatistics', async () => {
      const [patients, providers, appointments] = await Promise.all([
        this.patients(),
        this.providers(),
        this.appointments(),
      ]);

      const appointmentsByStatus: Record<AppointmentStatus, number> = {
        scheduled: 0,
        confirmed: 0,
        completed: 0,
        cancelled: 0,
      };
      for (const appointment of appointments) appointmentsByStatus[appointment.status]++;

      return ok(
        {
          totalPatients: patients.length,
          totalProviders: providers.length,
          totalAppointments: appointments.length,
          appointmentsByStatus,
          cache: this.cache.stats(),
        },
        'Statistics computed'
      );
    });
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  clearCache(): void {
    this.cache.clear();
  }

  purgeExpiredCache(): number {
    return this.cache.purgeExpired();
  }

  /** Snapshots every collection file into the backup directory */
  async backupAll(backupDir: string): Promise<ServiceResult<string[]>> {
    return this.guarded<string[]>('backupAll', async () => {
      const created: string[] = [];
      for (const collection of COLLECTIONS) {
        const fileName = await this.store.backup(collection, backupDir);
        if (fileName) created.push(fileName);
      }
      return ok(created, `${created.length} backup(s) created`);
    });
  }

  async listBackups(backupDir: string): Promise<ServiceResult<string[]>> {
    return this.guarded<string[]>('listBackups', async () => {
      const backups = await this.store.listBackups(backupDir);
      return ok(backups, `${backups.length} backup(s)`);
    });
  }

  // ==================== Read-through helpers ====================

  private async patients(): Promise<Patient[]> {
    return decodeAll(await this.cachedCollection('patients'), patientFromRecord, this.logger);
  }

  private async providers(): Promise<Provider[]> {
    return decodeAll(await this.cachedCollection('providers'), providerFromRecord, this.logger);
  }

  private async appointments(): Promise<Appointment[]> {
    return decodeAll(await this.cachedCollection('appointments'), appointmentFromRecord, this.logger);
  }

  private async findPatient(id: string): Promise<Patient | null> {
    const record = await this.cachedRecord('patients', id);
    return record ? patientFromRecord(record) : null;
  }

  private async findProvider(id: string): Promise<Provider | null> {
    const record = await this.cachedRecord('providers', id);
    return record ? providerFromRecord(record) : null;
  }

  /** Read straight from the store: status updates need the authoritative record */
  private async findAppointment(id: string): Promise<Appointment | null> {
    const record = await this.store.findById('appointments', id);
    return record ? appointmentFromRecord(record) : null;
  }

  private async findConflict(
    providerId: string,
    date: string,
    slot: string,
    excludeId?: string
  ): Promise<Appointment | undefined> {
    const appointments = await this.appointments();
    return appointments.find(
      (a) => a.id !== excludeId && isLive(a) && a.provider_id === providerId && a.date === date && a.slot === slot
    );
  }

  /**
   * A load that overlapped a completed write may hold pre-write data, so it
   * is returned to the caller but not cached.
   */
  private async cachedCollection(collection: Collection): Promise<StoredRecord[]> {
    const key = `${collection}:all`;
    const hit = this.cache.get(key);
    if (Array.isArray(hit)) return hit;

    const writesBefore = this.completedWrites;
    const records = await this.store.load(collection);
    if (this.completedWrites === writesBefore) this.cache.set(key, records);
    return records;
  }

  private async cachedRecord(collection: Collection, id: string): Promise<StoredRecord | null> {
    const key = `${SINGULAR[collection]}:${id}`;
    const hit = this.cache.get(key);
    if (hit && !Array.isArray(hit)) return hit;

    const writesBefore = this.completedWrites;
    const record = await this.store.findById(collection, id);
    if (record && this.completedWrites === writesBefore) this.cache.set(key, record);
    return record;
  }

  private afterWrite(collection: Collection, id?: string): void {
    this.completedWrites++;
    if (id !== undefined) this.cache.delete(`${SINGULAR[collection]}:${id}`);
    this.cache.invalidatePattern(collection);
  }

  // ==================== Result plumbing ====================

  private async modifyProvider(
    operation: string,
    id: string,
    change: (current: Provider, records: StoredRecord[]) => Provider | WriteFailure
  ): Promise<ServiceResult<Provider>> {
    const result: { provider?: Provider } = {};
    const write = await this.store.modify('providers', (records) => {
      const index = records.findIndex((r) => r.id === id);
      const current = index === -1 ? null : providerFromRecord(records[index]);
      if (!current) return { success: false, error: 'not_found', message: 'Provider not found' };

      const next = change(current, records);
      if ('success' in next) return next;

      result.provider = next;
      const updated = [...records];
      updated[index] = providerToRecord(next);
      return updated;
    });
    if (!write.success) return this.fromWriteFailure(operation, write, 'Provider not found');
    if (!result.provider) return rejected(ErrorCode.NOT_FOUND, 'Provider not found');

    this.afterWrite('providers', id);
    this.logger.info('Provider updated', { providerId: id, operation });
    return ok(result.provider, 'Provider updated successfully');
  }

  private fromWriteFailure(operation: string, failure: WriteFailure, notFoundMessage?: string): ServiceResult<never> {
    switch (failure.error) {
      case 'not_found':
        return rejected(ErrorCode.NOT_FOUND, notFoundMessage ?? failure.message);
      case 'rejected':
        return rejected(ErrorCode.DUPLICATE_KEY, failure.message);
      case 'io_error':
        return this.failed(operation, failure.message);
    }
  }

  private failed(operation: string, cause: string): ServiceResult<never> {
    this.logger.error('Operation failed', { operation, cause });
    return { kind: 'failed', code: ErrorCode.PERSISTENCE_FAILURE, message: 'Operation failed', cause };
  }

  private async guarded<T>(operation: string, run: () => Promise<ServiceResult<T>>): Promise<ServiceResult<T>> {
    try {
      return await run();
    } catch (error) {
      return this.failed(operation, describeError(error));
    }
  }
}
