import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import os from 'os';
import path from 'path';
import { mkdtemp, rm } from 'fs/promises';
import Database from 'better-sqlite3';
import { IdempotencyStore, type HandlerResponse } from '../src/db/sqlite.js';
import { ErrorCode, type ApiResponse, type BookingRequest } from '../src/types/index.js';

const KEY = '1b4e28ba-2fa1-41d2-883f-0016d3cca427';

const request: BookingRequest = {
  patient_id: 'P1',
  provider_id: 'M1',
  date: '2025-11-25',
  slot: '09:00',
};

const booked: ApiResponse = { success: true, data: { id: 'C1' }, message: 'Appointment booked successfully' };

describe('IdempotencyStore', () => {
  let store: IdempotencyStore;

  beforeEach(() => {
    store = new IdempotencyStore(':memory:');
  });

  afterEach(() => {
    store.close();
  });

  it('reports unknown keys as not found', () => {
    expect(store.check(KEY, request)).toEqual({ found: false });
  });

  it('replays the stored response for the same request', () => {
    store.store(KEY, request, 201, booked);

    expect(store.check(KEY, request)).toEqual({ found: true, mismatch: false, status: 201, response: booked });
  });

  it('treats absent notes and empty notes as the same request', () => {
    store.store(KEY, request, 201, { success: true });

    expect(store.check(KEY, { ...request, notes: '' })).toMatchObject({ found: true, mismatch: false });
  });

  it('flags a key reused with a different body', () => {
    store.store(KEY, request, 201, { success: true });

    expect(store.check(KEY, { ...request, slot: '10:00' })).toEqual({ found: true, mismatch: true });
  });

  it('keeps the first response when a key is stored twice', () => {
    const conflict: ApiResponse = {
      success: false,
      error: { code: ErrorCode.SLOT_TAKEN, message: 'Slot already booked for this provider' },
    };
    store.store(KEY, request, 409, conflict);
    store.store(KEY, request, 201, { success: true });

    expect(store.check(KEY, request)).toEqual({ found: true, mismatch: false, status: 409, response: conflict });
  });

  it('can be closed twice', () => {
    store.close();
    expect(() => store.close()).not.toThrow();
  });

  describe('execute()', () => {
    it('runs the handler once for concurrent requests with the same key', async () => {
      let finish: (value: HandlerResponse) => void = () => {};
      const handler = vi.fn(
        () =>
          new Promise<HandlerResponse>((resolve) => {
            finish = resolve;
          })
      );

      const first = store.execute(KEY, request, handler);
      const second = store.execute(KEY, request, handler);
      finish({ status: 201, response: booked, persist: true });

      const expected = { mismatch: false, status: 201, response: booked };
      expect(await first).toEqual(expected);
      expect(await second).toEqual(expected);
      expect(handler).toHaveBeenCalledTimes(1);
      expect(store.check(KEY, request)).toEqual({ found: true, mismatch: false, status: 201, response: booked });
    });

    it('reports a different body on an in-flight key as a mismatch', async () => {
      let finish: (value: HandlerResponse) => void = () => {};
      const first = store.execute(
        KEY,
        request,
        () =>
          new Promise<HandlerResponse>((resolve) => {
            finish = resolve;
          })
      );

      const other = await store.execute(KEY, { ...request, slot: '10:00' }, async () => ({
        status: 201,
        response: booked,
        persist: true,
      }));
      finish({ status: 201, response: booked, persist: true });

      expect(other).toEqual({ mismatch: true });
      expect(await first).toMatchObject({ mismatch: false, status: 201 });
    });

    it('replays stored responses without calling the handler', async () => {
      store.store(KEY, request, 409, { success: false });
      const handler = vi.fn(async (): Promise<HandlerResponse> => ({ status: 201, response: booked, persist: true }));

      expect(await store.execute(KEY, request, handler)).toEqual({
        mismatch: false,
        status: 409,
        response: { success: false },
      });
      expect(handler).not.toHaveBeenCalled();
    });

    it('runs the handler again when the previous response was not persisted', async () => {
      const failure: ApiResponse = {
        success: false,
        error: { code: ErrorCode.PERSISTENCE_FAILURE, message: 'Operation failed' },
      };
      await store.execute(KEY, request, async () => ({ status: 500, response: failure, persist: false }));

      const retried = await store.execute(KEY, request, async () => ({ status: 201, response: booked, persist: true }));

      expect(retried).toEqual({ mismatch: false, status: 201, response: booked });
    });

    it('releases the key when the handler rejects', async () => {
      await expect(store.execute(KEY, request, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');

      const retried = await store.execute(KEY, request, async () => ({ status: 201, response: booked, persist: true }));
      expect(retried).toMatchObject({ mismatch: false, status: 201 });
    });
  });
});

describe('IdempotencyStore stored response validation', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'idempotency-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('ignores a stored response that does not match the envelope', () => {
    const dbPath = path.join(dir, 'keys.db');
    const store = new IdempotencyStore(dbPath);
    store.store(KEY, request, 201, booked);

    const raw = new Database(dbPath);
    raw.prepare('UPDATE idempotency_keys SET response_body = ? WHERE idempotency_key = ?').run('{"success": "yes"}', KEY);
    raw.close();

    expect(store.check(KEY, request)).toEqual({ found: false });
    store.close();
  });

  it('ignores a stored response that is not JSON', () => {
    const dbPath = path.join(dir, 'keys.db');
    const store = new IdempotencyStore(dbPath);
    store.store(KEY, request, 201, booked);

    const raw = new Database(dbPath);
    raw.prepare('UPDATE idempotency_keys SET response_body = ? WHERE idempotency_key = ?').run('{broken', KEY);
    raw.close();

    expect(store.check(KEY, request)).toEqual({ found: false });
    store.close();
  });
});
