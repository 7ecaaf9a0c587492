import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createHash } from 'crypto';
import { z } from 'zod';
import { createLogger, describeError, type Logger } from '../logger.js';
import { ErrorCode, type ApiResponse, type BookingRequest, type IdempotencyRecord } from '../types/index.js';

export type IdempotencyCheck =
  | { found: false }
  | { found: true; mismatch: true }
  | { found: true; mismatch: false; status: number; response: ApiResponse };

export interface IdempotentResponse {
  status: number;
  response: ApiResponse;
}

export type IdempotentOutcome = { mismatch: true } | ({ mismatch: false } & IdempotentResponse);

/** A response from the handler, and whether later retries should replay it */
export interface HandlerResponse extends IdempotentResponse {
  persist: boolean;
}

interface InFlight {
  requestHash: string;
  done: Promise<IdempotentResponse>;
}

const storedResponseSchema = z.object({
  success: z.boolean(),
  data: z.unknown().optional(),
  message: z.string().optional(),
  error: z
    .object({
      code: z.nativeEnum(ErrorCode),
      message: z.string(),
      details: z.record(z.unknown()).optional(),
    })
    .optional(),
});

/**
 * Remembers booking responses by Idempotency-Key so a retried request
 * gets the first answer instead of a second booking attempt.
 */
export class IdempotencyStore {
  private db: Database.Database;
  private logger: Logger;
  private inFlight = new Map<string, InFlight>();
  private statements: {
    get: Database.Statement<[string]>;
    insert: Database.Statement<[string, string, number, string]>;
  };

  constructor(dbPath: string, logger?: Logger) {
    this.logger = logger ?? createLogger('idempotency');

    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS idempotency_keys (
        idempotency_key TEXT PRIMARY KEY,
        request_hash TEXT NOT NULL,
        response_status INTEGER NOT NULL,
        response_body TEXT NOT NULL,
        created_at TEXT DEFAULT CURRENT_TIMESTAMP
      );

      CREATE INDEX IF NOT EXISTS idx_idempotency_created ON idempotency_keys(created_at);
    `);

    this.statements = {
      get: this.db.prepare<[string]>(`
        SELECT * FROM idempotency_keys WHERE idempotency_key = ?
      `),
      insert: this.db.prepare<[string, string, number, string]>(`
        INSERT OR IGNORE INTO idempotency_keys (idempotency_key, request_hash, response_status, response_body)
        VALUES (?, ?, ?, ?)
      `),
    };

    this.logger.info('Idempotency store initialized', { dbPath });
  }

  /**
   * Hash of the normalized request body for idempotency comparison
   */
  private hashRequest(request: BookingRequest): string {
    const normalized = JSON.stringify({
      patient_id: request.patient_id,
      provider_id: request.provider_id,
      date: request.date,
      slot: request.slot,
      notes: request.notes ?? '',
    });
    return createHash('sha256').update(normalized).digest('hex');
  }

  /**
   * Looks up a previously stored response.
   * A key reused with a different body is reported as a mismatch.
   */
  check(idempotencyKey: string, request: BookingRequest): IdempotencyCheck {
    const row: unknown = this.statements.get.get(idempotencyKey);
    if (!isIdempotencyRecord(row)) {
      return { found: false };
    }

    if (row.request_hash !== this.hashRequest(request)) {
      return { found: true, mismatch: true };
    }

    const response = this.parseStoredResponse(idempotencyKey, row.response_body);
    if (!response) {
      return { found: false };
    }
    return { found: true, mismatch: false, status: row.response_status, response };
  }

  /**
   * Runs the handler at most once per key.
   *
   * A request arriving while the same key is still being handled waits for
   * that result instead of running the handler again. Stored responses are
   * replayed; a key seen with a different body is a mismatch.
   */
  async execute(
    idempotencyKey: string,
    request: BookingRequest,
    handler: () => Promise<HandlerResponse>
  ): Promise<IdempotentOutcome> {
    const requestHash = this.hashRequest(request);

    const pending = this.inFlight.get(idempotencyKey);
    if (pending) {
      if (pending.requestHash !== requestHash) return { mismatch: true };
      this.logger.debug('Waiting for in-flight request', { idempotencyKey });
      return { mismatch: false, ...(await pending.done) };
    }

    const previous = this.check(idempotencyKey, request);
    if (previous.found) {
      return previous.mismatch
        ? { mismatch: true }
        : { mismatch: false, status: previous.status, response: previous.response };
    }

    const done = handler()
      .then(({ status, response, persist }) => {
        if (persist) this.store(idempotencyKey, request, status, response);
        return { status, response };
      })
      .finally(() => {
        this.inFlight.delete(idempotencyKey);
      });
    this.inFlight.set(idempotencyKey, { requestHash, done });

    return { mismatch: false, ...(await done) };
  }

  store(idempotencyKey: string, request: BookingRequest, status: number, response: ApiResponse): void {
    try {
      this.statements.insert.run(idempotencyKey, this.hashRequest(request), status, JSON.stringify(response));
    } catch (error) {
      this.logger.error('Failed to store idempotency key', { idempotencyKey, error: describeError(error) });
    }
  }

  private parseStoredResponse(idempotencyKey: string, body: string): ApiResponse | null {
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch (error) {
      this.logger.warn('Stored response is not valid JSON, ignoring it', { idempotencyKey, error: describeError(error) });
      return null;
    }

    const parsed = storedResponseSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn('Stored response has an unexpected shape, ignoring it', {
        idempotencyKey,
        error: parsed.error.issues[0]?.message,
      });
      return null;
    }
    return parsed.data;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.logger.info('Idempotency store closed');
    }
  }
}

function isIdempotencyRecord(row: unknown): row is IdempotencyRecord {
  return (
    typeof row === 'object' &&
    row !== null &&
    'request_hash' in row &&
    typeof row.request_hash === 'string' &&
    'response_status' in row &&
    typeof row.response_status === 'number' &&
    'response_body' in row &&
    typeof row.response_body === 'string'
  );
}
