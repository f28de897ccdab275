/**
 * Session Store
 *
 * Persists session records in the KV store under ['sessions', key].
 * Records are never shared between requests: every read returns a copy and
 * every save is a whole-record write, so concurrent saves of one session
 * resolve last-writer-wins.
 */

import { z } from 'zod';
import { generateKey } from '../security/token.ts';
import { KVValueSchema, type KVStore, type KVValue } from '../orm/kv.ts';

export type SessionValue = KVValue;
export type SessionData = { [key: string]: SessionValue };

/**
 * Stored session record. Timestamps are epoch milliseconds; records written
 * before client binding existed read back with null fingerprints.
 */
const SessionRecordSchema = z.object({
  sessionKey: z.string(),
  data: z.record(KVValueSchema),
  createdAt: z.number(),
  lastActive: z.number(),
  userAgent: z.string().nullable().default(null),
  ipAddress: z.string().nullable().default(null),
});

export type SessionRecord = z.infer<typeof SessionRecordSchema>;

export interface SessionFingerprint {
  userAgent: string | null;
  ipAddress: string | null;
}

const SESSION_KEY_PATTERN = /^[A-Za-z0-9_-]{16,128}$/;

/**
 * Check a cookie value could be a key issued by this store
 */
export function isValidSessionKey(value: string): boolean {
  return SESSION_KEY_PATTERN.test(value);
}

/**
 * A session expires once maxAge seconds have passed since creation.
 */
export function isExpired(record: SessionRecord, maxAgeSeconds: number, now = Date.now()): boolean {
  return now - record.createdAt >= maxAgeSeconds * 1000;
}

export class SessionStore {
  private readonly namespace: string;

  constructor(private readonly kv: KVStore, namespace = 'sessions') {
    this.namespace = namespace;
  }

  /**
   * Fetch a record by key; null for unknown, malformed or corrupt entries
   */
  async get(sessionKey: string): Promise<SessionRecord | null> {
    if (!isValidSessionKey(sessionKey)) {
      return null;
    }
    const value = await this.kv.get([this.namespace, sessionKey]);
    return parseSessionRecord(value);
  }

  /**
   * Issue a fresh session and persist it immediately
   */
  async create(fingerprint: Partial<SessionFingerprint> = {}): Promise<SessionRecord> {
    const now = Date.now();
    const record: SessionRecord = {
      sessionKey: generateKey(32),
      data: {},
      createdAt: now,
      lastActive: now,
      userAgent: fingerprint.userAgent ?? null,
      ipAddress: fingerprint.ipAddress ?? null,
    };
    await this.kv.set([this.namespace, record.sessionKey], record);
    return record;
  }

  /**
   * Write the record back and refresh its last-active time
   */
  async save(record: SessionRecord): Promise<SessionRecord> {
    const saved: SessionRecord = { ...record, lastActive: Date.now() };
    await this.kv.set([this.namespace, saved.sessionKey], saved);
    return saved;
  }

  /**
   * All stored records, oldest first
   */
  async list(): Promise<SessionRecord[]> {
    const entries = await this.kv.list([this.namespace]);
    const records: SessionRecord[] = [];
    for (const entry of entries) {
      const record = parseSessionRecord(entry.value);
      if (record) records.push(record);
    }
    return records.sort((a, b) => a.createdAt - b.createdAt);
  }
}

/**
 * Validate a stored value into a SessionRecord; null when it does not fit
 */
export function parseSessionRecord(value: unknown): SessionRecord | null {
  const result = SessionRecordSchema.safeParse(value);
  return result.success ? result.data : null;
}
