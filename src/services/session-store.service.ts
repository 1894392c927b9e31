import { SessionRecord, SessionStore } from '../types/session';
import { ServiceError } from '../utils/errors';
import { logger } from '../utils/logger';

const KEY_PREFIX = 'booking-session:';

/** The subset of the node-redis client the store needs. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options: { EX: number }): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class RedisSessionStore implements SessionStore {
  constructor(private client: RedisLike, private ttlSeconds: number) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    let data: string | null;
    try {
      data = await this.client.get(`${KEY_PREFIX}${sessionId}`);
    } catch (error) {
      throw new ServiceError('redis', 'get', toError(error));
    }
    if (!data) return null;

    try {
      const parsed: SessionRecord = JSON.parse(data);
      return parsed;
    } catch (error) {
      logger.warn('Discarding unreadable session', { sessionId, error: toError(error).message });
      await this.delete(sessionId);
      return null;
    }
  }

  async set(record: SessionRecord): Promise<void> {
    try {
      await this.client.set(`${KEY_PREFIX}${record.id}`, JSON.stringify(record), { EX: this.ttlSeconds });
    } catch (error) {
      throw new ServiceError('redis', 'set', toError(error));
    }
  }

  async delete(sessionId: string): Promise<void> {
    try {
      await this.client.del(`${KEY_PREFIX}${sessionId}`);
    } catch (error) {
      throw new ServiceError('redis', 'del', toError(error));
    }
  }
}

interface StoredSession {
  json: string;
  expiresAt: number;
}

/** Process-local store with the same TTL and copy-on-read behavior as Redis. */
export class InMemorySessionStore implements SessionStore {
  private sessions = new Map<string, StoredSession>();

  constructor(private ttlSeconds: number, private now: () => number = Date.now) {}

  async get(sessionId: string): Promise<SessionRecord | null> {
    const stored = this.sessions.get(sessionId);
    if (!stored) return null;
    if (stored.expiresAt <= this.now()) {
      this.sessions.delete(sessionId);
      return null;
    }
    const record: SessionRecord = JSON.parse(stored.json);
    return record;
  }

  async set(record: SessionRecord): Promise<void> {
    this.sessions.set(record.id, {
      json: JSON.stringify(record),
      expiresAt: this.now() + this.ttlSeconds * 1000,
    });
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
