import { getRedisClient } from '../config/redis';
import type { InterviewSession, QuizSession } from '../models/types';
import { ApiError } from '../middlewares/errorHandler';
import { isRecord } from '../utils/requestFields';

export interface SessionRecord {
  sessionId: string;
}

export interface SessionStore<T extends SessionRecord> {
  get(sessionId: string): Promise<T | null>;
  save(session: T): Promise<void>;
  delete(sessionId: string): Promise<boolean>;
}

export type SessionGuard<T> = (value: unknown) => value is T;

export const isInterviewSession: SessionGuard<InterviewSession> = (value): value is InterviewSession =>
  isRecord(value) &&
  value.kind === 'interview' &&
  typeof value.sessionId === 'string' &&
  Array.isArray(value.questions) &&
  Array.isArray(value.responses) &&
  Array.isArray(value.feedback);

export const isQuizSession: SessionGuard<QuizSession> = (value): value is QuizSession =>
  isRecord(value) &&
  value.kind === 'quiz' &&
  typeof value.sessionId === 'string' &&
  Array.isArray(value.questions) &&
  Array.isArray(value.selections);

/**
 * In-process store; entries expire after `ttlSeconds` like the Redis keys do.
 * Expired entries are dropped on read and swept on every save.
 */
export class MemorySessionStore<T extends SessionRecord> implements SessionStore<T> {
  private entries = new Map<string, { session: T; expiresAt: number }>();

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {}

  get size(): number {
    return this.entries.size;
  }

  async get(sessionId: string): Promise<T | null> {
    const entry = this.entries.get(sessionId);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(sessionId);
      return null;
    }

    return structuredClone(entry.session);
  }

  async save(session: T): Promise<void> {
    const now = this.now();
    this.evictExpired(now);
    this.entries.set(session.sessionId, {
      session: structuredClone(session),
      expiresAt: now + this.ttlSeconds * 1000,
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.entries.delete(sessionId);
  }

  private evictExpired(now: number): void {
    for (const [sessionId, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(sessionId);
    }
  }
}

export class RedisSessionStore<T extends SessionRecord> implements SessionStore<T> {
  constructor(
    private readonly namespace: string,
    private readonly ttlSeconds: number,
    private readonly isSession: SessionGuard<T>
  ) {}

  private key(sessionId: string): string {
    return `${this.namespace}:${sessionId}`;
  }

  async get(sessionId: string): Promise<T | null> {
    let stateJson: string | null;
    try {
      stateJson = await getRedisClient().get(this.key(sessionId));
    } catch (error) {
      console.error('[SessionRepository] Error reading session:', error);
      throw new ApiError(500, 'Failed to fetch session');
    }

    if (!stateJson) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(stateJson);
    } catch {
      parsed = null;
    }

    if (!this.isSession(parsed)) {
      console.warn(`⚠️ Discarding malformed session record ${this.key(sessionId)}`);
      return null;
    }
    return parsed;
  }

  async save(session: T): Promise<void> {
    try {
      await getRedisClient().set(this.key(session.sessionId), JSON.stringify(session), { EX: this.ttlSeconds });
    } catch (error) {
      console.error('[SessionRepository] Error saving session:', error);
      throw new ApiError(500, 'Failed to save session');
    }
  }

  async delete(sessionId: string): Promise<boolean> {
    try {
      const removed = await getRedisClient().del(this.key(sessionId));
      return removed > 0;
    } catch (error) {
      console.error('[SessionRepository] Error deleting session:', error);
      throw new ApiError(500, 'Failed to delete session');
    }
  }
}
