import { RecordStore } from '../types/capabilities';
import { HistoryTurn, SessionState, SessionSummary } from '../types/session';
import { KeyedLock } from '../utils/keyedLock';
import { PersistenceError, ServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SessionStoreOptions {
  timeoutMinutes: number;
  historyLimit: number;
  clock?: () => Date;
}

/**
 * Owns session lifecycle. The in-memory cache is the only shared mutable state:
 * callers receive working copies from `fetchOrCreate` and hand them back through
 * `save`, so an abandoned turn never leaks into the cache. Turns for one session
 * are serialized with `runExclusive`; different sessions never wait on each other.
 */
export class SessionService {
  private cache = new Map<string, SessionState>();
  private lock = new KeyedLock();
  private readonly timeoutMs: number;
  private readonly historyLimit: number;
  private readonly clock: () => Date;

  constructor(
    private readonly store: RecordStore,
    options: SessionStoreOptions
  ) {
    this.timeoutMs = options.timeoutMinutes * 60 * 1000;
    this.historyLimit = options.historyLimit;
    this.clock = options.clock ?? (() => new Date());
  }

  runExclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    return this.lock.run(sessionId, work);
  }

  createInitial(sessionId: string): SessionState {
    const now = this.clock().toISOString();
    return {
      sessionId,
      activeDomain: 'none',
      stage: 'greeting',
      slots: null,
      awaiting: null,
      createdAt: now,
      lastActiveAt: now,
      history: [],
      ended: false,
    };
  }

  isExpired(session: SessionState): boolean {
    return this.clock().getTime() - new Date(session.lastActiveAt).getTime() > this.timeoutMs;
  }

  /** A working copy of the live session, or a fresh one when it is unknown, ended or expired. */
  async fetchOrCreate(sessionId: string): Promise<SessionState> {
    const existing = this.cache.get(sessionId) ?? (await this.store.get('sessions', sessionId));

    if (existing && !existing.ended && !this.isExpired(existing)) {
      this.cache.set(sessionId, existing);
      return structuredClone(existing);
    }

    if (existing) {
      logger.info('Session expired, starting fresh', {
        sessionId,
        ended: existing.ended,
        lastActiveAt: existing.lastActiveAt,
      });
      this.cache.delete(sessionId);
    } else {
      logger.debug('New session', { sessionId });
    }

    return this.createInitial(sessionId);
  }

  /** Persists then caches. On a store failure the cached state stays as it was. */
  async save(session: SessionState): Promise<void> {
    session.lastActiveAt = this.clock().toISOString();
    if (session.history.length > this.historyLimit) {
      session.history = session.history.slice(-this.historyLimit);
    }

    const snapshot = structuredClone(session);
    try {
      await this.store.put('sessions', session.sessionId, snapshot);
    } catch (error) {
      if (error instanceof ServiceError) throw error;
      throw new PersistenceError('saveSession', toError(error));
    }
    this.cache.set(session.sessionId, snapshot);
  }

  appendTurn(session: SessionState, role: HistoryTurn['role'], content: string): void {
    session.history.push({
      role,
      content,
      domain: session.activeDomain,
      stage: session.stage,
      timestamp: this.clock().toISOString(),
    });
    if (session.history.length > this.historyLimit) {
      session.history = session.history.slice(-this.historyLimit);
    }
  }

  /** Resets the funnel so the next message starts fresh under the same session id. */
  clear(session: SessionState, keepHistory = true): void {
    if (session.slots?.recordId) session.lastRecordId = session.slots.recordId;
    session.activeDomain = 'none';
    session.stage = 'greeting';
    session.slots = null;
    session.awaiting = null;
    if (!keepHistory) session.history = [];
  }

  async end(sessionId: string): Promise<boolean> {
    return this.runExclusive(sessionId, async () => {
      const existing = this.cache.get(sessionId) ?? (await this.store.get('sessions', sessionId));
      if (!existing) return false;

      await this.store.put('sessions', sessionId, { ...existing, ended: true });
      this.cache.delete(sessionId);
      logger.info('Session ended', { sessionId });
      return true;
    });
  }

  async summary(sessionId: string): Promise<SessionSummary | null> {
    const session = this.cache.get(sessionId) ?? (await this.store.get('sessions', sessionId));
    if (!session || session.ended || this.isExpired(session)) return null;

    return {
      sessionId: session.sessionId,
      activeDomain: session.activeDomain,
      stage: session.stage,
      turns: session.history.length,
      createdAt: session.createdAt,
      lastActiveAt: session.lastActiveAt,
      recordId: session.slots?.recordId ?? session.lastRecordId,
    };
  }

  /** Evicts expired sessions from the in-memory cache; returns how many were dropped. */
  cleanupExpired(): number {
    let removed = 0;
    for (const [sessionId, session] of this.cache) {
      if (this.isExpired(session)) {
        this.cache.delete(sessionId);
        removed++;
      }
    }
    if (removed > 0) {
      logger.info('Expired sessions evicted', { removed, remaining: this.cache.size });
    }
    return removed;
  }

  get cachedCount(): number {
    return this.cache.size;
  }
}
