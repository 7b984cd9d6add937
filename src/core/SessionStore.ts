/**
 * Session Store
 *
 * Owns every session's mutable state, keyed by session id, with one lock
 * per session.
 *
 * @module core/SessionStore
 */

import { Mutex } from 'async-mutex';
import type { SessionSnapshot } from '../types/index.js';
import { NavigationHistory } from './NavigationHistory.js';
import { DEFAULT_ROOT_ID, DEFAULT_SETTINGS } from '../utils/constants.js';

/**
 * Mutable state of one conversation. Retrieved from the store and passed
 * by reference through a turn.
 */
export interface SessionState {
  readonly sessionId: string;
  currentNodeId: string;
  readonly history: NavigationHistory;
  readonly createdAt: Date;
  lastActiveAt: Date;
  turnCount: number;
}

export interface SessionStoreOptions {
  /** Node id new sessions start on (default: 'root') */
  rootId?: string;
  /** Maximum navigation history depth per session (default: 10) */
  historyMaxDepth?: number;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Session table partitioned by session id.
 *
 * Turns for the same session are serialized with `runExclusive`; different
 * sessions never wait on each other.
 */
export class SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly locks = new Map<string, Mutex>();
  readonly rootId: string;
  readonly historyMaxDepth: number;
  private readonly now: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.rootId = options.rootId ?? DEFAULT_ROOT_ID;
    this.historyMaxDepth = options.historyMaxDepth ?? DEFAULT_SETTINGS.historyMaxDepth;
    this.now = options.now ?? (() => new Date());
  }

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Fetch a session, creating it on the root node on first use.
   */
  getOrCreate(sessionId: string): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const createdAt = this.now();
    const session: SessionState = {
      sessionId,
      currentNodeId: this.rootId,
      history: new NavigationHistory(this.historyMaxDepth),
      createdAt,
      lastActiveAt: createdAt,
      turnCount: 0,
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  /**
   * Record activity on a session (called once per turn).
   */
  touch(session: SessionState): void {
    session.lastActiveAt = this.now();
    session.turnCount++;
  }

  /**
   * Read-only copy of a session. Unknown sessions are reported on the root
   * node with an empty history and are not created.
   */
  snapshot(sessionId: string): SessionSnapshot {
    const session = this.sessions.get(sessionId);
    if (!session) {
      const now = this.now().toISOString();
      return {
        sessionId,
        currentNodeId: this.rootId,
        history: [],
        turnCount: 0,
        createdAt: now,
        lastActiveAt: now,
      };
    }
    return {
      sessionId,
      currentNodeId: session.currentNodeId,
      history: session.history.toArray(),
      turnCount: session.turnCount,
      createdAt: session.createdAt.toISOString(),
      lastActiveAt: session.lastActiveAt.toISOString(),
    };
  }

  delete(sessionId: string): boolean {
    const lock = this.locks.get(sessionId);
    if (lock && !lock.isLocked()) {
      this.locks.delete(sessionId);
    }
    return this.sessions.delete(sessionId);
  }

  /**
   * Drop sessions idle for longer than `maxIdleMs`.
   *
   * @returns Number of sessions removed
   */
  evictIdle(maxIdleMs: number): number {
    const cutoff = this.now().getTime() - maxIdleMs;
    const stale: string[] = [];
    for (const [id, session] of this.sessions) {
      if (session.lastActiveAt.getTime() < cutoff) {
        stale.push(id);
      }
    }
    for (const id of stale) {
      this.delete(id);
    }
    return stale.length;
  }

  /**
   * Run `fn` while holding the session's lock.
   *
   * THREAD-SAFE: two calls for the same session id never overlap.
   */
  async runExclusive<T>(sessionId: string, fn: () => T | Promise<T>): Promise<T> {
    let lock = this.locks.get(sessionId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(sessionId, lock);
    }
    return lock.runExclusive(fn);
  }

  get size(): number {
    return this.sessions.size;
  }

  sessionIds(): string[] {
    return [...this.sessions.keys()];
  }
}
