/**
 * In-memory session store
 */

import type { Session, SessionStore } from './types.js';

export class MemorySessionStore implements SessionStore {
  private sessions: Map<string, Session> = new Map();

  async get(sessionId: string): Promise<Session | null> {
    return this.sessions.get(sessionId) ?? null;
  }

  async set(sessionId: string, session: Session): Promise<void> {
    this.sessions.set(sessionId, { ...session });
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  async touch(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.lastAccessedAt = new Date();
    }
  }

  async count(): Promise<number> {
    return this.sessions.size;
  }

  /** Remove sessions idle for longer than maxAgeMs; returns their ids */
  cleanup(maxAgeMs: number): string[] {
    const now = Date.now();
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (now - session.lastAccessedAt.getTime() > maxAgeMs) {
        this.sessions.delete(id);
        expired.push(id);
      }
    }

    return expired;
  }
}
