// =============================================================================
// InMemorySessionStore — Sessions held in process memory
// =============================================================================

import { randomUUID } from "node:crypto";

import type { SessionRecord, SessionStorePort } from "../../ports/session-store.port.js";

export class InMemorySessionStore implements SessionStorePort {
  private readonly sessions: SessionRecord[] = [];

  /** Starts a session and makes it current. */
  async startSession(metadata?: Record<string, unknown>): Promise<SessionRecord> {
    const record: SessionRecord = { id: randomUUID(), createdAt: Date.now(), metadata };
    this.sessions.push(record);
    return { ...record };
  }

  async getCurrentSession(): Promise<SessionRecord | null> {
    const current = this.sessions[this.sessions.length - 1];
    return current ? { ...current } : null;
  }

  async list(): Promise<SessionRecord[]> {
    return this.sessions.map((s) => ({ ...s }));
  }
}
