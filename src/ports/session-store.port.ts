// =============================================================================
// SessionStorePort — Access to the current external session
// =============================================================================

export type SessionId = string | number;

export interface SessionRecord {
  id: SessionId;
  createdAt: number;
  metadata?: Record<string, unknown>;
}

export interface SessionStorePort {
  /** Most recently started session, or null when none exists */
  getCurrentSession(): Promise<SessionRecord | null>;
}
