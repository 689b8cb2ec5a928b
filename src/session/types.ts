/**
 * Session types for the HR Leave MCP Server
 */

export interface Session {
  /** MCP session identifier (UUID v4) */
  id: string;
  /** Principal id of the API key that opened the session */
  apiKeyId: string;
  /** API key name for logging */
  apiKeyName: string;
  createdAt: Date;
  lastAccessedAt: Date;
}

export interface SessionStore {
  get(sessionId: string): Promise<Session | null>;
  set(sessionId: string, session: Session): Promise<void>;
  delete(sessionId: string): Promise<void>;
  /** Update last accessed timestamp */
  touch(sessionId: string): Promise<void>;
  count(): Promise<number>;
}
