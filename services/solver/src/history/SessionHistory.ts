import { randomUUID } from "node:crypto";

export interface HistoryEntry {
  problem: string;
  solution: string;
  code: string;
  output: string;
  failureReason?: string;
  timestamp: string;
}

export const SESSION_ID_PATTERN = /^session_[0-9a-f]{8}$/u;

export function generateSessionId(): string {
  return `session_${randomUUID().slice(0, 8)}`;
}

export const DEFAULT_MAX_SESSIONS = 1000;

/**
 * Per-session problem log kept in process memory. Each session holds at most
 * `limit` entries and at most `maxSessions` sessions are kept; the oldest
 * entries, and the sessions appended to least recently, are dropped first.
 */
export class SessionHistory {
  private readonly sessions = new Map<string, HistoryEntry[]>();

  constructor(
    private readonly limit: number,
    private readonly maxSessions: number = DEFAULT_MAX_SESSIONS,
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`history limit must be a positive integer, received ${limit}`);
    }
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new RangeError(`session limit must be a positive integer, received ${maxSessions}`);
    }
  }

  append(sessionId: string, entry: HistoryEntry): void {
    const entries = this.sessions.get(sessionId) ?? [];
    entries.push(entry);
    if (entries.length > this.limit) {
      entries.splice(0, entries.length - this.limit);
    }
    // Map order doubles as recency: re-inserting moves the session to the end.
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, entries);
    this.evictOverflow();
  }

  list(sessionId: string): HistoryEntry[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /** Returns how many entries were dropped. */
  reset(sessionId: string): number {
    const cleared = this.sessions.get(sessionId)?.length ?? 0;
    this.sessions.delete(sessionId);
    return cleared;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  private evictOverflow(): void {
    for (const sessionId of this.sessions.keys()) {
      if (this.sessions.size <= this.maxSessions) {
        return;
      }
      this.sessions.delete(sessionId);
    }
  }
}
