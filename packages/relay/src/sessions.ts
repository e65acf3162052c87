import type { SessionState, WebSocketSession } from "./session.js";
import { formatTarget } from "./upstream.js";

interface TrackedSession {
  session: WebSocketSession;
  controller: AbortController;
}

export interface SessionSummary {
  id: string;
  target: string;
  state: SessionState["status"];
  startedAt: string;
}

/**
 * Tracks the sessions a proxy is running.
 *
 * Responsibilities:
 * - Hold each session's shutdown controller
 * - List live sessions for the status endpoint
 * - Raise every shutdown signal when the proxy stops
 */
export class SessionManager {
  /** Live sessions by id */
  private sessions = new Map<string, TrackedSession>();

  /** Track a session; `controller` owns the signal the session polls */
  add(session: WebSocketSession, controller: AbortController): void {
    this.sessions.set(session.id, { session, controller });
  }

  remove(session: WebSocketSession): void {
    this.sessions.delete(session.id);
  }

  has(id: string): boolean {
    return this.sessions.has(id);
  }

  /**
   * Raise the shutdown signal of one session.
   *
   * @returns false if no such session is tracked
   */
  stop(id: string): boolean {
    const tracked = this.sessions.get(id);
    if (!tracked) return false;
    tracked.controller.abort();
    return true;
  }

  /**
   * Raise every session's shutdown signal. Sessions notice at their next
   * multiplexing cycle and remove themselves as they finish.
   *
   * @returns The number of sessions signalled
   */
  stopAll(): number {
    for (const { controller } of this.sessions.values()) {
      controller.abort();
    }
    return this.sessions.size;
  }

  getActiveCount(): number {
    return this.sessions.size;
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values(), ({ session }) => ({
      id: session.id,
      target: formatTarget(session.target),
      state: session.currentState.status,
      startedAt: session.startedAt.toISOString(),
    }));
  }
}
