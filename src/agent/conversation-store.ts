/**
 * Conversation Store
 *
 * Per-session history as a sliding window of exchanges: once a session
 * holds `maxHistory` exchanges, adding one drops the oldest. At most
 * `maxSessions` sessions are kept; the least recently used one goes first.
 *
 * Created once per process and passed to the orchestrator; nothing is
 * persisted.
 */

import { ValidationError } from '../errors/index.js';
import type { Exchange } from './types.js';

/** Exchanges kept per session when not configured */
export const DEFAULT_MAX_HISTORY = 2;

/** Sessions kept before the least recently used is evicted */
export const DEFAULT_MAX_SESSIONS = 1000;

export class ConversationStore {
  private readonly sessions = new Map<string, Exchange[]>();
  private counter = 0;

  /**
   * @param maxHistory - Exchanges kept per session; 0 disables history
   * @param maxSessions - Sessions kept at once
   * @throws ValidationError when maxHistory is not a non-negative integer
   *   or maxSessions is not a positive one
   */
  constructor(
    readonly maxHistory: number = DEFAULT_MAX_HISTORY,
    readonly maxSessions: number = DEFAULT_MAX_SESSIONS
  ) {
    if (!Number.isInteger(maxHistory) || maxHistory < 0) {
      throw new ValidationError('Invalid history size', [
        `maxHistory must be a non-negative integer (got ${maxHistory})`,
      ]);
    }
    if (!Number.isInteger(maxSessions) || maxSessions < 1) {
      throw new ValidationError('Invalid session limit', [
        `maxSessions must be a positive integer (got ${maxSessions})`,
      ]);
    }
  }

  /**
   * Start an empty session: `session_1`, `session_2`, ...
   */
  createSession(): string {
    let id: string;
    do {
      this.counter++;
      id = `session_${this.counter}`;
    } while (this.sessions.has(id));

    this.store(id, []);
    return id;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Oldest first; empty for unknown sessions */
  getHistory(sessionId: string): Exchange[] {
    return (this.sessions.get(sessionId) ?? []).map((exchange) => ({ ...exchange }));
  }

  /**
   * History as prompt text, or undefined when there is none.
   *
   * @example
   * ```
   * User: Hi
   * Assistant: Hello!
   * ```
   */
  formatHistory(sessionId: string): string | undefined {
    const history = this.sessions.get(sessionId);
    if (!history || history.length === 0) {
      return undefined;
    }
    return history
      .map((exchange) => `User: ${exchange.query}\nAssistant: ${exchange.answer}`)
      .join('\n');
  }

  /**
   * Append an exchange, creating the session if it is unknown.
   */
  addExchange(sessionId: string, query: string, answer: string): void {
    const history = this.sessions.get(sessionId) ?? [];
    history.push({ query, answer });
    if (history.length > this.maxHistory) {
      history.splice(0, history.length - this.maxHistory);
    }
    this.store(sessionId, history);
  }

  /** Forget a session's exchanges; the id stays valid */
  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }

  clear(): void {
    this.sessions.clear();
  }

  /** Number of known sessions */
  get size(): number {
    return this.sessions.size;
  }

  // Map order doubles as recency: re-inserting moves a session to the end
  private store(sessionId: string, history: Exchange[]): void {
    this.sessions.delete(sessionId);
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
    this.sessions.set(sessionId, history);
  }
}
