import { randomUUID } from "node:crypto";

export interface Exchange {
  readonly user: string;
  readonly assistant: string;
}

export interface SessionStoreOptions {
  /** Exchanges retained per session; the oldest is evicted first. */
  maxExchanges: number;
}

/**
 * In-memory conversational history, bounded per session.
 *
 * Every mutation runs synchronously, so turns interleaving on the event loop
 * can never observe or overwrite a half-applied update to the same session.
 * There is no expiry: sessions live until `clearSession()`.
 */
export class SessionStore {
  private readonly sessions = new Map<string, Exchange[]>();
  private readonly maxExchanges: number;

  constructor(options: SessionStoreOptions) {
    if (!Number.isInteger(options.maxExchanges) || options.maxExchanges < 0) {
      throw new RangeError(
        `maxExchanges must be a non-negative integer, got ${options.maxExchanges}`
      );
    }
    this.maxExchanges = options.maxExchanges;
  }

  createSession(): string {
    const sessionId = randomUUID();
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  /**
   * Retained exchanges as "User: …" / "Assistant: …" lines, oldest first.
   * Unknown and empty sessions render as "".
   */
  getHistory(sessionId: string): string {
    const exchanges = this.sessions.get(sessionId);
    if (!exchanges || exchanges.length === 0) {
      return "";
    }

    return exchanges
      .map((e) => `User: ${e.user}\nAssistant: ${e.assistant}`)
      .join("\n");
  }

  /** Appends one exchange, creating the session if it is not tracked yet. */
  addExchange(sessionId: string, user: string, assistant: string): void {
    const current = this.sessions.get(sessionId) ?? [];
    const next = [...current, { user, assistant }];
    // slice(-0) would keep everything
    this.sessions.set(
      sessionId,
      this.maxExchanges === 0 ? [] : next.slice(-this.maxExchanges)
    );
  }

  /** Drops the session. Returns false when it was not tracked. */
  clearSession(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  exchanges(sessionId: string): readonly Exchange[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  get size(): number {
    return this.sessions.size;
  }

  get windowSize(): number {
    return this.maxExchanges;
  }
}
