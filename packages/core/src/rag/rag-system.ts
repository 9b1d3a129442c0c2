import type { Logger } from "pino";
import type { Citation } from "../interfaces/tool.js";
import type { SessionStore } from "../session/session-store.js";
import type { ToolRegistry } from "../tools/tool-registry.js";
import type { GenerationLoop, GenerationResult } from "../runtime/generation-loop.js";
import { SessionNotFoundError } from "../errors.js";
import { disabledLogger } from "../logging/logger.js";

/** Source of the catalog figures reported alongside answers. */
export interface CourseAnalyticsProvider {
  getCourseCount(): Promise<number>;
  getExistingCourseTitles(): Promise<string[]>;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

export interface RagAnswer {
  answer: string;
  sources: Citation[];
  sessionId: string;
}

export interface RagSystemOptions {
  loop: GenerationLoop;
  tools: ToolRegistry;
  sessions: SessionStore;
  analytics: CourseAnalyticsProvider;
  logger?: Logger | undefined;
}

/**
 * RagSystem is the per-query façade: session bookkeeping around one
 * generation turn. A turn that fails leaves the session history untouched.
 */
export class RagSystem {
  private readonly loop: GenerationLoop;
  private readonly tools: ToolRegistry;
  private readonly sessions: SessionStore;
  private readonly analytics: CourseAnalyticsProvider;
  private readonly log: Logger;

  constructor(options: RagSystemOptions) {
    this.loop = options.loop;
    this.tools = options.tools;
    this.sessions = options.sessions;
    this.analytics = options.analytics;
    this.log = options.logger ?? disabledLogger();
  }

  async answer(query: string, sessionId?: string | null): Promise<RagAnswer> {
    const created = !sessionId;
    const id = sessionId ? sessionId : this.sessions.createSession();
    const startMs = Date.now();

    let result: GenerationResult;
    try {
      result = await this.loop.generate({
        query,
        history: this.sessions.getHistory(id),
        tools: this.tools.declarations(),
        executor: this.tools,
      });
    } catch (err) {
      // the caller never sees an id minted for a failed turn
      if (created) this.sessions.clearSession(id);
      throw err;
    }

    this.sessions.addExchange(id, query, result.answer);

    this.log.info(
      {
        sessionId: id,
        modelCalls: result.transcript.modelCalls,
        toolCalls: result.transcript.invocations.length,
        sources: result.citations.length,
        durationMs: Date.now() - startMs,
      },
      "query answered"
    );

    return { answer: result.answer, sources: result.citations, sessionId: id };
  }

  async courseAnalytics(): Promise<CourseAnalytics> {
    const [totalCourses, courseTitles] = await Promise.all([
      this.analytics.getCourseCount(),
      this.analytics.getExistingCourseTitles(),
    ]);
    return { totalCourses, courseTitles };
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.hasSession(sessionId);
  }

  /** Throws SessionNotFoundError for ids with no tracked history. */
  clearSession(sessionId: string): void {
    if (!this.sessions.clearSession(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    this.log.info({ sessionId }, "session cleared");
  }
}
