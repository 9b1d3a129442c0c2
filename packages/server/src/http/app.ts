import express from "express";
import type { ErrorRequestHandler, Express, RequestHandler, Response } from "express";
import { isCourseRagError, type Logger, type RagSystem } from "@course-rag/core";
import {
  QueryRequestSchema,
  toValidationIssues,
  type ClearSessionBody,
  type CourseStatsBody,
  type ErrorBody,
  type QueryResponseBody,
} from "./schemas.js";

/** The slice of RagSystem the routes call. */
export type RagService = Pick<RagSystem, "answer" | "courseAnalytics" | "clearSession">;

export interface AppOptions {
  rag: RagService;
  logger: Logger;
}

export function createApp({ rag, logger: log }: AppOptions): Express {
  const app = express();

  app.use(cors);
  app.use(requestLogging(log));
  app.use(express.json({ limit: "512kb" }));

  app.post("/api/query", async (req, res: Response<QueryResponseBody | ErrorBody>, next) => {
    const parsed = QueryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(422).json({ detail: toValidationIssues(parsed.error) });
      return;
    }
    try {
      const result = await rag.answer(parsed.data.query, parsed.data.session_id);
      res.json({
        answer: result.answer,
        sources: result.sources.map((s) => ({ text: s.text, url: s.url ?? null })),
        session_id: result.sessionId,
      });
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/courses", async (_req, res: Response<CourseStatsBody>, next) => {
    try {
      const stats = await rag.courseAnalytics();
      res.json({ total_courses: stats.totalCourses, course_titles: stats.courseTitles });
    } catch (err) {
      next(err);
    }
  });

  app.delete("/api/sessions/:sessionId", (req, res: Response<ClearSessionBody>, next) => {
    const { sessionId } = req.params;
    try {
      rag.clearSession(sessionId);
      res.json({ message: "Session cleared successfully", session_id: sessionId });
    } catch (err) {
      next(err);
    }
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy" });
  });

  app.use(errorHandler(log));

  return app;
}

// Permissive CORS for the browser frontend
const cors: RequestHandler = (req, res, next) => {
  res.header("Access-Control-Allow-Origin", "*");
  res.header("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
  res.header("Access-Control-Allow-Headers", "Content-Type, Authorization");
  if (req.method === "OPTIONS") {
    res.sendStatus(200);
  } else {
    next();
  }
};

function requestLogging(log: Logger): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, "req:start");
    res.on("finish", () => {
      log.debug(
        { method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start },
        "req:done"
      );
    });
    next();
  };
}

/** The `type` tag body-parser puts on the errors it raises, if any. */
function bodyErrorType(err: unknown): unknown {
  return typeof err === "object" && err !== null && "type" in err ? err.type : undefined;
}

function errorHandler(log: Logger): ErrorRequestHandler {
  return (err: unknown, req, res: Response<ErrorBody>, _next) => {
    const bodyError = bodyErrorType(err);
    if (bodyError === "entity.parse.failed") {
      res.status(422).json({ detail: [{ loc: ["body"], msg: "Malformed JSON body" }] });
      return;
    }
    if (bodyError === "entity.too.large") {
      res.status(413).json({ detail: "Request body too large" });
      return;
    }
    if (isCourseRagError(err) && err.code === "session_not_found") {
      res.status(404).json({ detail: err.message });
      return;
    }
    log.error({ err, method: req.method, path: req.path }, "request failed");
    res.status(500).json({ detail: err instanceof Error ? err.message : String(err) });
  };
}
