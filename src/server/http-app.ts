import express, {
  type ErrorRequestHandler,
  type Express,
  type Request,
  type RequestHandler,
} from "express";
import type { Server } from "http";
import type { ServerContext } from "./context.js";
import { isAbortError, isMatchingError } from "../core/errors.js";
import { resolveClientId } from "../core/rate-limiter.js";
import { logDebug, logError, logInfo, getErrorMessage } from "../core/logging.js";
import { toCacheStatsResponse, toSearchResponse } from "./response-formatter.js";

const RATE_LIMIT_MESSAGE = "Too many requests. Please try again later.";

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/** Rate-limit bucket for a request; see resolveClientId for the order. */
export function clientIdFor(req: Request, subjectHeader: string): string {
  return resolveClientId({
    subject: headerValue(req.headers[subjectHeader]),
    forwardedFor: headerValue(req.headers["x-forwarded-for"]),
    realIp: headerValue(req.headers["x-real-ip"]),
    remoteAddress: req.socket?.remoteAddress,
  });
}

export function rateLimitMiddleware(ctx: ServerContext): RequestHandler {
  return (req, res, next) => {
    const decision = ctx.rateLimiter.admit(
      clientIdFor(req, ctx.config.rateLimit.subjectHeader),
    );
    if (!decision.admitted) {
      res.setHeader("Retry-After", String(decision.retryAfterSeconds));
      res.status(429).json({
        error: RATE_LIMIT_MESSAGE,
        retryAfterSeconds: decision.retryAfterSeconds,
      });
      return;
    }
    next();
  };
}

// POST /matches/search
export function searchHandler(ctx: ServerContext): RequestHandler {
  return async (req, res, next) => {
    // Stop waiting if the client goes away before we answer
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort();
    });

    try {
      const body: unknown = req.body;
      const result = await ctx.orchestrator.findMatches(body ?? {}, {
        signal: controller.signal,
      });
      res.json(toSearchResponse(result));
    } catch (error) {
      next(error);
    }
  };
}

// GET /diagnostics/cache-stats
export function cacheStatsHandler(ctx: ServerContext): RequestHandler {
  return (_req, res) => {
    res.json(toCacheStatsResponse(ctx.cache.statistics(), ctx.now()));
  };
}

// POST /diagnostics/clear-cache?pattern=
export function clearCacheHandler(ctx: ServerContext): RequestHandler {
  return async (req, res, next) => {
    try {
      const raw = req.query["pattern"];
      const pattern = (typeof raw === "string" ? raw.trim() : "") || "*";

      if (pattern === "*") {
        await ctx.cache.clear();
        res.json({ message: "All cache entries cleared", pattern });
        return;
      }

      const removed = await ctx.cache.removeByPattern(pattern);
      res.json({
        message: `Removed ${removed} cache entries matching pattern`,
        pattern,
        removed,
      });
    } catch (error) {
      next(error);
    }
  };
}

// GET /diagnostics/health
export function healthHandler(ctx: ServerContext): RequestHandler {
  return (_req, res) => {
    const now = ctx.now();
    res.json({
      status: "ok",
      timestamp: new Date(now).toISOString(),
      uptimeSeconds: Math.floor((now - ctx.startedAt) / 1000),
      searchBackend: ctx.searchBackend,
      remoteCache: ctx.cache.hasRemoteTier,
      trackedClients: ctx.rateLimiter.trackedClients,
    });
  };
}

export const notFoundHandler: RequestHandler = (_req, res) => {
  res.status(404).json({ error: "Route not found" });
};

export const errorHandler: ErrorRequestHandler = (
  err: unknown,
  _req,
  res,
  next,
) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (isMatchingError(err)) {
    if (err.retryAfterSeconds !== undefined) {
      res.setHeader("Retry-After", String(err.retryAfterSeconds));
    }
    res.status(err.statusCode).json({
      error: err.message,
      kind: err.kind,
      retryable: err.retryable,
      ...(err.details !== undefined && { details: err.details }),
      ...(err.retryAfterSeconds !== undefined && {
        retryAfterSeconds: err.retryAfterSeconds,
      }),
    });
    return;
  }

  if (isAbortError(err)) {
    // Client disconnected; nobody is left to read a response
    logDebug("Request aborted by client");
    res.end();
    return;
  }

  // express.json() rejects unparseable bodies with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  logError("Unexpected error", getErrorMessage(err));
  res.status(500).json({ error: "Internal server error" });
};

export function createHttpApp(ctx: ServerContext): Express {
  const app = express();

  app.use(express.json({ limit: "100kb" }));

  app.get("/diagnostics/health", healthHandler(ctx));
  app.get("/diagnostics/cache-stats", cacheStatsHandler(ctx));
  app.post("/diagnostics/clear-cache", clearCacheHandler(ctx));

  app.post("/matches/search", rateLimitMiddleware(ctx), searchHandler(ctx));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export function startHttpServer(ctx: ServerContext): Promise<Server> {
  const app = createHttpApp(ctx);
  return new Promise((resolve) => {
    const server = app.listen(ctx.config.server.port, () => {
      logInfo(`HTTP server listening on port ${ctx.config.server.port}`);
      resolve(server);
    });
  });
}
