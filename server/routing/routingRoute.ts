import { randomUUID } from "node:crypto";
import type { Express, Request, Response } from "express";
import { z } from "zod";
import { logInfo, logWarn, logError, errorMessage } from "../utils/logger";
import { getGenerationUnavailableMessage } from "../utils/geminiErrors";
import { GenerationUnavailableError, QueryAbortedError } from "./errors";
import { routeQuery, type RoutingDependencies } from "./routingOrchestrator";
import type { PipelineLogContext, Query } from "./types";

export const routeQueryRequestSchema = z.object({
  queryText: z.string().trim().min(1, "queryText is required").max(4000),
  explicitDocumentId: z.string().trim().min(1).optional(),
  conversationId: z.string().trim().min(1, "conversationId is required"),
  webFallbackEnabled: z.boolean().default(false),
});

/**
 * Non-standard status used when the client closed the connection.
 */
export const CLIENT_CLOSED_REQUEST = 499;

export interface HttpError {
  status: number;
  body: { message: string; code: string };
}

export function toHttpError(error: unknown): HttpError {
  if (error instanceof GenerationUnavailableError) {
    return {
      status: 503,
      body: { message: getGenerationUnavailableMessage(), code: "GENERATION_UNAVAILABLE" },
    };
  }
  if (error instanceof QueryAbortedError) {
    return {
      status: CLIENT_CLOSED_REQUEST,
      body: { message: "Request was cancelled", code: "QUERY_ABORTED" },
    };
  }
  return {
    status: 500,
    body: { message: "Failed to process query", code: "INTERNAL_ERROR" },
  };
}

export type DependencyResolver = () => RoutingDependencies;

/**
 * `resolveDependencies` is called once per request so per-request
 * collaborators (such as a memoizing reranker) are never shared.
 */
export function registerRoutingRoutes(app: Express, resolveDependencies: DependencyResolver): void {
  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/api/route/query", async (req: Request, res: Response) => {
    const startTime = Date.now();
    const requestId = randomUUID();

    const parsed = routeQueryRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      logWarn("route_query_invalid_request", {
        requestId,
        stage: "entry",
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return res.status(400).json({
        message: parsed.error.issues[0]?.message ?? "Invalid request",
        code: "INVALID_REQUEST",
      });
    }

    const query: Query = parsed.data;
    const logCtx: PipelineLogContext = { requestId, conversationId: query.conversationId };

    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const response = await routeQuery(query, resolveDependencies(), {
        signal: controller.signal,
        logContext: logCtx,
      });

      logInfo("route_query_complete", {
        ...logCtx,
        stage: "exit",
        responseMode: response.responseMode,
        status: response.status,
        durationMs: Date.now() - startTime,
      });

      return res.json({ requestId, ...response });
    } catch (error) {
      const httpError = toHttpError(error);
      const log = httpError.status >= 500 ? logError : logWarn;
      log("route_query_error", {
        ...logCtx,
        stage: "error",
        statusCode: httpError.status,
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      });

      if (res.headersSent || res.destroyed) return;
      return res.status(httpError.status).json({ requestId, ...httpError.body });
    }
  });
}
