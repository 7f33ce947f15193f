import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from "express";

import { registerRoutingRoutes, type DependencyResolver } from "./routing/routingRoute";
import { logError, getLogger } from "./utils/logger";

interface HttpErrorLike {
  status?: unknown;
  statusCode?: unknown;
  message?: unknown;
  stack?: unknown;
}

function statusOf(err: HttpErrorLike): number {
  const candidate = err.status ?? err.statusCode;
  return typeof candidate === "number" && candidate >= 400 && candidate < 600 ? candidate : 500;
}

export function createApp(resolveDependencies: DependencyResolver): Express {
  const app = express();
  const logger = getLogger();

  app.use(express.json({ limit: "100kb" }));

  // Request logging middleware using pino
  app.use((req, res, next) => {
    const start = Date.now();
    const reqPath = req.path;

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (reqPath.startsWith("/api")) {
        logger.info({
          method: req.method,
          path: reqPath,
          statusCode: res.statusCode,
          durationMs: duration,
        }, "api_request");
      }
    });

    next();
  });

  registerRoutingRoutes(app, resolveDependencies);

  app.use((err: HttpErrorLike, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    const message = status < 500 && typeof err.message === "string" ? err.message : "Internal Server Error";

    // Log the error but don't throw it - that causes connection issues
    logError("server_error", {
      statusCode: status,
      message: typeof err.message === "string" ? err.message : undefined,
      stack: typeof err.stack === "string" ? err.stack.slice(0, 500) : undefined,
    });

    if (res.headersSent) return;
    res.status(status).json({ message });
  });

  return app;
}
