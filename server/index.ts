import express, { type Request, Response, NextFunction } from "express";
import { registerRoutes } from "./routes";
import { log } from "./log";
import { closeDb } from "./db";
import { enforceEnvironment, validateEnvironment } from "./env";
import { generalApiLimiter } from "./rate-limiters";
import { sendError } from "./response-utils";

enforceEnvironment(validateEnvironment());

const app = express();

app.set('trust proxy', 1);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use('/api', generalApiLimiter);

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: Record<string, unknown> | undefined = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson, ...args) {
    capturedJsonResponse = bodyJson;
    return originalResJson.apply(res, [bodyJson, ...args]);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse) {
        logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
      }

      if (logLine.length > 80) {
        logLine = logLine.slice(0, 79) + "…";
      }

      log(logLine);
    }
  });

  next();
});

async function start(): Promise<void> {
  const server = await registerRoutes(app);

  app.use('/api', (req: Request, res: Response) => {
    sendError(res, 404, "NOT_FOUND", `Route ${req.method} ${req.originalUrl} not found`);
  });

  // Body-parser failures and anything passed to next(err)
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    console.error("[ERROR_HANDLER] Unhandled error:", {
      status,
      message,
      stack: err instanceof Error ? err.stack : undefined,
      timestamp: new Date().toISOString(),
      url: req.url,
      method: req.method
    });

    const isProduction = process.env.NODE_ENV === "production";
    const clientMessage = isProduction && status === 500 ? "Internal Server Error" : message;

    sendError(res, status, status >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST", clientMessage);
  });

  const port = parseInt(process.env.PORT || '5000', 10);
  server.listen({
    port,
    host: "0.0.0.0",
  }, () => {
    log(`serving on port ${port}`);
  });

  const gracefulShutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error("[DB_POOL] Failed to close connection pool:", error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

start().catch((error: unknown) => {
  console.error("[STARTUP] Server failed to start:", error);
  process.exit(1);
});
