import express, { type Express, type Request, type Response, type NextFunction } from "express";
import { registerRoutes } from "./routes";
import { log } from "./lib/log";
import type { ScanOrchestrator } from "./services/orchestrator";

export interface CreateAppOptions {
  requestLogging?: boolean;
}

export function createApp(orchestrator: ScanOrchestrator, options: CreateAppOptions = {}): Express {
  const app = express();

  app.use(express.json({ limit: "10mb" }));
  app.use(express.urlencoded({ extended: false }));

  if (options.requestLogging ?? true) {
    app.use((req, res, next) => {
      const start = Date.now();
      const path = req.path;
      let capturedJsonResponse: unknown = undefined;

      const originalResJson = res.json;
      res.json = function (bodyJson) {
        capturedJsonResponse = bodyJson;
        return originalResJson.call(res, bodyJson);
      };

      res.on("finish", () => {
        const duration = Date.now() - start;
        if (path.startsWith("/api")) {
          let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
          if (capturedJsonResponse !== undefined) {
            logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
          }
          if (logLine.length > 160) {
            logLine = logLine.slice(0, 159) + "…";
          }

          log(logLine);
        }
      });

      next();
    });
  }

  registerRoutes(app, orchestrator);

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }

    // body-parser marks malformed JSON and oversized bodies with a client status
    const status = err instanceof Error && "status" in err && typeof err.status === "number" ? err.status : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";
    if (status >= 500) {
      console.error("Unhandled request error:", err);
    }

    res.status(status).json({ error: status >= 500 ? "Internal Server Error" : message });
  });

  return app;
}
