import express, { type Request, type Response, type NextFunction } from "express";
import { registerRoutes } from "./routes";
import { config, logConfigOnStartup } from "./config";
import { jobScheduler } from "./jobs/scheduler";
import { log } from "./lib/log";
import { reloadSeasons } from "./season/season-loader";
import { seasonRegistry } from "./season/season-registry";

const serverStartTime = Date.now();
let serverReady = false;

function startupLog(stage: string, message: string) {
  const elapsed = Date.now() - serverStartTime;
  console.log(`[STARTUP +${elapsed}ms] ${stage}: ${message}`);
}

startupLog("INIT", "Server starting...");
logConfigOnStartup();

const app = express();

// Health check endpoint - always available, even during startup
app.get("/api/health", (_req, res) => {
  const uptime = Date.now() - serverStartTime;
  res.json({
    status: serverReady ? "ready" : "starting",
    uptime,
    uptimeSeconds: Math.floor(uptime / 1000),
    seasons: seasonRegistry.size,
    timestamp: new Date().toISOString(),
  });
});

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
    if (path.startsWith("/api") || path.startsWith("/curl")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
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

(async () => {
  // A missing or invalid seasons file stops startup
  startupLog("SEASONS", `Loading ${config.seasonsFile}...`);
  const count = reloadSeasons(seasonRegistry, config.seasonsFile);
  startupLog("SEASONS", `${count} seasons registered`);

  startupLog("ROUTES", "Registering routes...");
  const server = await registerRoutes(app);
  startupLog("ROUTES", "Routes registered");

  app.use((err: Error & { status?: number; statusCode?: number }, _req: Request, res: Response, _next: NextFunction) => {
    const status = err.status || err.statusCode || 500;
    const message = err.message || "Internal Server Error";

    if (status >= 500) {
      console.error("[express] Unhandled error:", err);
    }
    res.status(status).json({ error: message });
  });

  startupLog("LISTEN", `Starting server on port ${config.port}...`);
  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    startupLog("LISTEN", `Server listening on port ${config.port}`);
    log(`serving on port ${config.port}`);

    jobScheduler.initializeSeasonJobs();
    jobScheduler.start();
    log("Season jobs initialized and started");

    serverReady = true;
    startupLog("READY", "Server fully initialized and ready to serve requests");
  });

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    jobScheduler.stop();
    server.close(() => process.exit(0));
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
})().catch(error => {
  console.error("[STARTUP] Fatal:", error instanceof Error ? error.message : error);
  process.exit(1);
});
