import express, { Express, Request, Response, NextFunction } from "express";
import cors from "cors";
import { config } from "./config";
import { PatternCatalog } from "./catalog/patternCatalog";
import { LeadQuestionAnswerer } from "./services/chat";
import { tenantAuth } from "./middleware/tenantAuth";
import { createScoreRouter } from "./routes/scoreLead";
import { createChatRouter } from "./routes/chat";

export const SERVICE_VERSION = "1.0.0";

export interface AppDependencies {
  catalog: PatternCatalog;
  /** Optional hosted-generation collaborator behind /chat */
  answerer: LeadQuestionAnswerer | null;
}

export function createApp({ catalog, answerer }: AppDependencies): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: config.bodyLimit }));

  app.get("/", (_req, res) => {
    res.json({
      name: "Lead Signal Scoring API",
      version: SERVICE_VERSION,
      catalog_version: catalog.version,
      endpoints: {
        "/health": "Health check",
        "/score": "Score a single lead (POST)",
        "/score/batch": "Score multiple leads (POST)",
        "/score/csv": "Score a CSV upload (POST text/csv)",
        "/chat": "Ask a question about scored leads (POST)",
        "/chat/suggestions": "Suggested questions for scored leads (POST)",
      },
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      timestamp: new Date().toISOString(),
      catalog_loaded: true,
      chat_enabled: answerer !== null,
    });
  });

  // Mount routes
  app.use("/score", tenantAuth, createScoreRouter(catalog));
  app.use("/chat", tenantAuth, createChatRouter(answerer));

  app.use(handleError);

  return app;
}

/**
 * Body-parser failures (bad JSON, oversized body) carry their own status
 */
function handleError(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status =
    typeof err === "object" && err !== null && "status" in err && typeof err.status === "number"
      ? err.status
      : 500;
  const message = err instanceof Error ? err.message : "Unknown error";

  if (status >= 500) {
    console.error(`[server] Unhandled error:`, message);
  }
  res.status(status).json({ error: message });
}
