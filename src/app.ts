import cors from "cors";
import express, { type Express } from "express";
import { createAuthRouter } from "./routes/auth.js";
import { createCoachRouter } from "./routes/coach.js";
import { errorHandler, type AppDeps } from "./routes/http.js";
import { createLessonsRouter } from "./routes/lessons.js";
import { createProtectedRouter } from "./routes/protected.js";

export const APP_VERSION = "1.0.0";

/** Base64 images up to the provider's byte limit need room beyond the default 100kb. */
const JSON_BODY_LIMIT = "12mb";

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.get("/", (_req, res) => {
    res.json({ message: "Learning coach API", version: APP_VERSION });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "healthy",
      store: deps.config.storeBackend,
      llmConfigured: deps.llmConfigured,
      embeddingsConfigured: deps.embeddingsConfigured,
    });
  });

  app.use("/api/v1/auth", createAuthRouter(deps));
  app.use("/api/v1/protected", createProtectedRouter(deps));
  app.use("/api/v1", createLessonsRouter(deps));
  app.use("/api/v1", createCoachRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ ok: false, error: "Not found", code: "not_found" });
  });
  app.use(errorHandler);
  return app;
}
