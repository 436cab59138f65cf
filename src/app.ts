import express, { Express } from "express";
import cors, { CorsOptions } from "cors";
import morgan from "morgan";

import type { RecordStore } from "./domain/types";
import { allowedOrigins, Env } from "./middleware/validateEnv";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

import { createHealthRouter } from "./routes/health";
import { createSeedRouter } from "./routes/seed";
import { createMealsRouter } from "./routes/meals";
import { createSubscriptionsRouter } from "./routes/subscriptions";
import { createPreferencesRouter } from "./routes/preferences";

export interface AppDeps {
  /** null when no database is configured */
  store: RecordStore | null;
  env: Env;
}

export function createApp({ store, env }: AppDeps): Express {
  const app = express();

  const requireStore = (): RecordStore => {
    if (!store) {
      throw new Error("Database is not configured");
    }
    return store;
  };

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING, BODY)
  // ======================================================================

  const origins = allowedOrigins(env);
  const allowlist = origins ? new Set<string>(origins) : null;

  const corsOptions: CorsOptions = {
    origin: (origin, cb) => {
      // no allowlist configured, or a server-to-server request
      if (!allowlist || !origin) return cb(null, true);
      return cb(null, allowlist.has(origin));
    },
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Accept"],
  };

  app.use(cors(corsOptions));
  app.options("*", cors(corsOptions));

  if (env.NODE_ENV !== "test") {
    app.use(morgan("dev"));
  }

  app.use(express.json({ limit: "1mb" }));

  // ======================================================================
  //                                ROUTES
  // ======================================================================

  app.use("/", createHealthRouter(store, env));
  app.use("/seed", createSeedRouter(requireStore));
  app.use("/meals", createMealsRouter(requireStore));
  app.use("/subscriptions", createSubscriptionsRouter(requireStore));
  app.use("/preferences", createPreferencesRouter(requireStore));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
