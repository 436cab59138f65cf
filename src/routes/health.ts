// src/routes/health.ts
import { Router, Request, Response } from "express";
import type { RecordStore } from "../domain/types";
import type { Env } from "../middleware/validateEnv";
import { asyncHandler } from "../middleware/asyncHandler";
import { diagnoseStore } from "../services/diagnostics";

export const SERVICE_MESSAGE = "Protein-focused Food Delivery Backend";

export function createHealthRouter(store: RecordStore | null, env: Env): Router {
  const healthRouter = Router();

  healthRouter.get("/", (_req: Request, res: Response) => {
    res.status(200).json({ message: SERVICE_MESSAGE });
  });

  healthRouter.get("/health", (_req: Request, res: Response) => {
    res.status(200).send("ok");
  });

  /**
   * GET /test
   * Store diagnostics; always 200, failures are reported as status text.
   */
  healthRouter.get(
    "/test",
    asyncHandler(async (_req: Request, res: Response) => {
      const report = await diagnoseStore(store, env);
      return res.status(200).json(report);
    })
  );

  return healthRouter;
}
