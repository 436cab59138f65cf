// src/routes/preferences.ts
import { Router, Request, Response } from "express";
import { PreferenceSchema } from "../schema";
import type { RecordStore } from "../domain/types";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendValidationError } from "../middleware/responseHelper";

export function createPreferencesRouter(requireStore: () => RecordStore): Router {
  const preferencesRouter = Router();

  /**
   * POST /preferences
   *
   * Replaces the whole preference document for this email, or inserts it.
   * Fields omitted by the caller fall back to their defaults, not to the
   * previously stored values.
   */
  preferencesRouter.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = PreferenceSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      await requireStore().upsertPreference(parsed.data);
      return res.json({ status: "ok" });
    })
  );

  return preferencesRouter;
}
