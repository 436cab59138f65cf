// src/routes/subscriptions.ts
import { Router, Request, Response } from "express";
import { SubscriptionSchema } from "../schema";
import type { RecordStore } from "../domain/types";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendValidationError } from "../middleware/responseHelper";

export function createSubscriptionsRouter(requireStore: () => RecordStore): Router {
  const subscriptionsRouter = Router();

  /**
   * POST /subscriptions
   *
   * Referenced meal ids are stored as given; nothing checks that they exist.
   */
  subscriptionsRouter.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = SubscriptionSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const id = await requireStore().insertSubscription(parsed.data);
      return res.json({ id });
    })
  );

  return subscriptionsRouter;
}
