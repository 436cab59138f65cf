// src/routes/seed.ts
import { Router, Request, Response } from "express";
import type { RecordStore } from "../domain/types";
import { INITIAL_MEALS } from "../data/seedMeals";
import { asyncHandler } from "../middleware/asyncHandler";

export function createSeedRouter(requireStore: () => RecordStore): Router {
  const seedRouter = Router();

  /**
   * POST /seed
   *
   * Inserts the built-in catalog when the meal collection is empty.
   * Count and insert are separate calls: two concurrent first calls can
   * both see an empty collection and both insert.
   */
  seedRouter.post(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      const store = requireStore();
      const existing = await store.countMeals();
      if (existing > 0) {
        return res.json({ seeded: false, count: existing });
      }

      await store.insertMeals([...INITIAL_MEALS]);
      console.log(`🌱 Seeded ${INITIAL_MEALS.length} meals`);
      return res.json({ seeded: true, count: INITIAL_MEALS.length });
    })
  );

  return seedRouter;
}
