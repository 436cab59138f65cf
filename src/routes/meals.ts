// src/routes/meals.ts
import { Router, Request, Response } from "express";
import { ListMealsQuerySchema, PortionRequestSchema } from "../schema";
import type { RecordStore } from "../domain/types";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendNotFound, sendValidationError } from "../middleware/responseHelper";
import { scalePortion } from "../services/portion";

export function createMealsRouter(requireStore: () => RecordStore): Router {
  const mealsRouter = Router();

  /**
   * GET /meals?category=&diet=&min_protein=
   *
   * category and diet are store predicates; min_protein is checked here
   * against macros.protein after the read. Order is whatever the store returns.
   */
  mealsRouter.get(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = ListMealsQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const { category, diet, min_protein } = parsed.data;
      const meals = await requireStore().findMeals({ category, dietTag: diet });

      const items =
        min_protein === undefined
          ? meals
          : meals.filter((m) => m.macros.protein >= min_protein);

      return res.json({ items });
    })
  );

  /**
   * POST /meals/portion
   * Body: { meal_id, servings = 1.0 }
   */
  mealsRouter.post(
    "/portion",
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = PortionRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendValidationError(res, parsed.error);
      }

      const meal = await requireStore().findMealById(parsed.data.meal_id);
      if (!meal) {
        return sendNotFound(res, "Meal not found");
      }

      return res.json(scalePortion(meal.macros, parsed.data.servings));
    })
  );

  return mealsRouter;
}
