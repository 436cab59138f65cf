import { z } from "zod";

export const DIET_TAGS = [
  "vegan",
  "vegetarian",
  "keto",
  "low-carb",
  "gluten-free",
  "dairy-free",
] as const;

export const MEAL_CATEGORIES = ["Breakfasts", "Main Meals", "Smoothies & Shakes"] as const;

export const FREQUENCIES = ["weekly", "biweekly", "monthly"] as const;

export const DietTagSchema = z.enum(DIET_TAGS);
export const MealCategorySchema = z.enum(MEAL_CATEGORIES);
export const FrequencySchema = z.enum(FREQUENCIES);

export type DietTag = z.infer<typeof DietTagSchema>;
export type MealCategory = z.infer<typeof MealCategorySchema>;

/**
 * Diet tags behave as a set: repeats are dropped, first occurrence wins.
 */
const dietTagSetSchema = z
  .array(DietTagSchema)
  .transform((tags) => Array.from(new Set(tags)));

const proteinTargetSchema = z
  .number()
  .min(20, "Protein target must be at least 20g")
  .max(400, "Protein target must be at most 400g");

/**
 * Nutrition per serving (grams, kcal for calories)
 */
export const MacrosSchema = z.object({
  protein: z.number().nonnegative(),
  carbs: z.number().nonnegative(),
  fats: z.number().nonnegative(),
  calories: z.number().nonnegative(),
});

export type Macros = z.infer<typeof MacrosSchema>;

export const MealSchema = z.object({
  title: z.string().trim().min(1, "title is required"),
  description: z.string().nullable().default(null),
  category: MealCategorySchema,
  diet_tags: dietTagSetSchema.default([]),
  price: z.number().nonnegative(),
  macros: MacrosSchema,
  image_url: z.string().nullable().default(null),
  is_customizable: z.boolean().default(false),
  // only meaningful when is_customizable is true
  available_add_ons: z.array(z.string()).nullable().default(null),
});

export type Meal = z.infer<typeof MealSchema>;

/** A stored meal as returned to callers: identity is always a plain string. */
export const MealRecordSchema = MealSchema.extend({
  id: z.string().min(1),
});

export type MealRecord = z.infer<typeof MealRecordSchema>;

export const SubscriptionItemSchema = z.object({
  meal_id: z.string().min(1, "meal_id is required"),
  servings: z
    .number()
    .min(0.5, "Servings must be at least 0.5")
    .max(5, "Servings must be at most 5")
    .default(1.0),
});

export type SubscriptionItem = z.infer<typeof SubscriptionItemSchema>;

export const SubscriptionSchema = z.object({
  email: z.string().trim().email("Valid email required"),
  frequency: FrequencySchema,
  target_protein_g_per_day: proteinTargetSchema,
  items: z.array(SubscriptionItemSchema).min(1, "At least one item is required"),
  notes: z.string().nullable().optional(),
});

export type Subscription = z.infer<typeof SubscriptionSchema>;

export const PreferenceSchema = z.object({
  email: z.string().trim().email("Valid email required"),
  target_protein_g_per_day: proteinTargetSchema.default(120),
  diet_filters: dietTagSetSchema.default([]),
});

export type Preference = z.infer<typeof PreferenceSchema>;

export const PortionRequestSchema = z.object({
  meal_id: z.string().min(1, "meal_id is required"),
  servings: z.number().default(1.0),
});

export type PortionRequest = z.infer<typeof PortionRequestSchema>;

// `?category=` and `?diet=` mean "no filter"
const blankAsAbsent = (value: unknown) => (value === "" ? undefined : value);

export const ListMealsQuerySchema = z.object({
  category: z.preprocess(blankAsAbsent, MealCategorySchema.optional()),
  diet: z.preprocess(blankAsAbsent, DietTagSchema.optional()),
  min_protein: z.coerce.number().nonnegative().optional(),
});

export type ListMealsQuery = z.infer<typeof ListMealsQuerySchema>;
