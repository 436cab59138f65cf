import { Connection, Schema } from "mongoose";
import { DIET_TAGS, FREQUENCIES, MEAL_CATEGORIES } from "../schema";
import { COLLECTIONS } from "../domain/types";

// The zod schemas in ../schema are the validation boundary; these models
// repeat the enumerations and ranges so the store never holds a value the
// API would reject.

const timestamps = { createdAt: "created_at", updatedAt: "updated_at" } as const;

const macrosSchema = new Schema(
  {
    protein: { type: Number, required: true, min: 0 },
    carbs: { type: Number, required: true, min: 0 },
    fats: { type: Number, required: true, min: 0 },
    calories: { type: Number, required: true, min: 0 },
  },
  { _id: false }
);

export const mealModelSchema = new Schema(
  {
    title: { type: String, required: true },
    description: { type: String, default: null },
    category: { type: String, required: true, enum: [...MEAL_CATEGORIES] },
    diet_tags: { type: [{ type: String, enum: [...DIET_TAGS] }], default: [] },
    price: { type: Number, required: true, min: 0 },
    macros: { type: macrosSchema, required: true },
    image_url: { type: String, default: null },
    is_customizable: { type: Boolean, default: false },
    available_add_ons: { type: [String], default: null },
  },
  { collection: COLLECTIONS.meal, timestamps }
);

const subscriptionItemSchema = new Schema(
  {
    meal_id: { type: String, required: true },
    servings: { type: Number, min: 0.5, max: 5, default: 1.0 },
  },
  { _id: false }
);

export const subscriptionModelSchema = new Schema(
  {
    email: { type: String, required: true },
    frequency: { type: String, required: true, enum: [...FREQUENCIES] },
    target_protein_g_per_day: { type: Number, required: true, min: 20, max: 400 },
    items: { type: [subscriptionItemSchema], required: true },
    notes: { type: String },
  },
  { collection: COLLECTIONS.subscription, timestamps }
);

export const preferenceModelSchema = new Schema(
  {
    email: { type: String, required: true, unique: true },
    target_protein_g_per_day: { type: Number, min: 20, max: 400, default: 120 },
    diet_filters: { type: [{ type: String, enum: [...DIET_TAGS] }], default: [] },
  },
  { collection: COLLECTIONS.preference, timestamps }
);

/**
 * Register the three models on a dedicated connection.
 */
export function bindModels(connection: Connection) {
  return {
    Meal: connection.model("Meal", mealModelSchema),
    Subscription: connection.model("Subscription", subscriptionModelSchema),
    Preference: connection.model("Preference", preferenceModelSchema),
  };
}

export type Models = ReturnType<typeof bindModels>;
