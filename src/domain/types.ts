import type {
  DietTag,
  Meal,
  MealCategory,
  MealRecord,
  Preference,
  Subscription,
} from "../schema";

export type { Meal, MealRecord, Preference, Subscription };

export const COLLECTIONS = {
  meal: "meal",
  subscription: "subscription",
  preference: "preference",
} as const;

/**
 * Predicates the store evaluates natively. The protein threshold is not
 * here: it is applied by the service after retrieval.
 */
export interface MealFilter {
  category?: MealCategory;
  dietTag?: DietTag;
}

/**
 * Everything the API needs from the document store. Identities cross this
 * boundary as strings only.
 */
export interface RecordStore {
  isConnected(): boolean;
  listCollectionNames(): Promise<string[]>;

  countMeals(): Promise<number>;
  insertMeals(meals: Meal[]): Promise<string[]>;
  findMeals(filter: MealFilter): Promise<MealRecord[]>;
  /** Resolves null when no meal has this id; rejects when the id is malformed. */
  findMealById(id: string): Promise<MealRecord | null>;

  insertSubscription(subscription: Subscription): Promise<string>;
  /** Full replace keyed by exact email match, insert when absent. */
  upsertPreference(preference: Preference): Promise<void>;
}

export type ConfigFlag = "✅ Set" | "❌ Not Set";

export interface DiagnosticsReport {
  backend: string;
  database: string;
  database_url: ConfigFlag;
  database_name: ConfigFlag;
  connection_status: "Connected" | "Not Connected";
  collections: string[];
}
