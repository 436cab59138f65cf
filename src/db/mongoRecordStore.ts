import { Connection, ConnectionStates } from "mongoose";
import { MealRecordSchema } from "../schema";
import type {
  Meal,
  MealFilter,
  MealRecord,
  Preference,
  RecordStore,
  Subscription,
} from "../domain/types";
import { bindModels, Models } from "./models";

/**
 * Turn a raw meal document into the API shape: `_id` becomes the string `id`,
 * and driver fields (`__v`, timestamps) are dropped.
 */
export function toMealRecord<T extends { _id: { toString(): string } }>(doc: T): MealRecord {
  const { _id, ...fields } = doc;
  return MealRecordSchema.parse({ ...fields, id: _id.toString() });
}

interface MealQuery {
  category?: string;
  diet_tags?: { $in: string[] };
}

export function toMealQuery(filter: MealFilter): MealQuery {
  const query: MealQuery = {};
  if (filter.category) {
    query.category = filter.category;
  }
  if (filter.dietTag) {
    query.diet_tags = { $in: [filter.dietTag] };
  }
  return query;
}

export class MongoRecordStore implements RecordStore {
  private readonly models: Models;

  constructor(private readonly connection: Connection) {
    this.models = bindModels(connection);
  }

  isConnected(): boolean {
    return this.connection.readyState === ConnectionStates.connected;
  }

  async listCollectionNames(): Promise<string[]> {
    const db = this.connection.db;
    if (!db) {
      throw new Error("Database handle is not ready");
    }
    const collections = await db.listCollections({}, { nameOnly: true }).toArray();
    return collections.map((c) => c.name);
  }

  async countMeals(): Promise<number> {
    return this.models.Meal.countDocuments({}).exec();
  }

  async insertMeals(meals: Meal[]): Promise<string[]> {
    const created = await this.models.Meal.insertMany(meals);
    return created.map((doc) => doc._id.toString());
  }

  async findMeals(filter: MealFilter): Promise<MealRecord[]> {
    const docs = await this.models.Meal.find(toMealQuery(filter)).lean().exec();
    return docs.map(toMealRecord);
  }

  async findMealById(id: string): Promise<MealRecord | null> {
    // A malformed id raises a CastError, which surfaces as a store failure.
    const doc = await this.models.Meal.findById(id).lean().exec();
    return doc ? toMealRecord(doc) : null;
  }

  async insertSubscription(subscription: Subscription): Promise<string> {
    const doc = await this.models.Subscription.create(subscription);
    return doc._id.toString();
  }

  async upsertPreference(preference: Preference): Promise<void> {
    await this.models.Preference.replaceOne({ email: preference.email }, preference, {
      upsert: true,
    }).exec();
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
