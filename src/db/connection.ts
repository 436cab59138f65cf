import mongoose from "mongoose";
import type { Env } from "../middleware/validateEnv";
import { MongoRecordStore } from "./mongoRecordStore";

/**
 * Open the document store described by the environment.
 * Returns null when no DATABASE_URL is configured. A failed connect is logged
 * and the store is still returned; it reports itself as not connected.
 */
export async function connectDatabase(env: Env): Promise<MongoRecordStore | null> {
  if (!env.DATABASE_URL) {
    console.warn("⚠️  DATABASE_URL not set, running without a document store");
    return null;
  }

  const connection = mongoose.createConnection(env.DATABASE_URL, {
    dbName: env.DATABASE_NAME,
  });

  connection.on("error", (err: unknown) => {
    console.error("❌ MongoDB connection error:", err);
  });

  try {
    await connection.asPromise();
    console.log(`✅ Connected to MongoDB database "${connection.name}"`);
  } catch (err) {
    console.error(
      "❌ Could not connect to MongoDB:",
      err instanceof Error ? err.message : err
    );
  }

  return new MongoRecordStore(connection);
}
