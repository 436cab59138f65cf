import type { ConfigFlag, DiagnosticsReport, RecordStore } from "../domain/types";
import type { Env } from "../middleware/validateEnv";

const MAX_COLLECTIONS = 10;
const MAX_STATUS_DETAIL = 50;

function flag(value: string | undefined): ConfigFlag {
  return value ? "✅ Set" : "❌ Not Set";
}

function detail(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.slice(0, MAX_STATUS_DETAIL);
}

/**
 * Human-readable store status. Never rejects: every failure becomes status
 * text in the report.
 */
export async function diagnoseStore(
  store: RecordStore | null,
  env: Env
): Promise<DiagnosticsReport> {
  const report: DiagnosticsReport = {
    backend: "✅ Running",
    database: "❌ Not Available",
    database_url: flag(env.DATABASE_URL),
    database_name: flag(env.DATABASE_NAME),
    connection_status: "Not Connected",
    collections: [],
  };

  try {
    if (!store) {
      return report;
    }
    if (!store.isConnected()) {
      report.database = "⚠️  Available but not initialized";
      return report;
    }

    report.database = "✅ Available";
    report.connection_status = "Connected";
    try {
      const collections = await store.listCollectionNames();
      report.collections = collections.slice(0, MAX_COLLECTIONS);
      report.database = "✅ Connected & Working";
    } catch (err) {
      report.database = `⚠️  Connected but Error: ${detail(err)}`;
    }
  } catch (err) {
    report.database = `❌ Error: ${detail(err)}`;
  }

  return report;
}
