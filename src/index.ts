import "dotenv/config";

import { createApp } from "./app";
import { connectDatabase } from "./db/connection";
import { validateEnvironment } from "./middleware/validateEnv";

async function main(): Promise<void> {
  const env = validateEnvironment();
  const store = await connectDatabase(env);
  const app = createApp({ store, env });

  const port = Number(env.PORT);
  const server = app.listen(port, () => {
    console.log(`Protein meals backend listening on port ${port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`${signal} received, shutting down`);
    server.close(() => {
      const closing = store ? store.close() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("❌ Error while closing the database connection:", err);
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error("❌ Failed to start server:", err);
  process.exit(1);
});
