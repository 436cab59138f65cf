import type { Server } from "node:http";
import { request, type APIRequestContext } from "@playwright/test";
import { createApp, type AppDeps } from "../../src/app";
import { parseEnvironment } from "../../src/middleware/validateEnv";

export interface TestServer {
  api: APIRequestContext;
  close(): Promise<void>;
}

export const testEnv = parseEnvironment({
  NODE_ENV: "test",
  DATABASE_URL: "mongodb://localhost:27017",
  DATABASE_NAME: "test_db",
});

/**
 * Start the app on an ephemeral local port inside the test worker.
 */
export async function startTestServer(deps: AppDeps): Promise<TestServer> {
  const app = createApp(deps);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }

  const api = await request.newContext({ baseURL: `http://127.0.0.1:${address.port}` });

  return {
    api,
    close: async () => {
      await api.dispose();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
