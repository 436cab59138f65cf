import { defineConfig } from "@playwright/test";

// API-only suites: the app is started in-process by each spec, so no
// browser project or webServer is configured.
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.spec.ts",
  fullyParallel: false,
  forbidOnly: !!process.env.CI,
  retries: 0,
  timeout: 30_000,
});
