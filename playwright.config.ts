import { defineConfig } from "@playwright/test";

// API and unit specs only: no browser project is configured.
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.spec.ts",
  fullyParallel: true,
  reporter: "list",
  timeout: 30_000,
});
