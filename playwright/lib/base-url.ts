/**
 * Playwright fixture that points tests at the webpack dev server.
 *
 * On CI, baseURL comes from playwright.config.ts. Locally the port is read
 * from DEV_SERVER_PORT, falling back to the dev server's default. Import
 * `test` from this file instead of from `@playwright/test`.
 */
import { test as base } from "@playwright/test";

const DEFAULT_DEV_SERVER_PORT = "8080";

export function devServerUrl(env: NodeJS.ProcessEnv = process.env): string {
  const port = env.DEV_SERVER_PORT || DEFAULT_DEV_SERVER_PORT;
  if (!/^\d+$/.test(port)) {
    throw new Error(`DEV_SERVER_PORT must be a port number, got "${port}"`);
  }
  return `http://localhost:${port}`;
}

export const test = base.extend({
  baseURL: async ({ baseURL }, use) => {
    await use(baseURL ?? devServerUrl());
  },
});
