import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // pixi.js reads browser globals (navigator, document) at import time
    environmentMatchGlobs: [["src/scene/__tests__/viewport.test.ts", "jsdom"]],
    include: ["src/**/__tests__/**/*.test.ts"],
  },
});
