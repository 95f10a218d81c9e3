import { defineConfig } from "vite";

export default defineConfig({
  // Relative base so the built page also opens straight from dist/
  base: "./",
  server: {
    port: 5173,
  },
  build: {
    outDir: "dist",
  },
});
