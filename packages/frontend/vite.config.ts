import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vite";

const PACKAGE_DIR = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@battleship/core": resolve(PACKAGE_DIR, "../../src"),
    },
  },
  server: {
    port: 5174,
    proxy: {
      "/ws": { target: "ws://localhost:9090", ws: true },
      "/api": "http://localhost:9090",
    },
  },
  build: {
    target: "ES2022",
    outDir: "dist",
    sourcemap: true,
  },
});
