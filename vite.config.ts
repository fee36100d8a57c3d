import { defineConfig } from "vite";

// The editor copies the built page into its cache directory and writes
// js/content.js beside it, so asset URLs stay relative.
export default defineConfig({
  base: "./",
  build: {
    target: "es2022",
    outDir: "dist",
  },
});
