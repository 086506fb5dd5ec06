import { defineConfig } from "vite";

export default defineConfig({
  root: "web/client",
  esbuild: {
    jsx: "automatic",
  },
  build: {
    outDir: "../../dist",
    emptyOutDir: true,
    // pdf.js ships top-level await
    target: "es2022",
  },
  optimizeDeps: {
    esbuildOptions: {
      target: "es2022",
    },
  },
  server: {
    proxy: {
      "/api": "http://localhost:8000",
    },
  },
});
