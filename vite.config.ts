import { defineConfig } from "vitest/config";
import react from "@vitejs/plugin-react";

export default defineConfig({
  plugins: [react()],

  // =============================================================================
  // Dev Server / Local DX
  // =============================================================================
  server: {
    port: 5173,
    /* Phones on the same network can open the dev server to try the collapsed toolbar. */
    host: true,
  },

  // =============================================================================
  // Tests (Vitest)
  // =============================================================================
  test: {
    environment: "jsdom",
    include: ["src/**/*.test.{ts,tsx}"],
    setupFiles: ["./src/test/setup.ts"],
    restoreMocks: true,
  },
});
