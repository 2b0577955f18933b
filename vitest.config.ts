import { defineConfig } from "vitest/config";

// Registry dates are local; run east of UTC so day boundaries are exercised
process.env.TZ = "Europe/Warsaw";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
  },
});
