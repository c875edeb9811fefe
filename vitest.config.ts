import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/unit/**/*.test.ts"],
    restoreMocks: true,
    unstubEnvs: true,
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      // Process wiring and the Telegram transport are exercised by hand.
      exclude: [
        "src/index.ts",
        "src/cli/program.ts",
        "src/cli/commands/run.ts",
        "src/gateway/lifecycle.ts",
        "src/operator/bot.ts",
        "src/config/types.ts",
      ],
      thresholds: { lines: 75, functions: 75, branches: 70, statements: 75 },
    },
  },
});
