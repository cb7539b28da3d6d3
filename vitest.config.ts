import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: {
      APP_MODE: "local",
      LOG_LEVEL: "error"
    },
    restoreMocks: true,
    mockReset: true,
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      all: true,
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: [
        "src/**/*.d.ts",
        "src/**/types.ts",
        "src/server.ts",
        "src/**/*.test.ts"
      ],
      thresholds: {
        functions: 85,
        lines: 85,
        statements: 85,
        branches: 75
      }
    }
  }
});
