import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
    },
    projects: [
      {
        extends: true,
        test: {
          include: ["packages/shared/src/**/*.test.ts"],
          name: "shared",
          environment: "node",
        },
      },
      {
        extends: true,
        test: {
          include: ["packages/interface/src/**/*.test.ts"],
          name: "interface",
          environment: "node",
        },
      },
    ],
  },
});
