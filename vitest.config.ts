import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/unit/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      OPENAI_API_KEY: "",
    },
  },
});
