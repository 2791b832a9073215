import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["payment-service/src/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
      SERVICE_NAME: "payment-service-test",
    },
  },
});
