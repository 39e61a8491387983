import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    pool: "forks",
    include: ["packages/*/src/**/?(*.)+(spec|test).(c|m)?[jt]s"],
  },
});
