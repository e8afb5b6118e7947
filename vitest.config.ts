import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Descriptor decoding is pure; no browser APIs are needed.
    environment: "node",
    // Vitest sizes its pool from `os.cpus()`, which can be very large in sandboxed runners.
    // Cap the fork count so `vitest run` stays stable there.
    pool: "forks",
    poolOptions: {
      forks: {
        minForks: 1,
        maxForks: 4,
      },
    },
    include: ["src/**/*.test.ts"],
  },
});
