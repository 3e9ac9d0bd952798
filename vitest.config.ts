import { defineConfig } from "vitest/config";

// The fork pool can hang on teardown in sandboxed environments; threads do not.
export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    pool: "threads",
  },
});
