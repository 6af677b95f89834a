import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/simulation/**/*.test.ts", "tests/essential/test_*.ts"],
  },
});
