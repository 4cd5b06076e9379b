import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // FileHandler 测试使用真实的临时目录与同步 fs，forks 隔离更稳定
    pool: "forks",
    include: ["packages/*/src/**/*.test.ts"],
  },
});
