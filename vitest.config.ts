import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/test.ts", "src/**/*_test.ts"],
        environment: "node",
        testTimeout: 30000,
        hookTimeout: 30000,
    },
});
