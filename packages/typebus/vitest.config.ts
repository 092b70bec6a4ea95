import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["src/**/*.spec.ts"],
        environment: "node",
        coverage: {
            provider: "istanbul",
            include: ["src/**/*.ts"],
            exclude: ["src/**/*.spec.ts", "src/index.ts"],
        },
    },
});
