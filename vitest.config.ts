import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "waystate",
		environment: "node",
		include: ["tests/**/*.test.ts"],
	},
});
