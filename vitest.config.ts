import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["tests/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/trajectory/**/*.ts"],
			thresholds: {
				lines: 85,
				branches: 75,
			},
		},
	},
});
