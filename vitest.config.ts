import tsconfigPaths from "vite-tsconfig-paths";
import { configDefaults, defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		globals: true,
		include: ["test/**/*.{test,spec}.ts"],
		exclude: [...configDefaults.exclude],
		coverage: {
			enabled: true,
			provider: "v8",
			reportsDirectory: "./coverage/raw/default",
			reporter: ["json", "text", "html"],
			include: ["src/**/*.ts"],
			exclude: [
				...(configDefaults.coverage.exclude ?? []),

				// types are compile-time only, so their coverage cannot be measured
				"src/**/types.ts",
			],
		},
		pool: "forks",
	},
});
