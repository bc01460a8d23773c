import tsconfigPaths from "vite-tsconfig-paths"
import { defineConfig } from "vitest/config"

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		coverage: {
			exclude: ["**/*.test.ts", "tests/**/*.ts"],
			include: ["src/**/*.ts"],
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["src/**/*.test.ts", "tests/**/*.test.ts"],
		unstubGlobals: true,
	},
})
