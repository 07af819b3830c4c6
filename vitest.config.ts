import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["mcp-server-investigate/src/**/*.test.ts"],
		environment: "node",
		pool: "forks",
	},
})
