#!/usr/bin/env node
/**
 * Stdio entry point for the investigation MCP server
 *
 * Config priority:
 *   1. .mcp.json file in server directory (highest priority)
 *   2. CLI argument
 *   3. Environment variables and config/config.yaml (always the base)
 *
 * Usage:
 *   node stdio.js '{"plannerUrl":"http://localhost:8001","steampipeHost":"localhost"}'
 *
 * Or via environment variables:
 *   PLANNER_URL=http://localhost:8001 STEAMPIPE_HOST=localhost node stdio.js
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import { readFileSync, existsSync } from "fs"
import { join, dirname } from "path"
import { fileURLToPath } from "url"
import createServer, { configSchema } from "./index.js"
import type { ServerConfig } from "./index.js"
import { getConfig } from "./config/loadConfig.js"
import { createLogger, parseLogLevel } from "./logger.js"

// stdout is reserved for the MCP protocol; the logger writes to stderr
const logger = createLogger(parseLogLevel(getConfig().logging.level))

/**
 * Try to load config from .mcp.json file in the server directory
 */
function loadConfigFromFile(): ServerConfig | null {
	try {
		const __filename = fileURLToPath(import.meta.url)
		const __dirname = dirname(__filename)

		// Look for .mcp.json in parent directory (package root)
		const configPath = join(__dirname, "..", ".mcp.json")

		if (existsSync(configPath)) {
			const content = readFileSync(configPath, "utf-8")
			const validated = configSchema.parse(JSON.parse(content))
			logger.info(`Config loaded from ${configPath}`)
			return validated
		}
	} catch (e) {
		logger.warn("Failed to load config from .mcp.json", { error: e })
	}
	return null
}

function loadServerConfig(): ServerConfig {
	const fileConfig = loadConfigFromFile()
	if (fileConfig) return fileConfig

	const configArg = process.argv[2]
	if (configArg) {
		try {
			const validated = configSchema.parse(JSON.parse(configArg))
			logger.info("Config loaded from CLI argument")
			return validated
		} catch (e) {
			logger.error("Failed to parse config from CLI argument", { error: e })
			process.exit(1)
		}
	}

	logger.info("Config loaded from environment variables and config files")
	return configSchema.parse({})
}

async function main() {
	const config = loadServerConfig()
	const settings = getConfig()

	logger.info("Starting investigation MCP server with stdio transport")
	logger.info(`Steampipe: ${config.steampipeHost ?? settings.steampipe.host}:${config.steampipePort ?? settings.steampipe.port}`)
	logger.info(`Planner: ${config.plannerUrl ?? settings.planner.url}`)

	const server = createServer({ config, logger, settings })

	const transport = new StdioServerTransport()
	await server.connect(transport)

	logger.info("Investigation MCP server running via stdio")

	const shutdown = () => {
		logger.info("Shutting down...")
		server.close().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error("Shutdown failed", { error })
				process.exit(1)
			},
		)
	}

	process.on("SIGINT", shutdown)
	process.on("SIGTERM", shutdown)
}

main().catch((error: unknown) => {
	logger.error("Fatal error", { error })
	process.exit(1)
})
