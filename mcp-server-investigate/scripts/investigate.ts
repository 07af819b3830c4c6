/**
 * One-shot investigation from the command line
 *
 * Usage:
 *   npx tsx mcp-server-investigate/scripts/investigate.ts --provider=aws "Find security groups open to the internet"
 *   npx tsx mcp-server-investigate/scripts/investigate.ts --provider=gcp --describe=gcp_compute_instance
 *
 * Options:
 *   --provider=<aws|azure|gcp>   Cloud provider (default: aws)
 *   --region=<region>            Region hint for the planner
 *   --learn-schemas              Discover table schemas before planning
 *   --timeout=<ms>               Investigation deadline (default: agent.investigation_timeout_ms)
 *   --json                       Print the full result as JSON
 *   --describe=<table>           Print the discovered schema of one table and exit
 *
 * Steampipe and the planner are taken from config/config.yaml and the
 * environment (STEAMPIPE_*, PLANNER_URL).
 */

import { AgentMemory, loadMemory, saveMemory } from "../src/agent_memory.js"
import { isCloudProvider } from "../src/agent_types.js"
import type { CloudProvider } from "../src/agent_types.js"
import { InvestigationError } from "../src/config.js"
import { getConfig } from "../src/config/loadConfig.js"
import { getProviderCredentials } from "../src/credentials.js"
import { InvestigationAgent } from "../src/investigation_agent.js"
import { createLogger, parseLogLevel } from "../src/logger.js"
import type { Logger } from "../src/logger.js"
import { PlannerClient } from "../src/planner_client.js"
import { SteampipeExecutor } from "../src/query_executor.js"
import type { QueryExecutor } from "../src/query_executor.js"
import { SchemaLearner } from "../src/schema_learner.js"

// ============================================================================
// Configuration
// ============================================================================

interface Args {
	prompt: string
	provider: CloudProvider
	region?: string
	learnSchemas: boolean
	timeoutMs?: number
	json: boolean
	describe?: string
}

function parseArgs(): Args {
	const args = process.argv.slice(2)
	const parsed: Args = { prompt: "", provider: "aws", learnSchemas: false, json: false }
	const words: string[] = []

	for (const arg of args) {
		if (arg.startsWith("--provider=")) {
			const provider = arg.split("=")[1]
			if (!isCloudProvider(provider)) {
				console.error(`Error: unknown provider "${provider}" (expected aws, azure or gcp)`)
				process.exit(1)
			}
			parsed.provider = provider
		} else if (arg.startsWith("--region=")) {
			parsed.region = arg.split("=")[1]
		} else if (arg.startsWith("--timeout=")) {
			parsed.timeoutMs = parseInt(arg.split("=")[1], 10)
		} else if (arg.startsWith("--describe=")) {
			parsed.describe = arg.split("=")[1]
		} else if (arg === "--learn-schemas") {
			parsed.learnSchemas = true
		} else if (arg === "--json") {
			parsed.json = true
		} else {
			words.push(arg)
		}
	}

	parsed.prompt = words.join(" ").trim()
	if (!parsed.prompt && !parsed.describe) {
		console.error("Error: a question is required, e.g. \"Find running EC2 instances\"")
		process.exit(1)
	}
	return parsed
}

// ============================================================================
// Schema
// ============================================================================

async function describeTable(args: Args, table: string, executor: QueryExecutor, logger: Logger): Promise<void> {
	const learner = new SchemaLearner({ executor, logger })
	const schema = await learner.refreshSchema(args.provider, table, getProviderCredentials(args.provider))

	if (args.json) {
		console.log(JSON.stringify(schema, null, 2))
		return
	}
	console.log(`\n${schema.table_name}: ${schema.description}\n`)
	for (const col of schema.columns) {
		const nullable = col.required ? "not null" : "nullable"
		console.log(`  ${col.name.padEnd(28)} ${col.type.padEnd(28)} ${nullable}${col.description ? `  ${col.description}` : ""}`)
	}
}

// ============================================================================
// Main
// ============================================================================

async function main() {
	const args = parseArgs()
	const config = getConfig()
	const logger = createLogger(parseLogLevel(config.logging.level))

	if (args.describe) {
		const executor = SteampipeExecutor.fromConfig(config.steampipe, logger)
		try {
			await describeTable(args, args.describe, executor, logger)
		} catch (error) {
			if (!(error instanceof Error)) throw error
			console.error(`Error: ${error.message}`)
			process.exitCode = 1
		} finally {
			await executor.close()
		}
		return
	}

	const memoryOptions = { maxSuccesses: config.memory.max_successes, maxFailures: config.memory.max_failures }
	const memory = config.memory.path ? loadMemory(config.memory.path, memoryOptions) : new AgentMemory(memoryOptions)

	const planner = new PlannerClient(config.planner.url, config.planner.timeout_ms)
	if (!(await planner.healthCheck())) {
		logger.warn("Planner health check failed; continuing anyway", { url: config.planner.url })
	}

	const executor = SteampipeExecutor.fromConfig(config.steampipe, logger)
	const schemaLearner = args.learnSchemas ? new SchemaLearner({ executor, logger }) : undefined
	const agent = new InvestigationAgent({
		planner,
		executor,
		memory,
		logger,
		schemaLearner,
		maxSteps: config.agent.max_steps,
		maxLessons: config.prompt.max_lessons,
		investigationTimeoutMs: config.agent.investigation_timeout_ms,
	})

	try {
		const result = await agent.investigate(
			{ prompt: args.prompt, provider: args.provider, region: args.region },
			{ timeoutMs: args.timeoutMs },
		)

		if (args.json) {
			console.log(JSON.stringify(result, null, 2))
		} else {
			console.log(`\n${result.summary}\n`)
			for (const step of result.steps) {
				const status = step.success ? `${step.results.length} rows` : `FAILED (${step.error_kind}): ${step.error}`
				console.log(`  ${step.step_number}. ${step.description} - ${status}`)
			}
			console.log(`\nConfidence: ${(result.confidence * 100).toFixed(0)}%  Duration: ${result.duration_ms}ms`)
			if (schemaLearner) {
				console.log(`Schemas learned: ${schemaLearner.getProviderTables(args.provider).join(", ") || "(none)"}`)
			}
		}
		process.exitCode = result.success ? 0 : 2
	} catch (error) {
		if (!(error instanceof InvestigationError)) throw error
		console.error(`Error (${error.type}): ${error.message}`)
		process.exitCode = 1
	} finally {
		if (config.memory.path) saveMemory(memory, config.memory.path)
		await executor.close()
	}
}

main().catch((error: unknown) => {
	console.error("Fatal error:", error)
	process.exit(1)
})
