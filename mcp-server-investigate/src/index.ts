/**
 * Investigation MCP Server
 *
 * Exposes two tools over MCP:
 * - investigate: natural-language question → planned queries → insights
 * - cloud_query: run one Steampipe query through the same rewrite/memory path
 *
 * Collaborators (planner, executor, memory) are built from configuration
 * unless injected.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js"
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js"
import { z } from "zod"
import { AgentMemory, loadMemory, saveMemory } from "./agent_memory.js"
import { CLOUD_PROVIDERS } from "./agent_types.js"
import { InvestigationError } from "./config.js"
import { getConfig } from "./config/loadConfig.js"
import type { InvestigatorConfig } from "./config/loadConfig.js"
import { getProviderCredentials } from "./credentials.js"
import type { CredentialProvider } from "./credentials.js"
import { InvestigationAgent } from "./investigation_agent.js"
import type { Logger } from "./logger.js"
import { PlannerClient } from "./planner_client.js"
import type { Planner } from "./planner_client.js"
import { SteampipeExecutor } from "./query_executor.js"
import type { QueryExecutor } from "./query_executor.js"
import { CloudQueryTool } from "./query_tool.js"
import { SchemaLearner } from "./schema_learner.js"

export const SERVER_NAME = "mcp-server-investigate"
export const SERVER_VERSION = "0.1.0"

/**
 * Connection settings accepted from .mcp.json or the CLI; anything left out
 * comes from config/config.yaml and the environment.
 */
export const configSchema = z.object({
	plannerUrl: z.string().url().optional(),
	steampipeHost: z.string().min(1).optional(),
	steampipePort: z.number().int().positive().optional(),
	steampipePassword: z.string().optional(),
	memoryPath: z.string().optional(),
	maxSteps: z.number().int().positive().optional(),
	learnSchemas: z.boolean().default(false),
})

export type ServerConfig = z.infer<typeof configSchema>

export function resolveConfig(overrides: ServerConfig, base: InvestigatorConfig = getConfig()): InvestigatorConfig {
	return {
		...base,
		steampipe: {
			...base.steampipe,
			host: overrides.steampipeHost ?? base.steampipe.host,
			port: overrides.steampipePort ?? base.steampipe.port,
			password: overrides.steampipePassword ?? base.steampipe.password,
		},
		planner: { ...base.planner, url: overrides.plannerUrl ?? base.planner.url },
		agent: { ...base.agent, max_steps: overrides.maxSteps ?? base.agent.max_steps },
		memory: { ...base.memory, path: overrides.memoryPath ?? base.memory.path },
	}
}

export interface CreateServerOptions {
	config: ServerConfig
	logger: Logger
	/** Base settings; defaults to the loaded config files */
	settings?: InvestigatorConfig
	planner?: Planner
	executor?: QueryExecutor
	memory?: AgentMemory
	credentialProvider?: CredentialProvider
}

type ToolResult = { content: Array<{ type: "text"; text: string }>; isError?: boolean }

function jsonResult(value: unknown): ToolResult {
	return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] }
}

function errorResult(error: InvestigationError): ToolResult {
	return {
		content: [{ type: "text", text: JSON.stringify({ error: error.message, type: error.type, recoverable: error.recoverable }) }],
		isError: true,
	}
}

export class InvestigationServer {
	readonly mcp: McpServer
	readonly agent: InvestigationAgent
	readonly queryTool: CloudQueryTool
	private memory: AgentMemory
	private memoryPath: string
	private logger: Logger
	private ownedExecutor: SteampipeExecutor | null

	constructor(options: CreateServerOptions) {
		const settings = resolveConfig(options.config, options.settings)
		this.logger = options.logger
		this.memoryPath = settings.memory.path

		const memoryOptions = {
			maxSuccesses: settings.memory.max_successes,
			maxFailures: settings.memory.max_failures,
		}
		this.memory = options.memory
			?? (this.memoryPath ? loadMemory(this.memoryPath, memoryOptions) : new AgentMemory(memoryOptions))

		let executor: QueryExecutor
		if (options.executor) {
			executor = options.executor
			this.ownedExecutor = null
		} else {
			const owned = SteampipeExecutor.fromConfig(settings.steampipe, this.logger)
			this.ownedExecutor = owned
			executor = owned
		}
		const planner = options.planner ?? new PlannerClient(settings.planner.url, settings.planner.timeout_ms)
		const credentialProvider = options.credentialProvider ?? ((provider) => getProviderCredentials(provider))

		this.agent = new InvestigationAgent({
			planner,
			executor,
			memory: this.memory,
			logger: this.logger,
			credentialProvider,
			schemaLearner: options.config.learnSchemas ? new SchemaLearner({ executor, logger: this.logger }) : undefined,
			maxSteps: settings.agent.max_steps,
			maxLessons: settings.prompt.max_lessons,
			investigationTimeoutMs: settings.agent.investigation_timeout_ms,
		})
		this.queryTool = new CloudQueryTool({ executor, memory: this.memory, logger: this.logger })

		this.mcp = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION })
		this.registerTools(credentialProvider)
	}

	private registerTools(credentialProvider: CredentialProvider): void {
		this.mcp.tool(
			"investigate",
			"Investigate cloud infrastructure from a natural-language question. Plans Steampipe queries, runs them, and returns steps, insights and a summary.",
			{
				prompt: z.string().min(1).describe("What to investigate, e.g. 'Find security groups open to the internet'"),
				provider: z.enum(CLOUD_PROVIDERS).describe("Cloud provider"),
				region: z.string().optional().describe("Region hint for the planner"),
				credentials: z.record(z.string()).optional()
					.describe("Credential variables for the provider; read from the server environment when omitted"),
			},
			async ({ prompt, provider, region, credentials }, extra) => {
				try {
					const result = await this.agent.investigate({ prompt, provider, region, credentials }, { signal: extra.signal })
					return jsonResult(result)
				} catch (error) {
					if (error instanceof InvestigationError) return errorResult(error)
					throw error
				} finally {
					this.persistMemory()
				}
			},
		)

		this.mcp.tool(
			"cloud_query",
			"Run one SQL query against Steampipe for a cloud provider. Known column mistakes are rewritten and failures are remembered for future plans.",
			{
				provider: z.enum(CLOUD_PROVIDERS).describe("Cloud provider"),
				query: z.string().min(1).describe("Steampipe SQL; only the first statement runs"),
				intent: z.string().optional().describe("What the query is for; used to learn query patterns"),
				credentials: z.record(z.string()).optional()
					.describe("Credential variables for the provider; read from the server environment when omitted"),
			},
			async ({ provider, query, intent, credentials }, extra) => {
				try {
					const response = await this.queryTool.execute(
						{ provider, query, intent, credentials: credentials ?? credentialProvider(provider) },
						extra.signal,
					)
					return jsonResult(response)
				} catch (error) {
					if (error instanceof InvestigationError) return errorResult(error)
					throw error
				} finally {
					this.persistMemory()
				}
			},
		)
	}

	private persistMemory(): void {
		if (!this.memoryPath) return
		try {
			saveMemory(this.memory, this.memoryPath)
		} catch (error) {
			this.logger.error("Failed to save agent memory", { path: this.memoryPath, error })
		}
	}

	async connect(transport: Transport): Promise<void> {
		await this.mcp.connect(transport)
	}

	async close(): Promise<void> {
		await this.mcp.close()
		this.persistMemory()
		if (this.ownedExecutor) {
			await this.ownedExecutor.close()
		}
	}
}

export default function createServer(options: CreateServerOptions): InvestigationServer {
	return new InvestigationServer(options)
}
