import { describe, it, expect, vi, afterEach } from "vitest"
import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { Client } from "@modelcontextprotocol/sdk/client/index.js"
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js"
import { z } from "zod"
import createServer, { configSchema, resolveConfig } from "./index.js"
import type { InvestigationServer } from "./index.js"
import { AgentMemory, loadMemory } from "./agent_memory.js"
import { DEFAULT_CONFIG } from "./config/loadConfig.js"
import { silentLogger } from "./logger.js"
import type { ExecutorOutcome } from "./query_executor.js"
import type { CloudProvider, Credentials, PlannedStep } from "./agent_types.js"

const toolResultSchema = z.object({
	content: z.array(z.object({ type: z.literal("text"), text: z.string() })),
	isError: z.boolean().optional(),
})

function stubs(outcome: ExecutorOutcome, steps: PlannedStep[]) {
	return {
		planner: { generatePlan: vi.fn(async (): Promise<PlannedStep[]> => steps) },
		executor: {
			execute: vi.fn(async (
				_provider: CloudProvider,
				_query: string,
				_credentials: Credentials,
			): Promise<ExecutorOutcome> => outcome),
		},
	}
}

let server: InvestigationServer | null = null
let client: Client | null = null

async function connect(instance: InvestigationServer): Promise<Client> {
	const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair()
	await instance.connect(serverTransport)
	const connected = new Client({ name: "test-client", version: "0.0.0" })
	await connected.connect(clientTransport)
	server = instance
	client = connected
	return connected
}

async function call(c: Client, name: string, args: Record<string, unknown>) {
	return toolResultSchema.parse(await c.callTool({ name, arguments: args }))
}

afterEach(async () => {
	await client?.close()
	await server?.close()
	client = null
	server = null
})

describe("resolveConfig", () => {
	it("should apply server overrides on top of loaded settings", () => {
		const config = resolveConfig(
			configSchema.parse({ plannerUrl: "http://planner.test:9000", steampipePort: 9999, maxSteps: 3 }),
			DEFAULT_CONFIG,
		)
		expect(config.planner.url).toBe("http://planner.test:9000")
		expect(config.planner.timeout_ms).toBe(60000)
		expect(config.steampipe.port).toBe(9999)
		expect(config.steampipe.host).toBe("localhost")
		expect(config.agent.max_steps).toBe(3)
	})

	it("should reject a malformed planner url", () => {
		expect(configSchema.safeParse({ plannerUrl: "not a url" }).success).toBe(false)
	})
})

describe("MCP tools", () => {
	it("should list both tools", async () => {
		const { planner, executor } = stubs({ ok: true, payload: [] }, [])
		const c = await connect(createServer({
			config: configSchema.parse({}),
			logger: silentLogger,
			settings: DEFAULT_CONFIG,
			planner,
			executor,
		}))

		const { tools } = await c.listTools()
		expect(tools.map((t) => t.name).sort()).toEqual(["cloud_query", "investigate"])
	})

	it("should run an investigation and return the result as JSON", async () => {
		const { planner, executor } = stubs(
			{ ok: true, payload: [{ name: "logs" }] },
			[{ description: "list buckets", query: "SELECT name FROM aws_s3_bucket" }],
		)
		const c = await connect(createServer({
			config: configSchema.parse({}),
			logger: silentLogger,
			settings: DEFAULT_CONFIG,
			planner,
			executor,
			credentialProvider: () => ({}),
		}))

		const result = await call(c, "investigate", { prompt: "List S3 buckets", provider: "aws" })
		expect(result.isError).toBeFalsy()
		const body = JSON.parse(result.content[0].text)
		expect(body).toMatchObject({ success: true, query_count: 1, confidence: 1 })
		expect(body.steps[0].results).toEqual([{ name: "logs" }])
	})

	it("should report a blank prompt as a tool error", async () => {
		const { planner, executor } = stubs({ ok: true, payload: [] }, [])
		const c = await connect(createServer({
			config: configSchema.parse({}),
			logger: silentLogger,
			settings: DEFAULT_CONFIG,
			planner,
			executor,
			credentialProvider: () => ({}),
		}))

		const result = await call(c, "investigate", { prompt: "   ", provider: "gcp" })
		expect(result.isError).toBe(true)
		expect(JSON.parse(result.content[0].text)).toEqual({
			error: "prompt is required",
			type: "validation",
			recoverable: false,
		})
		expect(planner.generatePlan).not.toHaveBeenCalled()
	})

	it("should run a single query with provider credentials", async () => {
		const { planner, executor } = stubs({ ok: false, error: "syntax error at or near \"FORM\"" }, [])
		const memory = new AgentMemory()
		const c = await connect(createServer({
			config: configSchema.parse({}),
			logger: silentLogger,
			settings: DEFAULT_CONFIG,
			planner,
			executor,
			memory,
			credentialProvider: () => ({ AWS_REGION: "us-east-1" }),
		}))

		const result = await call(c, "cloud_query", { provider: "aws", query: "SELECT name FORM aws_s3_bucket" })
		const body = JSON.parse(result.content[0].text)

		expect(body).toMatchObject({ success: false, error_type: "syntax", row_count: 0 })
		expect(executor.execute.mock.calls[0][2]).toEqual({ AWS_REGION: "us-east-1" })
		expect(memory.failures).toHaveLength(1)
	})

	it("should prefer credentials given in the tool call", async () => {
		const { planner, executor } = stubs(
			{ ok: true, payload: [{ id: 1 }] },
			[{ description: "list projects", query: "SELECT id FROM gcp_project" }],
		)
		const credentialProvider = vi.fn(() => ({ GOOGLE_CLOUD_PROJECT: "from-env" }))
		const c = await connect(createServer({
			config: configSchema.parse({}),
			logger: silentLogger,
			settings: DEFAULT_CONFIG,
			planner,
			executor,
			credentialProvider,
		}))

		await call(c, "cloud_query", {
			provider: "gcp",
			query: "SELECT id FROM gcp_project",
			credentials: { GOOGLE_CLOUD_PROJECT: "from-request" },
		})
		await call(c, "investigate", {
			prompt: "List projects",
			provider: "gcp",
			credentials: { GOOGLE_CLOUD_PROJECT: "from-request" },
		})

		expect(executor.execute.mock.calls.map((args) => args[2])).toEqual([
			{ GOOGLE_CLOUD_PROJECT: "from-request" },
			{ GOOGLE_CLOUD_PROJECT: "from-request" },
		])
		expect(credentialProvider).not.toHaveBeenCalled()
	})

	it("should save memory after each call when a path is set", async () => {
		const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "investigate-server-test-"))
		const memoryPath = path.join(tmpDir, "memory.json")
		try {
			const { planner, executor } = stubs({ ok: true, payload: [{ id: 1 }] }, [])
			const c = await connect(createServer({
				config: configSchema.parse({ memoryPath }),
				logger: silentLogger,
				settings: DEFAULT_CONFIG,
				planner,
				executor,
				credentialProvider: () => ({}),
			}))

			await call(c, "cloud_query", { provider: "gcp", query: "SELECT id FROM gcp_project" })
			expect(loadMemory(memoryPath).successes).toHaveLength(1)
		} finally {
			await client?.close()
			await server?.close()
			client = null
			server = null
			fs.rmSync(tmpDir, { recursive: true, force: true })
		}
	})
})
