import { describe, it, expect, beforeEach, afterEach } from "vitest"
import * as fs from "fs"
import * as path from "path"
import * as os from "os"
import { loadConfig, resetConfig, getConfig, DEFAULT_CONFIG } from "./loadConfig.js"

/**
 * Tests for the unified config loader.
 *
 * Strategy: create a temp directory with config/config.yaml (and optionally
 * config.local.yaml), point loadConfig() at it, and verify it reads the right
 * values. Env-var overrides are tested by setting process.env before loading.
 */

let tmpDir: string
const savedEnv: Record<string, string | undefined> = {}

// Env vars the loader reads; saved and restored around each test
const ENV_VARS = [
	"STEAMPIPE_HOST", "STEAMPIPE_PORT", "STEAMPIPE_DATABASE", "STEAMPIPE_USER",
	"STEAMPIPE_PASSWORD", "STEAMPIPE_STATEMENT_TIMEOUT_MS",
	"PLANNER_URL", "PLANNER_TIMEOUT_MS",
	"AGENT_MAX_STEPS", "INVESTIGATION_TIMEOUT_MS",
	"AGENT_MEMORY_PATH", "LOG_LEVEL",
]

function writeYaml(dir: string, filename: string, content: string) {
	const configDir = path.join(dir, "config")
	fs.mkdirSync(configDir, { recursive: true })
	fs.writeFileSync(path.join(configDir, filename), content)
}

beforeEach(() => {
	resetConfig()
	for (const v of ENV_VARS) {
		savedEnv[v] = process.env[v]
		delete process.env[v]
	}
	tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "investigate-config-test-"))
})

afterEach(() => {
	fs.rmSync(tmpDir, { recursive: true, force: true })
	for (const v of ENV_VARS) {
		if (savedEnv[v] === undefined) {
			delete process.env[v]
		} else {
			process.env[v] = savedEnv[v]
		}
	}
	resetConfig()
})

// ── Basic Loading ─────────────────────────────────────────────────────

describe("loadConfig: basic YAML loading", () => {
	it("loads values from config/config.yaml", () => {
		writeYaml(tmpDir, "config.yaml", `
steampipe:
  host: steampipe.internal
  port: 9200
  database: sp
  user: reader
  password: test-secret
  statement_timeout_ms: 15000
  max_connections: 2
planner:
  url: "http://planner:9000"
  timeout_ms: 5000
agent:
  max_steps: 4
  investigation_timeout_ms: 60000
memory:
  max_successes: 20
  max_failures: 10
  path: "/var/lib/investigate/memory.json"
prompt:
  max_lessons: 3
logging:
  level: debug
`)
		const cfg = loadConfig({ cwd: tmpDir })

		expect(cfg.steampipe.host).toBe("steampipe.internal")
		expect(cfg.steampipe.port).toBe(9200)
		expect(cfg.steampipe.database).toBe("sp")
		expect(cfg.steampipe.user).toBe("reader")
		expect(cfg.steampipe.password).toBe("test-secret")
		expect(cfg.steampipe.statement_timeout_ms).toBe(15000)
		expect(cfg.steampipe.max_connections).toBe(2)

		expect(cfg.planner.url).toBe("http://planner:9000")
		expect(cfg.planner.timeout_ms).toBe(5000)

		expect(cfg.agent.max_steps).toBe(4)
		expect(cfg.agent.investigation_timeout_ms).toBe(60000)

		expect(cfg.memory.max_successes).toBe(20)
		expect(cfg.memory.max_failures).toBe(10)
		expect(cfg.memory.path).toBe("/var/lib/investigate/memory.json")

		expect(cfg.prompt.max_lessons).toBe(3)
		expect(cfg.logging.level).toBe("debug")
	})

	it("falls back to defaults when no config directory exists", () => {
		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg).toEqual(DEFAULT_CONFIG)
	})

	it("fills missing keys from defaults", () => {
		writeYaml(tmpDir, "config.yaml", `
steampipe:
  host: other-host
`)
		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg.steampipe.host).toBe("other-host")
		expect(cfg.steampipe.port).toBe(9193)
		expect(cfg.planner.url).toBe("http://localhost:8001")
		expect(cfg.memory.max_failures).toBe(50)
	})

	it("ignores values of the wrong type", () => {
		writeYaml(tmpDir, "config.yaml", `
steampipe:
  port: "not-a-port"
agent:
  max_steps: [1, 2]
`)
		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg.steampipe.port).toBe(9193)
		expect(cfg.agent.max_steps).toBe(10)
	})

	it("finds config/ in a parent directory", () => {
		writeYaml(tmpDir, "config.yaml", `
planner:
  url: "http://parent-planner:1234"
`)
		const nested = path.join(tmpDir, "a", "b")
		fs.mkdirSync(nested, { recursive: true })
		const cfg = loadConfig({ cwd: nested })
		expect(cfg.planner.url).toBe("http://parent-planner:1234")
	})
})

// ── Local Overrides ───────────────────────────────────────────────────

describe("loadConfig: config.local.yaml", () => {
	it("deep-merges local values over base values", () => {
		writeYaml(tmpDir, "config.yaml", `
steampipe:
  host: base-host
  port: 9193
logging:
  level: info
`)
		writeYaml(tmpDir, "config.local.yaml", `
steampipe:
  host: local-host
`)
		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg.steampipe.host).toBe("local-host")
		expect(cfg.steampipe.port).toBe(9193)
		expect(cfg.logging.level).toBe("info")
	})
})

// ── Env Overrides ─────────────────────────────────────────────────────

describe("loadConfig: env overrides", () => {
	it("env vars win over YAML", () => {
		writeYaml(tmpDir, "config.yaml", `
steampipe:
  host: yaml-host
  port: 9193
planner:
  url: "http://yaml-planner:8001"
`)
		process.env.STEAMPIPE_HOST = "env-host"
		process.env.STEAMPIPE_PORT = "9999"
		process.env.PLANNER_URL = "http://env-planner:8001"
		process.env.AGENT_MAX_STEPS = "3"
		process.env.AGENT_MEMORY_PATH = "/tmp/memory.json"
		process.env.LOG_LEVEL = "warn"

		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg.steampipe.host).toBe("env-host")
		expect(cfg.steampipe.port).toBe(9999)
		expect(cfg.planner.url).toBe("http://env-planner:8001")
		expect(cfg.agent.max_steps).toBe(3)
		expect(cfg.memory.path).toBe("/tmp/memory.json")
		expect(cfg.logging.level).toBe("warn")
	})

	it("ignores non-numeric values for numeric env vars", () => {
		process.env.STEAMPIPE_PORT = "abc"
		const cfg = loadConfig({ cwd: tmpDir })
		expect(cfg.steampipe.port).toBe(9193)
	})
})

// ── Singleton ─────────────────────────────────────────────────────────

describe("loadConfig: singleton", () => {
	it("returns the cached config until reset", () => {
		writeYaml(tmpDir, "config.yaml", `
logging:
  level: debug
`)
		const first = loadConfig({ cwd: tmpDir })
		writeYaml(tmpDir, "config.yaml", `
logging:
  level: error
`)
		expect(getConfig()).toBe(first)
		expect(loadConfig({ cwd: tmpDir }).logging.level).toBe("debug")

		resetConfig()
		expect(loadConfig({ cwd: tmpDir }).logging.level).toBe("error")
	})
})
