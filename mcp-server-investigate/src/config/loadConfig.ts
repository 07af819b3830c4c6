/**
 * Unified config loader for the investigation server.
 *
 * Precedence: ENV > config/config.local.yaml > config/config.yaml > built-in defaults
 */

import * as fs from "fs"
import * as path from "path"
import * as yaml from "js-yaml"

// ── Types ────────────────────────────────────────────────────────────

export interface InvestigatorConfig {
	steampipe: {
		host: string
		port: number
		database: string
		user: string
		password: string
		statement_timeout_ms: number
		max_connections: number
	}
	planner: {
		url: string
		timeout_ms: number
	}
	agent: {
		max_steps: number
		investigation_timeout_ms: number
	}
	memory: {
		max_successes: number
		max_failures: number
		/** Snapshot file; empty string keeps memory in-process only */
		path: string
	}
	prompt: {
		max_lessons: number
	}
	logging: {
		level: string
	}
}

export const DEFAULT_CONFIG: InvestigatorConfig = {
	steampipe: {
		host: "localhost",
		port: 9193,
		database: "steampipe",
		user: "steampipe",
		password: "",
		statement_timeout_ms: 30000,
		max_connections: 5,
	},
	planner: {
		url: "http://localhost:8001",
		timeout_ms: 60000,
	},
	agent: {
		max_steps: 10,
		investigation_timeout_ms: 300000,
	},
	memory: {
		max_successes: 100,
		max_failures: 50,
		path: "",
	},
	prompt: {
		max_lessons: 10,
	},
	logging: {
		level: "info",
	},
}

type RawConfig = Record<string, unknown>

function isRecord(value: unknown): value is RawConfig {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

// ── YAML Loading ─────────────────────────────────────────────────────

function findConfigDir(startDir: string): string | null {
	// Walk up from startDir looking for config/config.yaml
	let dir = startDir
	for (let i = 0; i < 10; i++) {
		const candidate = path.join(dir, "config", "config.yaml")
		if (fs.existsSync(candidate)) return path.join(dir, "config")
		const parent = path.dirname(dir)
		if (parent === dir) break
		dir = parent
	}
	return null
}

function loadYaml(filePath: string): RawConfig {
	if (!fs.existsSync(filePath)) return {}
	const raw = fs.readFileSync(filePath, "utf-8")
	const parsed = yaml.load(raw)
	return isRecord(parsed) ? parsed : {}
}

/** Deep merge b into a (b wins on conflicts). */
function deepMerge(a: RawConfig, b: RawConfig): RawConfig {
	const result: RawConfig = { ...a }
	for (const key of Object.keys(b)) {
		const left = a[key]
		const right = b[key]
		if (isRecord(left) && isRecord(right)) {
			result[key] = deepMerge(left, right)
		} else {
			result[key] = right
		}
	}
	return result
}

// ── Typed projection ─────────────────────────────────────────────────

function section(cfg: RawConfig, key: string): RawConfig {
	const value = cfg[key]
	return isRecord(value) ? value : {}
}

function str(value: unknown, fallback: string): string {
	if (typeof value === "string") return value
	if (typeof value === "number") return String(value)
	return fallback
}

function num(value: unknown, fallback: number): number {
	return typeof value === "number" && Number.isFinite(value) ? value : fallback
}

function toConfig(raw: RawConfig): InvestigatorConfig {
	const d = DEFAULT_CONFIG
	const sp = section(raw, "steampipe")
	const pl = section(raw, "planner")
	const ag = section(raw, "agent")
	const mem = section(raw, "memory")
	const pr = section(raw, "prompt")
	const lg = section(raw, "logging")

	return {
		steampipe: {
			host: str(sp.host, d.steampipe.host),
			port: num(sp.port, d.steampipe.port),
			database: str(sp.database, d.steampipe.database),
			user: str(sp.user, d.steampipe.user),
			password: str(sp.password, d.steampipe.password),
			statement_timeout_ms: num(sp.statement_timeout_ms, d.steampipe.statement_timeout_ms),
			max_connections: num(sp.max_connections, d.steampipe.max_connections),
		},
		planner: {
			url: str(pl.url, d.planner.url),
			timeout_ms: num(pl.timeout_ms, d.planner.timeout_ms),
		},
		agent: {
			max_steps: num(ag.max_steps, d.agent.max_steps),
			investigation_timeout_ms: num(ag.investigation_timeout_ms, d.agent.investigation_timeout_ms),
		},
		memory: {
			max_successes: num(mem.max_successes, d.memory.max_successes),
			max_failures: num(mem.max_failures, d.memory.max_failures),
			path: str(mem.path, d.memory.path),
		},
		prompt: {
			max_lessons: num(pr.max_lessons, d.prompt.max_lessons),
		},
		logging: {
			level: str(lg.level, d.logging.level),
		},
	}
}

// ── Env Overlay ──────────────────────────────────────────────────────

/** Read env var, returning undefined if not set. */
function env(name: string): string | undefined {
	return process.env[name]
}
function envInt(name: string): number | undefined {
	const v = env(name)
	if (v === undefined) return undefined
	const n = parseInt(v, 10)
	return isNaN(n) ? undefined : n
}

function applyEnvOverrides(cfg: InvestigatorConfig): void {
	const sp = cfg.steampipe
	sp.host = env("STEAMPIPE_HOST") ?? sp.host
	sp.port = envInt("STEAMPIPE_PORT") ?? sp.port
	sp.database = env("STEAMPIPE_DATABASE") ?? sp.database
	sp.user = env("STEAMPIPE_USER") ?? sp.user
	sp.password = env("STEAMPIPE_PASSWORD") ?? sp.password
	sp.statement_timeout_ms = envInt("STEAMPIPE_STATEMENT_TIMEOUT_MS") ?? sp.statement_timeout_ms

	cfg.planner.url = env("PLANNER_URL") ?? cfg.planner.url
	cfg.planner.timeout_ms = envInt("PLANNER_TIMEOUT_MS") ?? cfg.planner.timeout_ms

	cfg.agent.max_steps = envInt("AGENT_MAX_STEPS") ?? cfg.agent.max_steps
	cfg.agent.investigation_timeout_ms = envInt("INVESTIGATION_TIMEOUT_MS") ?? cfg.agent.investigation_timeout_ms

	cfg.memory.path = env("AGENT_MEMORY_PATH") ?? cfg.memory.path

	cfg.logging.level = env("LOG_LEVEL") ?? cfg.logging.level
}

// ── Singleton ────────────────────────────────────────────────────────

let _config: InvestigatorConfig | null = null

export interface LoadConfigOptions {
	/** Directory the config/ lookup starts from (defaults to process.cwd()) */
	cwd?: string
}

export function loadConfig(options: LoadConfigOptions = {}): InvestigatorConfig {
	if (_config) return _config

	const configDir = findConfigDir(options.cwd ?? process.cwd())
	let merged: RawConfig = {}

	if (configDir) {
		const base = loadYaml(path.join(configDir, "config.yaml"))
		const local = loadYaml(path.join(configDir, "config.local.yaml"))
		merged = deepMerge(base, local)
	}

	const cfg = toConfig(merged)
	applyEnvOverrides(cfg)
	_config = cfg
	return _config
}

export function getConfig(): InvestigatorConfig {
	return _config ?? loadConfig()
}

/** Reset singleton (for tests). */
export function resetConfig(): void {
	_config = null
}
