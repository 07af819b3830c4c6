/**
 * Agent Memory
 *
 * Bounded, insertion-ordered history of query successes and failures, plus
 * learned intent → query patterns. One instance per agent (or shared between
 * agents); only the query tool writes to it.
 *
 * Appends and trims are synchronous, so concurrent tool calls on the event
 * loop can never interleave inside a record operation.
 *
 * Snapshots (toJSON / saveMemory / loadMemory) are optional; the in-process
 * structure is the contract.
 */

import * as fs from "fs"
import * as path from "path"
import { v4 as uuidv4 } from "uuid"
import { z } from "zod"
import { CLOUD_PROVIDERS } from "./agent_types.js"
import type { CloudProvider, QueryFailure, QueryPattern, QuerySuccess } from "./agent_types.js"
import { MEMORY_LIMITS } from "./config.js"

export interface AgentMemoryOptions {
	maxSuccesses?: number
	maxFailures?: number
	now?: () => Date
}

// ============================================================================
// Snapshot schema
// ============================================================================

const providerSchema = z.enum(CLOUD_PROVIDERS)

const successSchema = z.object({
	original_intent: z.string(),
	generated_query: z.string(),
	result_count: z.number().int().nonnegative(),
	provider: providerSchema,
	timestamp: z.string(),
	pattern_used: z.string().optional(),
})

const failureSchema = z.object({
	original_intent: z.string(),
	generated_query: z.string(),
	error_message: z.string(),
	error_type: z.enum(["schema", "syntax", "auth", "timeout", "unknown"]),
	provider: providerSchema,
	timestamp: z.string(),
	lesson_learned: z.string(),
})

const patternSchema = z.object({
	id: z.string(),
	intent: z.string(),
	template: z.string(),
	provider: providerSchema,
	success_count: z.number().int().nonnegative(),
	failure_count: z.number().int().nonnegative(),
	success_rate: z.number().min(0).max(1),
	usage_count: z.number().int().nonnegative(),
	created_at: z.string(),
	last_used: z.string(),
})

export const memorySnapshotSchema = z.object({
	successes: z.array(successSchema).default([]),
	failures: z.array(failureSchema).default([]),
	patterns: z.array(patternSchema).default([]),
	last_update: z.string().nullable().default(null),
})

export type MemorySnapshot = z.infer<typeof memorySnapshotSchema>

// ============================================================================
// AgentMemory
// ============================================================================

/** Pattern key: lowercased intent with collapsed whitespace, per provider */
export function normalizeIntent(intent: string): string {
	return intent.trim().toLowerCase().replace(/\s+/g, " ")
}

function patternKey(intent: string, provider: CloudProvider): string {
	return `${provider}:${normalizeIntent(intent)}`
}

export class AgentMemory {
	private readonly maxSuccesses: number
	private readonly maxFailures: number
	private readonly now: () => Date
	private _successes: QuerySuccess[] = []
	private _failures: QueryFailure[] = []
	private readonly _patterns = new Map<string, QueryPattern>()
	private _lastUpdate: string | null = null

	constructor(options: AgentMemoryOptions = {}) {
		this.maxSuccesses = options.maxSuccesses ?? MEMORY_LIMITS.maxSuccesses
		this.maxFailures = options.maxFailures ?? MEMORY_LIMITS.maxFailures
		this.now = options.now ?? (() => new Date())
	}

	/** Oldest first */
	get successes(): readonly QuerySuccess[] {
		return this._successes
	}

	/** Oldest first */
	get failures(): readonly QueryFailure[] {
		return this._failures
	}

	get patterns(): readonly QueryPattern[] {
		return [...this._patterns.values()]
	}

	get lastUpdate(): string | null {
		return this._lastUpdate
	}

	timestamp(): string {
		return this.now().toISOString()
	}

	recordSuccess(success: QuerySuccess): void {
		this._successes.push(Object.freeze({ ...success }))
		if (this._successes.length > this.maxSuccesses) {
			this._successes = this._successes.slice(this._successes.length - this.maxSuccesses)
		}
		this._lastUpdate = this.timestamp()
	}

	recordFailure(failure: QueryFailure): void {
		this._failures.push(Object.freeze({ ...failure }))
		if (this._failures.length > this.maxFailures) {
			this._failures = this._failures.slice(this._failures.length - this.maxFailures)
		}
		this._lastUpdate = this.timestamp()
	}

	/**
	 * Distinct lessons, most recent first.
	 */
	recentLessons(limit: number): string[] {
		const lessons: string[] = []
		for (let i = this._failures.length - 1; i >= 0 && lessons.length < limit; i--) {
			const lesson = this._failures[i].lesson_learned
			if (!lessons.includes(lesson)) lessons.push(lesson)
		}
		return lessons
	}

	findPattern(intent: string, provider: CloudProvider): QueryPattern | undefined {
		return this._patterns.get(patternKey(intent, provider))
	}

	/**
	 * Update (or create, on success) the pattern for an intent.
	 * Failures only count against patterns that already exist.
	 */
	learnPattern(intent: string, query: string, provider: CloudProvider, success: boolean): QueryPattern | undefined {
		const key = patternKey(intent, provider)
		const ts = this.timestamp()
		const existing = this._patterns.get(key)

		if (!existing) {
			if (!success) return undefined
			const created: QueryPattern = {
				id: uuidv4(),
				intent: normalizeIntent(intent),
				template: query,
				provider,
				success_count: 1,
				failure_count: 0,
				success_rate: 1,
				usage_count: 1,
				created_at: ts,
				last_used: ts,
			}
			this._patterns.set(key, created)
			return created
		}

		const success_count = existing.success_count + (success ? 1 : 0)
		const failure_count = existing.failure_count + (success ? 0 : 1)
		const updated: QueryPattern = {
			...existing,
			template: success ? query : existing.template,
			success_count,
			failure_count,
			success_rate: success_count / (success_count + failure_count),
			usage_count: existing.usage_count + 1,
			last_used: ts,
		}
		this._patterns.set(key, updated)
		return updated
	}

	toJSON(): MemorySnapshot {
		return {
			successes: [...this._successes],
			failures: [...this._failures],
			patterns: this.patterns.map((p) => ({ ...p })),
			last_update: this._lastUpdate,
		}
	}

	static fromJSON(data: unknown, options: AgentMemoryOptions = {}): AgentMemory {
		const snapshot = memorySnapshotSchema.parse(data)
		const memory = new AgentMemory(options)
		for (const s of snapshot.successes) memory.recordSuccess(s)
		for (const f of snapshot.failures) memory.recordFailure(f)
		for (const p of snapshot.patterns) memory._patterns.set(patternKey(p.intent, p.provider), p)
		memory._lastUpdate = snapshot.last_update
		return memory
	}
}

// ============================================================================
// Snapshot files
// ============================================================================

export function saveMemory(memory: AgentMemory, filePath: string): void {
	fs.mkdirSync(path.dirname(filePath), { recursive: true })
	fs.writeFileSync(filePath, JSON.stringify(memory.toJSON(), null, 2))
}

/**
 * Load a snapshot. A missing file yields empty memory; an unreadable or
 * invalid file throws.
 */
export function loadMemory(filePath: string, options: AgentMemoryOptions = {}): AgentMemory {
	if (!fs.existsSync(filePath)) return new AgentMemory(options)
	const raw = fs.readFileSync(filePath, "utf-8")
	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (e) {
		throw new Error(`Agent memory at ${filePath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`)
	}
	return AgentMemory.fromJSON(parsed, options)
}
