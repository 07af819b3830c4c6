/**
 * Prompt Enhancer
 *
 * Builds the context string sent to the planner. Lessons from earlier failed
 * queries are folded in so the planner does not repeat the same mistakes.
 */

import type { AgentMemory } from "./agent_memory.js"
import type { InvestigationRequest } from "./agent_types.js"
import { DEFAULTS } from "./config.js"

/** The enhancer only reads memory */
export type LessonSource = Pick<AgentMemory, "recentLessons">

export interface EnhanceOptions {
	maxLessons?: number
	/** Output of resolveTables(); rendered as a hint line when given */
	candidateTables?: string[]
	/** Rendered schema section (SchemaLearner.generateSchemaPrompt) */
	schemaContext?: string
}

export function enhancePrompt(
	request: Pick<InvestigationRequest, "prompt" | "provider" | "region">,
	memory: LessonSource,
	options: EnhanceOptions = {},
): string {
	const lines: string[] = [request.prompt, `TARGET PROVIDER: ${request.provider}`]

	if (request.region && request.region.trim() !== "") {
		lines.push(`REGION: ${request.region}`)
	}

	if (options.candidateTables && options.candidateTables.length > 0) {
		lines.push(`CANDIDATE TABLES: ${options.candidateTables.join(", ")}`)
	}

	const lessons = memory.recentLessons(options.maxLessons ?? DEFAULTS.maxLessons)
	if (lessons.length > 0) {
		lines.push("KNOWN ISSUES TO AVOID:")
		for (const lesson of lessons) {
			lines.push(`- ${lesson}`)
		}
	}

	if (options.schemaContext && options.schemaContext.trim() !== "") {
		lines.push(options.schemaContext.trim())
	}

	return lines.join("\n")
}
