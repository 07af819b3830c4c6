/**
 * Query Error Classification
 *
 * Turns raw executor error text into an error type and a short lesson that is
 * fed back into future planning prompts. Both checks are ordered and
 * first-match-wins, over the text as received (case-sensitive).
 */

import type { QueryErrorType } from "./agent_types.js"

interface ClassificationRule {
	type: QueryErrorType
	matches: (message: string) => boolean
}

const CLASSIFICATION_RULES: ClassificationRule[] = [
	{ type: "schema", matches: (m) => m.includes("column") && m.includes("does not exist") },
	{ type: "syntax", matches: (m) => m.includes("syntax") },
	{ type: "auth", matches: (m) => m.includes("authentication") || m.includes("access") },
	{ type: "timeout", matches: (m) => m.includes("timeout") },
]

export function classifyQueryError(message: string): QueryErrorType {
	for (const rule of CLASSIFICATION_RULES) {
		if (rule.matches(message)) return rule.type
	}
	return "unknown"
}

const LESSON_RULES: Array<{ needle: string; lesson: string }> = [
	{
		needle: 'column "state"',
		lesson: "Use 'instance_state' instead of 'state' for EC2 instance queries",
	},
	{
		needle: 'column "running"',
		lesson: "Use 'instance_state = \"running\"' instead of 'running' column",
	},
	{
		needle: "group_id",
		lesson: "Use JSONB operators for security group fields: sg->>'GroupId'",
	},
]

export const DEFAULT_LESSON = "Query failed - need to improve schema understanding"

export function generateLesson(message: string): string {
	return LESSON_RULES.find((rule) => message.includes(rule.needle))?.lesson ?? DEFAULT_LESSON
}
