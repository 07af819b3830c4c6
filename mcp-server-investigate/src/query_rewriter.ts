/**
 * Query Rewriter
 *
 * Deterministic cleanup of planner-generated queries before execution:
 * 1. Only the first statement of a multi-statement string is kept
 * 2. Provider-specific substitutions fix column/operator mistakes the planner
 *    is known to make against Steampipe tables
 *
 * Substitution keys within a provider table must never overlap (no key contains,
 * or shares a prefix/suffix with, another key) and no replacement may contain a
 * key. Rules are therefore order-independent and the rewrite is a fixed point.
 * Tables are checked when this module loads.
 */

import type { CloudProvider } from "./agent_types.js"
import { ValidationError } from "./config.js"

// ============================================================================
// Types
// ============================================================================

export interface SubstitutionRule {
	name: string
	find: string
	replace: string
}

export interface RewriteResult {
	/** Rewritten query */
	query: string
	/** Names of substitution rules applied */
	applied: string[]
	/** Whether trailing statements were dropped */
	truncated: boolean
	/** Number of statements found in the input */
	statementCount: number
	/** Whether the output differs from the trimmed input */
	changed: boolean
}

// ============================================================================
// Substitution Tables
// ============================================================================

const AWS_RULES: SubstitutionRule[] = [
	{ name: "STATE_TO_INSTANCE_STATE", find: " state =", replace: " instance_state =" },
	{ name: "STATE_NAME_TO_INSTANCE_STATE", find: " state_name =", replace: " instance_state =" },
	{ name: "BARE_RUNNING_FILTER", find: "WHERE running", replace: "WHERE instance_state = 'running'" },
	{ name: "BARE_STOPPED_FILTER", find: "WHERE stopped", replace: "WHERE instance_state = 'stopped'" },
	{ name: "SG_GROUP_ID_JSONB", find: "sg.group_id", replace: "sg->>'GroupId'" },
	{ name: "SG_GROUP_NAME_JSONB", find: "sg.group_name", replace: "sg->>'GroupName'" },
]

export const SUBSTITUTION_RULES: Record<CloudProvider, readonly SubstitutionRule[]> = {
	aws: AWS_RULES,
	azure: [],
	gcp: [],
}

/**
 * Return the first conflict in a rule table, or null.
 */
export function findRuleConflict(rules: readonly SubstitutionRule[]): string | null {
	for (const a of rules) {
		if (a.find.length === 0) return `${a.name}: empty pattern`
		for (const b of rules) {
			if (b.find.includes(a.find) && a !== b) {
				return `${b.name} contains ${a.name}`
			}
			if (a.replace.includes(b.find)) {
				return `replacement of ${a.name} reintroduces ${b.name}`
			}
			if (a === b) continue
			const max = Math.min(a.find.length, b.find.length) - 1
			for (let k = 1; k <= max; k++) {
				if (a.find.endsWith(b.find.slice(0, k))) {
					return `${a.name} overlaps ${b.name}`
				}
			}
		}
	}
	return null
}

for (const [provider, rules] of Object.entries(SUBSTITUTION_RULES)) {
	const conflict = findRuleConflict(rules)
	if (conflict) {
		throw new Error(`Overlapping substitution rules for ${provider}: ${conflict}`)
	}
}

// ============================================================================
// Statement Splitting
// ============================================================================

/** `$$` or `$tag$` opening a dollar-quoted string */
const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/
const IDENT_CHAR = /[A-Za-z0-9_$]/

/**
 * Split on semicolons outside quoted strings/identifiers, dollar-quoted
 * strings, and line or block comments.
 * Returns trimmed statements; segments holding only whitespace or comments are dropped.
 * An unterminated quote or comment runs to the end of the input.
 */
export function splitStatements(sql: string): string[] {
	const statements: string[] = []
	let start = 0
	let hasCode = false
	let i = 0

	const skipTo = (close: string, from: number): number => {
		const at = sql.indexOf(close, from)
		return at === -1 ? sql.length : at + close.length
	}

	while (i < sql.length) {
		const ch = sql[i]
		const next = sql[i + 1]

		if (ch === "-" && next === "-") {
			i = skipTo("\n", i + 2)
			continue
		}
		if (ch === "/" && next === "*") {
			i = skipTo("*/", i + 2)
			continue
		}
		if (ch === ";") {
			if (hasCode) statements.push(sql.slice(start, i).trim())
			start = i + 1
			hasCode = false
			i++
			continue
		}
		if (ch.trim().length > 0) hasCode = true

		if (ch === "'" || ch === '"') {
			i = skipTo(ch, i + 1)
			continue
		}
		if (ch === "$" && (i === 0 || !IDENT_CHAR.test(sql[i - 1]))) {
			const tag = DOLLAR_TAG.exec(sql.slice(i))
			if (tag) {
				i = skipTo(tag[0], i + tag[0].length)
				continue
			}
		}
		i++
	}
	if (hasCode) statements.push(sql.slice(start).trim())

	return statements
}

// ============================================================================
// Main Entry Point
// ============================================================================

export function applySubstitutions(
	query: string,
	provider: CloudProvider,
): { query: string; applied: string[] } {
	const applied: string[] = []
	let improved = query
	for (const rule of SUBSTITUTION_RULES[provider]) {
		if (improved.includes(rule.find)) {
			improved = improved.replaceAll(rule.find, rule.replace)
			applied.push(rule.name)
		}
	}
	return { query: improved, applied }
}

/**
 * Normalize a candidate query.
 *
 * @throws ValidationError when the query is empty after trimming
 */
export function rewriteQuery(query: string, provider: CloudProvider): RewriteResult {
	const trimmed = query.trim()
	if (trimmed.length === 0) {
		throw new ValidationError("query is required")
	}

	const statements = splitStatements(trimmed)
	if (statements.length === 0) {
		throw new ValidationError("query contains no statement", { query })
	}

	const truncated = statements.length > 1
	const single = truncated ? statements[0] : trimmed
	const { query: improved, applied } = applySubstitutions(single, provider)

	return {
		query: improved,
		applied,
		truncated,
		statementCount: statements.length,
		changed: improved !== trimmed,
	}
}
