/**
 * Investigation Types
 *
 * Data model shared by the query tool, agent memory and investigation agent.
 * Field names follow the JSON shapes returned over MCP (snake_case).
 */

// ============================================================================
// Providers & rows
// ============================================================================

export const CLOUD_PROVIDERS = ["aws", "azure", "gcp"] as const

export type CloudProvider = (typeof CLOUD_PROVIDERS)[number]

export function isCloudProvider(value: unknown): value is CloudProvider {
	return typeof value === "string" && (CLOUD_PROVIDERS as readonly string[]).includes(value)
}

/** One result row; tables differ per provider so there is no static shape */
export type Row = Record<string, unknown>

export type Credentials = Record<string, string>

// ============================================================================
// Memory records
// ============================================================================

export type QueryErrorType = "schema" | "syntax" | "auth" | "timeout" | "unknown"

export interface QuerySuccess {
	readonly original_intent: string
	readonly generated_query: string
	readonly result_count: number
	readonly provider: CloudProvider
	/** ISO-8601 */
	readonly timestamp: string
	readonly pattern_used?: string
}

export interface QueryFailure {
	readonly original_intent: string
	readonly generated_query: string
	readonly error_message: string
	readonly error_type: QueryErrorType
	readonly provider: CloudProvider
	readonly timestamp: string
	readonly lesson_learned: string
}

export interface ColumnInfo {
	name: string
	type: string
	description: string
	required: boolean
	examples?: string[]
}

/** Discovered table schema, cached by SchemaLearner under "<provider>.<table>" */
export interface TableSchema {
	table_name: string
	provider: CloudProvider
	description: string
	columns: ColumnInfo[]
	last_updated: string
}

/** Learned intent → query mapping, keyed by normalized intent */
export interface QueryPattern {
	id: string
	intent: string
	template: string
	provider: CloudProvider
	success_count: number
	failure_count: number
	success_rate: number
	usage_count: number
	created_at: string
	last_used: string
}

// ============================================================================
// Insights
// ============================================================================

export type InsightSeverity = "info" | "low" | "medium" | "high" | "critical"

export type InsightType = "security" | "cost" | "compliance" | "inventory" | "coverage" | "performance"

export interface Insight {
	type: InsightType
	severity: InsightSeverity
	title: string
	description: string
	impact: string
	recommendation: string
	/** 0.0 - 1.0 */
	confidence: number
}

// ============================================================================
// Investigation
// ============================================================================

export interface InvestigationRequest {
	prompt: string
	provider: CloudProvider
	region?: string
	/** Never logged or serialized */
	credentials?: Credentials
}

/** How a failed step failed: a classified executor error, or the caller stopped it */
export type StepErrorKind = QueryErrorType | "cancelled"

export interface InvestigationStep {
	/** 1-based, strictly increasing within one investigation */
	readonly step_number: number
	readonly description: string
	readonly query: string
	readonly results: readonly Row[]
	readonly success: boolean
	readonly error?: string
	readonly error_kind?: StepErrorKind
	readonly execution_time_ms: number
	readonly insights: readonly Insight[]
}

export interface InvestigationResult {
	investigation_id: string
	success: boolean
	steps: InvestigationStep[]
	summary: string
	insights: Insight[]
	query_count: number
	duration_ms: number
	/** Fraction of attempted steps that succeeded */
	confidence: number
}

/** One step as returned by the planner */
export interface PlannedStep {
	description: string
	query: string
}

export type InvestigationState =
	| "received"
	| "plan_requested"
	| "step_loop"
	| "aggregating"
	| "completed"
	| "failed"
