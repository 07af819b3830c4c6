/**
 * Configuration for the investigation MCP server
 *
 * Includes types, constants, and configuration for:
 * - Planner service connection
 * - Memory caps and agent limits
 * - Query tool request/response envelope
 * - Structured errors
 */

import type { CloudProvider, Credentials, Insight, QueryErrorType, Row } from "./agent_types.js"

/**
 * Planner service endpoints (relative to planner.url)
 */
export const PLANNER_ENDPOINTS = {
	generatePlan: "/generate_plan",
	health: "/health",
}

/**
 * Memory caps. Oldest records are dropped first.
 */
export const MEMORY_LIMITS = {
	maxSuccesses: 100,
	maxFailures: 50,
}

/**
 * Default configuration values
 */
export const DEFAULTS = {
	maxLessons: 10,
	maxSteps: 10,
	outputFormat: "json",
	/** Confidence reported when no step was attempted */
	emptyConfidence: 0,
} as const

/**
 * Request envelope for a single cloud query (the cloud_query tool)
 */
export interface CloudQueryRequest {
	provider: CloudProvider
	query: string
	credentials?: Credentials
	/** Natural-language intent recorded in memory; defaults to the query text */
	intent?: string
}

/**
 * Response envelope for a single cloud query
 */
export interface CloudQueryResponse {
	success: boolean
	results: Row[]
	row_count: number
	execution_time_ms: number
	/** The query actually sent to the executor (after rewriting) */
	query: string
	error?: string
	error_type?: QueryErrorType
	lesson?: string
	insights: Insight[]
}

/**
 * Error types for structured error handling
 *
 * - validation: malformed request, nothing was executed
 * - planner: plan generation failed, no steps attempted
 * - cancelled: caller cancelled or the deadline passed
 */
export type InvestigationErrorType = "validation" | "planner" | "cancelled"

export class InvestigationError extends Error {
	constructor(
		public type: InvestigationErrorType,
		message: string,
		public recoverable: boolean = false,
		public context?: Record<string, unknown>,
	) {
		super(message)
		this.name = "InvestigationError"
	}
}

export class ValidationError extends InvestigationError {
	constructor(message: string, context?: Record<string, unknown>) {
		super("validation", message, false, context)
		this.name = "ValidationError"
	}
}

export class PlannerError extends InvestigationError {
	constructor(message: string, recoverable: boolean = false, context?: Record<string, unknown>) {
		super("planner", message, recoverable, context)
		this.name = "PlannerError"
	}
}

export class CancellationError extends InvestigationError {
	constructor(
		message: string,
		/** "timeout" when a deadline fired, "cancelled" when the caller aborted */
		public reason: "timeout" | "cancelled" = "cancelled",
		context?: Record<string, unknown>,
	) {
		super("cancelled", message, true, context)
		this.name = "CancellationError"
	}
}

/**
 * Map an aborted signal to its cancellation kind.
 * AbortSignal.timeout() aborts with a DOMException named "TimeoutError".
 */
export function cancellationReason(signal: AbortSignal): "timeout" | "cancelled" {
	const reason: unknown = signal.reason
	if (reason instanceof CancellationError) return reason.reason
	if (typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError") {
		return "timeout"
	}
	return "cancelled"
}
