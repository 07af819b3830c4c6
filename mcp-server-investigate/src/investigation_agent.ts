/**
 * Investigation Agent
 *
 * received → plan_requested → step_loop → aggregating → completed, or failed.
 *
 * The planner is called once per investigation, then each planned step runs
 * through the query tool in order. A failing step does not stop the loop;
 * cancellation or the investigation deadline does. Validation and planner
 * errors are thrown, everything else ends in an InvestigationResult.
 */

import { v4 as uuidv4 } from "uuid"
import type { AgentMemory } from "./agent_memory.js"
import { isCloudProvider } from "./agent_types.js"
import type {
	CloudProvider,
	Credentials,
	Insight,
	InvestigationRequest,
	InvestigationResult,
	InvestigationState,
	InvestigationStep,
	PlannedStep,
} from "./agent_types.js"
import { CancellationError, DEFAULTS, PlannerError, ValidationError } from "./config.js"
import type { CloudQueryResponse } from "./config.js"
import { describeCredentials, getProviderCredentials } from "./credentials.js"
import type { CredentialProvider } from "./credentials.js"
import { classifyQueryError } from "./error_classifier.js"
import { extractInsightsFromText } from "./insight_extractor.js"
import type { Logger } from "./logger.js"
import type { Planner } from "./planner_client.js"
import { enhancePrompt } from "./prompt_enhancer.js"
import { abortable, cancellationError, isTextPayload } from "./query_executor.js"
import type { QueryExecutor } from "./query_executor.js"
import { CloudQueryTool } from "./query_tool.js"
import type { SchemaLearner } from "./schema_learner.js"
import { resolveTables } from "./table_resolver.js"

export interface InvestigationAgentOptions {
	planner: Planner
	executor: QueryExecutor
	memory: AgentMemory
	logger: Logger
	/** Adds discovered table schemas to the planning prompt */
	schemaLearner?: SchemaLearner
	/** Used when a request carries no credentials */
	credentialProvider?: CredentialProvider
	maxSteps?: number
	maxLessons?: number
	/** 0 disables the deadline */
	investigationTimeoutMs?: number
}

export interface InvestigateOptions {
	signal?: AbortSignal
	/** Overrides the agent's investigation timeout for this call */
	timeoutMs?: number
}

// ============================================================================
// Validation
// ============================================================================

function isCredentials(value: unknown): value is Credentials {
	if (value === null || typeof value !== "object" || Array.isArray(value)) return false
	return Object.values(value).every((v) => typeof v === "string")
}

/**
 * Checks the request shape at run time; callers outside TypeScript (the MCP
 * surface, scripts) can send anything.
 */
export function validateRequest(request: InvestigationRequest): void {
	const { prompt, provider, region, credentials } = request
	if (typeof prompt !== "string" || prompt.trim() === "") {
		throw new ValidationError("prompt is required")
	}
	if (!isCloudProvider(provider)) {
		throw new ValidationError(`provider must be one of aws, azure, gcp (got ${JSON.stringify(provider)})`, {
			provider,
		})
	}
	if (region !== undefined && typeof region !== "string") {
		throw new ValidationError("region must be a string")
	}
	if (credentials !== undefined && !isCredentials(credentials)) {
		throw new ValidationError("credentials must map names to string values")
	}
}

// ============================================================================
// Summary
// ============================================================================

export function summarizeInvestigation(
	prompt: string,
	provider: CloudProvider,
	steps: readonly InvestigationStep[],
	insights: readonly Insight[],
): string {
	const succeeded = steps.filter((s) => s.success).length
	const rows = steps.reduce((total, s) => total + (s.success ? s.results.length : 0), 0)
	const lines = [
		`Investigated "${prompt}" on ${provider}: ${succeeded}/${steps.length} queries succeeded, ${rows} rows returned.`,
	]

	const findings: string[] = []
	for (const insight of insights) {
		if (insight.severity !== "info" && !findings.includes(insight.title)) {
			findings.push(insight.title)
		}
	}
	if (findings.length > 0) {
		lines.push(`Findings: ${findings.join("; ")}`)
	}

	return lines.join("\n")
}

export function summarizeWithoutSteps(prompt: string, provider: CloudProvider, reason: string): string {
	return `Investigation of "${prompt}" on ${provider} did not run any queries (${reason}).`
}

// ============================================================================
// InvestigationAgent
// ============================================================================

export class InvestigationAgent {
	private planner: Planner
	private memory: AgentMemory
	private logger: Logger
	private queryTool: CloudQueryTool
	private schemaLearner?: SchemaLearner
	private credentialProvider: CredentialProvider
	private maxSteps: number
	private maxLessons: number
	private investigationTimeoutMs: number

	constructor(options: InvestigationAgentOptions) {
		this.planner = options.planner
		this.memory = options.memory
		this.logger = options.logger
		this.queryTool = new CloudQueryTool({ executor: options.executor, memory: options.memory, logger: options.logger })
		this.schemaLearner = options.schemaLearner
		this.credentialProvider = options.credentialProvider ?? ((provider) => getProviderCredentials(provider))
		this.maxSteps = options.maxSteps ?? DEFAULTS.maxSteps
		this.maxLessons = options.maxLessons ?? DEFAULTS.maxLessons
		this.investigationTimeoutMs = options.investigationTimeoutMs ?? 0
	}

	async investigate(request: InvestigationRequest, options: InvestigateOptions = {}): Promise<InvestigationResult> {
		const investigationId = uuidv4()
		const startTime = Date.now()
		let state: InvestigationState = "received"
		const transition = (next: InvestigationState) => {
			this.logger.debug("Investigation state changed", { investigation_id: investigationId, from: state, to: next })
			state = next
		}

		validateRequest(request)
		const prompt = request.prompt.trim()
		const { provider } = request
		const signal = this.deadline(options)
		const credentials = request.credentials ?? this.credentialProvider(provider)

		this.logger.info("Starting investigation", {
			investigation_id: investigationId,
			provider,
			prompt,
			credential_keys: describeCredentials(credentials),
		})

		// --- Planning ---
		transition("plan_requested")
		let plan: PlannedStep[]
		try {
			if (signal?.aborted) throw cancellationError(signal, "Investigation")
			plan = await this.requestPlan({ ...request, prompt }, credentials, signal)
			if (signal?.aborted) throw cancellationError(signal, "Investigation")
		} catch (error) {
			transition("failed")
			if (error instanceof CancellationError) {
				this.logger.warn("Investigation stopped before any step", {
					investigation_id: investigationId,
					reason: error.reason,
				})
				return {
					investigation_id: investigationId,
					success: false,
					steps: [],
					summary: summarizeWithoutSteps(prompt, provider, error.reason === "timeout" ? "timed out" : "cancelled"),
					insights: [],
					query_count: 0,
					duration_ms: Date.now() - startTime,
					confidence: DEFAULTS.emptyConfidence,
				}
			}
			this.logger.error("Plan generation failed", { investigation_id: investigationId, error })
			if (error instanceof PlannerError) throw error
			throw new PlannerError(
				`Plan generation failed: ${error instanceof Error ? error.message : String(error)}`,
				false,
				{ investigation_id: investigationId },
			)
		}

		if (plan.length > this.maxSteps) {
			this.logger.warn("Plan truncated", {
				investigation_id: investigationId,
				planned_steps: plan.length,
				max_steps: this.maxSteps,
			})
			plan = plan.slice(0, this.maxSteps)
		}

		// --- Steps ---
		transition("step_loop")
		const steps: InvestigationStep[] = []
		for (const [index, planned] of plan.entries()) {
			const step = await this.runStep(index + 1, planned, provider, credentials, signal)
			steps.push(step)
			this.logger.info("Investigation step finished", {
				investigation_id: investigationId,
				step: step.step_number,
				success: step.success,
				error_kind: step.error_kind,
			})
			if (signal?.aborted) {
				this.logger.warn("Investigation stopped early", {
					investigation_id: investigationId,
					completed_steps: steps.length,
					planned_steps: plan.length,
				})
				break
			}
		}

		// --- Aggregation ---
		transition("aggregating")
		const attempted = steps.length
		const succeeded = steps.filter((s) => s.success).length
		const confidence = attempted === 0
			? DEFAULTS.emptyConfidence
			: Math.min(1, Math.max(0, succeeded / attempted))
		const insights = steps.flatMap((s) => [...s.insights])
		const summary = attempted === 0
			? summarizeWithoutSteps(prompt, provider, "the planner returned no steps")
			: summarizeInvestigation(prompt, provider, steps, insights)

		const result: InvestigationResult = {
			investigation_id: investigationId,
			success: succeeded > 0,
			steps,
			summary,
			insights,
			query_count: attempted,
			duration_ms: Date.now() - startTime,
			confidence,
		}

		transition("completed")
		this.logger.info("Investigation completed", {
			investigation_id: investigationId,
			success: result.success,
			query_count: result.query_count,
			confidence: result.confidence,
			duration_ms: result.duration_ms,
			final_state: state,
		})
		return result
	}

	private deadline(options: InvestigateOptions): AbortSignal | undefined {
		const timeoutMs = options.timeoutMs ?? this.investigationTimeoutMs
		const signals: AbortSignal[] = []
		if (options.signal) signals.push(options.signal)
		if (timeoutMs > 0) signals.push(AbortSignal.timeout(timeoutMs))
		if (signals.length === 0) return undefined
		return signals.length === 1 ? signals[0] : AbortSignal.any(signals)
	}

	private async requestPlan(
		request: InvestigationRequest,
		credentials: Credentials,
		signal?: AbortSignal,
	): Promise<PlannedStep[]> {
		const candidateTables = resolveTables(request.prompt, request.provider)

		let schemaContext: string | undefined
		if (this.schemaLearner) {
			if (!this.schemaLearner.hasSchemas(request.provider)) {
				await this.schemaLearner.learnSchema(request.provider, credentials, signal)
			}
			schemaContext = this.schemaLearner.generateSchemaPrompt(request.provider, candidateTables)
		}

		const enhanced = enhancePrompt(request, this.memory, {
			maxLessons: this.maxLessons,
			candidateTables,
			schemaContext,
		})
		this.logger.debug("Requesting plan", { provider: request.provider, candidate_tables: candidateTables })

		return abortable(
			this.planner.generatePlan(enhanced, request.provider, candidateTables, signal),
			signal,
			"Planning",
		)
	}

	private async runStep(
		stepNumber: number,
		planned: PlannedStep,
		provider: CloudProvider,
		credentials: Credentials,
		signal?: AbortSignal,
	): Promise<InvestigationStep> {
		const startTime = Date.now()
		const failed = (error: string, error_kind: InvestigationStep["error_kind"]): InvestigationStep =>
			Object.freeze({
				step_number: stepNumber,
				description: planned.description,
				query: planned.query,
				results: [],
				success: false,
				error,
				error_kind,
				execution_time_ms: Date.now() - startTime,
				insights: [],
			})

		if (signal?.aborted) {
			const error = cancellationError(signal, "Step")
			return failed(error.message, error.reason)
		}

		let response: CloudQueryResponse
		try {
			response = await this.queryTool.execute(
				{ provider, query: planned.query, credentials, intent: planned.description },
				signal,
			)
		} catch (error) {
			if (error instanceof CancellationError) return failed(error.message, error.reason)
			// A planned query the rewriter rejects (empty, no statement)
			if (error instanceof ValidationError) return failed(error.message, classifyQueryError(error.message))
			throw error
		}

		return this.toStep(stepNumber, planned, provider, response)
	}

	private toStep(
		stepNumber: number,
		planned: PlannedStep,
		provider: CloudProvider,
		response: CloudQueryResponse,
	): InvestigationStep {
		const insights = [...response.insights]
		if (response.success && isTextPayload(response.results)) {
			insights.push(...extractInsightsFromText(String(response.results[0].result), provider))
		}

		return Object.freeze({
			step_number: stepNumber,
			description: planned.description,
			query: response.query,
			results: response.results,
			success: response.success,
			...(response.error !== undefined ? { error: response.error } : {}),
			...(response.error_type !== undefined ? { error_kind: response.error_type } : {}),
			execution_time_ms: response.execution_time_ms,
			insights,
		})
	}
}
