/**
 * Planner HTTP Client
 *
 * Talks to the LLM-backed planner service that turns an enhanced prompt into
 * an ordered list of { description, query } steps.
 *
 * Responsibilities:
 * - POST the enhanced prompt to /generate_plan
 * - Per-request timeout, combined with the caller's cancellation signal
 * - Health check and a fail-fast flag after connection errors
 */

import { z } from "zod"
import type { CloudProvider, PlannedStep } from "./agent_types.js"
import { CancellationError, PLANNER_ENDPOINTS, PlannerError } from "./config.js"
import { cancellationError } from "./query_executor.js"

export interface Planner {
	generatePlan(
		enhancedPrompt: string,
		provider: CloudProvider,
		candidateTables: string[],
		signal?: AbortSignal,
	): Promise<PlannedStep[]>
}

const planResponseSchema = z.object({
	steps: z.array(z.object({
		description: z.string(),
		query: z.string(),
	})),
})

export class PlannerClient implements Planner {
	private baseUrl: string
	private timeout: number
	private isHealthy: boolean = true

	constructor(baseUrl: string, timeout: number) {
		this.baseUrl = baseUrl.replace(/\/+$/, "")
		this.timeout = timeout
	}

	async generatePlan(
		enhancedPrompt: string,
		provider: CloudProvider,
		candidateTables: string[],
		signal?: AbortSignal,
	): Promise<PlannedStep[]> {
		if (signal?.aborted) throw cancellationError(signal, "Planning")

		// Fail fast until a health check succeeds again
		if (!this.isHealthy) {
			throw new PlannerError(
				"Planner service is unavailable. Please try again later.",
				true,
				{ baseUrl: this.baseUrl },
			)
		}

		const url = `${this.baseUrl}${PLANNER_ENDPOINTS.generatePlan}`
		const timeoutSignal = AbortSignal.timeout(this.timeout)
		const requestSignal = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal

		try {
			const response = await fetch(url, {
				method: "POST",
				headers: {
					"Content-Type": "application/json",
					"Accept": "application/json",
				},
				body: JSON.stringify({
					prompt: enhancedPrompt,
					provider,
					candidate_tables: candidateTables,
				}),
				signal: requestSignal,
			})

			if (!response.ok) {
				const errorText = await response.text()
				throw new PlannerError(
					`Planner returned error: ${response.status} ${errorText}`,
					response.status >= 500, // 5xx errors are recoverable
					{ statusCode: response.status, responseBody: errorText },
				)
			}

			const body: unknown = await response.json()
			const parsed = planResponseSchema.safeParse(body)
			if (!parsed.success) {
				throw new PlannerError(
					`Planner returned a malformed plan: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
					false,
					{ url },
				)
			}

			return parsed.data.steps
		} catch (error) {
			// Caller cancellation wins over everything else
			if (signal?.aborted) {
				throw cancellationError(signal, "Planning")
			}

			if (timeoutSignal.aborted) {
				throw new PlannerError(
					`Planner request timed out after ${this.timeout}ms`,
					true,
					{ timeout: this.timeout, url },
				)
			}

			if (error instanceof PlannerError || error instanceof CancellationError) {
				throw error
			}

			// fetch rejects with TypeError on connection failures
			if (error instanceof TypeError) {
				this.isHealthy = false
				throw new PlannerError(
					`Cannot connect to planner at ${this.baseUrl}. Is it running?`,
					true,
					{ baseUrl: this.baseUrl, originalError: error.message },
				)
			}

			// Invalid JSON bodies land here as SyntaxError
			throw new PlannerError(
				`Unexpected error communicating with planner: ${error instanceof Error ? error.message : String(error)}`,
				false,
				{ originalError: String(error) },
			)
		}
	}

	/**
	 * Check planner health; a success clears the fail-fast flag
	 */
	async healthCheck(): Promise<boolean> {
		try {
			const response = await fetch(`${this.baseUrl}${PLANNER_ENDPOINTS.health}`, {
				method: "GET",
				signal: AbortSignal.timeout(5000),
			})
			this.isHealthy = response.ok
		} catch {
			this.isHealthy = false
		}
		return this.isHealthy
	}
}
