/**
 * Cloud Query Tool
 *
 * One query, end to end:
 * 1. Rewrite (single statement, provider substitutions)
 * 2. Execute via the query executor
 * 3. Success: record in memory, learn the pattern, extract insights
 * 4. Failure: classify, generate a lesson, record in memory
 *
 * Executor failures always come back as a structured response. Only
 * validation errors and cancellation are thrown, and neither writes memory.
 */

import type { AgentMemory } from "./agent_memory.js"
import { isCloudProvider } from "./agent_types.js"
import { CancellationError, DEFAULTS, ValidationError } from "./config.js"
import type { CloudQueryRequest, CloudQueryResponse } from "./config.js"
import { classifyQueryError, generateLesson } from "./error_classifier.js"
import { extractResultInsights } from "./insight_extractor.js"
import type { Logger } from "./logger.js"
import { abortable, parseQueryPayload } from "./query_executor.js"
import type { ExecutorOutcome, OutputFormat, QueryExecutor } from "./query_executor.js"
import { rewriteQuery } from "./query_rewriter.js"

export interface CloudQueryToolOptions {
	executor: QueryExecutor
	memory: AgentMemory
	logger: Logger
}

const OUTPUT_FORMAT: OutputFormat = DEFAULTS.outputFormat

export class CloudQueryTool {
	private executor: QueryExecutor
	private memory: AgentMemory
	private logger: Logger

	constructor(options: CloudQueryToolOptions) {
		this.executor = options.executor
		this.memory = options.memory
		this.logger = options.logger
	}

	async execute(request: CloudQueryRequest, signal?: AbortSignal): Promise<CloudQueryResponse> {
		const { provider } = request
		if (!isCloudProvider(provider)) {
			throw new ValidationError(`unsupported provider: ${String(provider)}`, { provider })
		}

		const rewrite = rewriteQuery(request.query, provider)
		if (rewrite.truncated) {
			this.logger.warn("Multi-statement query truncated to its first statement", {
				provider,
				statements: rewrite.statementCount,
			})
		}
		if (rewrite.applied.length > 0) {
			this.logger.debug("Query rewritten", { provider, rules: rewrite.applied })
		}

		const query = rewrite.query
		const intent = request.intent?.trim() || request.query.trim()
		const start = Date.now()

		let outcome: ExecutorOutcome
		try {
			outcome = await abortable(
				this.executor.execute(provider, query, request.credentials ?? {}, OUTPUT_FORMAT, signal),
				signal,
				"Query",
			)
		} catch (error) {
			if (error instanceof CancellationError) throw error
			// A throwing executor is treated like one that reported the error
			outcome = { ok: false, error: error instanceof Error ? error.message : String(error) }
		}

		const execution_time_ms = Date.now() - start

		if (outcome.ok) {
			const results = parseQueryPayload(outcome.payload)
			const previous = this.memory.findPattern(intent, provider)

			this.memory.recordSuccess({
				original_intent: intent,
				generated_query: query,
				result_count: results.length,
				provider,
				timestamp: this.memory.timestamp(),
				...(previous ? { pattern_used: previous.id } : {}),
			})
			this.memory.learnPattern(intent, query, provider, true)

			this.logger.info("Cloud query succeeded", { provider, rows_returned: results.length, execution_time_ms })

			return {
				success: true,
				results,
				row_count: results.length,
				execution_time_ms,
				query,
				insights: extractResultInsights(results, provider, query),
			}
		}

		const error_type = classifyQueryError(outcome.error)
		const lesson = generateLesson(outcome.error)

		this.memory.recordFailure({
			original_intent: intent,
			generated_query: query,
			error_message: outcome.error,
			error_type,
			provider,
			timestamp: this.memory.timestamp(),
			lesson_learned: lesson,
		})
		this.memory.learnPattern(intent, query, provider, false)

		this.logger.warn("Cloud query failed", { provider, error_type, error: outcome.error })

		return {
			success: false,
			results: [],
			row_count: 0,
			execution_time_ms,
			query,
			error: outcome.error,
			error_type,
			lesson,
			insights: [],
		}
	}
}
