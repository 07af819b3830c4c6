/**
 * Query Executor
 *
 * Runs one statement against Steampipe's Postgres endpoint. Steampipe exposes
 * each plugin connection as a schema, so the provider (or an explicit
 * connection credential) selects the search_path.
 *
 * Failures come back as data ({ ok: false, error }); only cancellation throws.
 */

import pg from "pg"
import type { CloudProvider, Credentials, Row } from "./agent_types.js"
import { CancellationError, cancellationReason } from "./config.js"
import type { InvestigatorConfig } from "./config/loadConfig.js"
import type { Logger } from "./logger.js"

export type OutputFormat = "json" | "text"

export type ExecutorOutcome =
	| { ok: true; payload: unknown }
	| { ok: false; error: string }

/**
 * Runs one statement for a provider. `credentials` are whatever the credential
 * provider or caller supplied; each implementation reads the keys it needs.
 */
export interface QueryExecutor {
	execute(
		provider: CloudProvider,
		query: string,
		credentials: Credentials,
		outputFormat: OutputFormat,
		signal?: AbortSignal,
	): Promise<ExecutorOutcome>
}

/** Credential key naming the Steampipe connection (schema) to query */
export const CONNECTION_CREDENTIAL = "STEAMPIPE_CONNECTION"

// ============================================================================
// Payload parsing
// ============================================================================

function isRow(value: unknown): value is Row {
	return value !== null && typeof value === "object" && !Array.isArray(value)
}

/**
 * Normalize an executor payload into rows.
 *
 * - array: each object element is a row, anything else becomes { result }
 * - object: one row
 * - string: parsed as JSON when possible, otherwise one { result: text } row
 * - empty string, null, undefined: no rows
 */
export function parseQueryPayload(payload: unknown): Row[] {
	if (payload === null || payload === undefined) return []

	if (Array.isArray(payload)) {
		return payload.map((item: unknown) => (isRow(item) ? item : { result: item }))
	}

	if (isRow(payload)) return [payload]

	if (typeof payload === "string") {
		const text = payload.trim()
		if (text === "") return []
		let parsed: unknown
		try {
			parsed = JSON.parse(text)
		} catch {
			return [{ result: text }]
		}
		if (Array.isArray(parsed) || isRow(parsed)) return parseQueryPayload(parsed)
		return [{ result: text }]
	}

	return [{ result: payload }]
}

/** True when rows came from a plain-text payload */
export function isTextPayload(rows: readonly Row[]): boolean {
	return rows.length === 1 && Object.keys(rows[0]).length === 1 && typeof rows[0].result === "string"
}

// ============================================================================
// Cancellation
// ============================================================================

export function cancellationError(signal: AbortSignal, what: string): CancellationError {
	const reason = cancellationReason(signal)
	return new CancellationError(reason === "timeout" ? `${what} timed out` : `${what} was cancelled`, reason)
}

/**
 * Race a promise against a signal. The losing promise keeps a handler
 * attached so its eventual rejection is not reported as unhandled.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, what: string): Promise<T> {
	if (!signal) return promise
	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(cancellationError(signal, what))
		if (signal.aborted) {
			promise.catch(() => undefined)
			onAbort()
			return
		}
		signal.addEventListener("abort", onAbort, { once: true })
		promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort)
				resolve(value)
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort)
				reject(error)
			},
		)
	})
}

// ============================================================================
// Steampipe executor
// ============================================================================

/** The subset of pg.PoolClient the executor needs */
export interface SqlClient {
	query(text: string): Promise<{ rows: Row[] }>
	release(destroy?: boolean): void
}

/** The subset of pg.Pool the executor needs */
export interface SqlPool {
	connect(): Promise<SqlClient>
	end(): Promise<void>
}

export interface SteampipeExecutorOptions {
	pool: SqlPool
	statementTimeoutMs: number
	logger: Logger
}

const SCHEMA_NAME = /^[a-z_][a-z0-9_]*$/

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** Rows as tab-separated lines, header first */
export function formatRowsAsText(rows: readonly Row[]): string {
	if (rows.length === 0) return ""
	const columns = Object.keys(rows[0])
	const lines = [columns.join("\t")]
	for (const row of rows) {
		lines.push(columns.map((c) => {
			const value = row[c]
			if (value === null || value === undefined) return ""
			return typeof value === "object" ? JSON.stringify(value) : String(value)
		}).join("\t"))
	}
	return lines.join("\n")
}

export class SteampipeExecutor implements QueryExecutor {
	private pool: SqlPool
	private statementTimeoutMs: number
	private logger: Logger

	constructor(options: SteampipeExecutorOptions) {
		this.pool = options.pool
		this.statementTimeoutMs = options.statementTimeoutMs
		this.logger = options.logger
	}

	static fromConfig(config: InvestigatorConfig["steampipe"], logger: Logger): SteampipeExecutor {
		const pool = new pg.Pool({
			host: config.host,
			port: config.port,
			database: config.database,
			user: config.user,
			password: config.password,
			max: config.max_connections,
		})
		pool.on("error", (err) => {
			logger.error("Idle Steampipe connection failed", { error: err })
		})
		return new SteampipeExecutor({ pool, statementTimeoutMs: config.statement_timeout_ms, logger })
	}

	async execute(
		provider: CloudProvider,
		query: string,
		credentials: Credentials,
		outputFormat: OutputFormat,
		signal?: AbortSignal,
	): Promise<ExecutorOutcome> {
		if (signal?.aborted) throw cancellationError(signal, "Query")

		const schema = credentials[CONNECTION_CREDENTIAL] ?? provider
		if (!SCHEMA_NAME.test(schema)) {
			return { ok: false, error: `invalid Steampipe connection name: ${schema}` }
		}

		let client: SqlClient | null = null
		let destroy = false
		const start = Date.now()

		try {
			client = await this.pool.connect()
			if (signal?.aborted) throw cancellationError(signal, "Query")
			await client.query(`SET search_path TO ${schema}, public`)
			await client.query(`SET statement_timeout = ${this.statementTimeoutMs}`)

			const result = await abortable(client.query(query), signal, "Query")

			this.logger.debug("Steampipe query executed", {
				provider,
				rows_returned: result.rows.length,
				execution_time_ms: Date.now() - start,
			})

			return {
				ok: true,
				payload: outputFormat === "json" ? result.rows : formatRowsAsText(result.rows),
			}
		} catch (error) {
			if (error instanceof CancellationError) {
				// The statement may still be running on this connection
				destroy = true
				throw error
			}
			this.logger.debug("Steampipe query failed", { provider, error: errorMessage(error) })
			return { ok: false, error: errorMessage(error) }
		} finally {
			if (client) {
				client.release(destroy)
			}
		}
	}

	async close(): Promise<void> {
		await this.pool.end()
	}
}
