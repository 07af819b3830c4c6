/**
 * Schema Learner
 *
 * Discovers the columns of each provider's common tables through the query
 * executor (information_schema.columns), annotates well-known columns, and
 * renders a schema section for the planning prompt.
 *
 * The cache lives here, keyed "<provider>.<table>"; agent memory is not
 * touched.
 */

import type { CloudProvider, ColumnInfo, Credentials, Row, TableSchema } from "./agent_types.js"
import { CancellationError } from "./config.js"
import type { Logger } from "./logger.js"
import { parseQueryPayload } from "./query_executor.js"
import type { QueryExecutor } from "./query_executor.js"
import { getCommonTables, getTableDescription } from "./table_resolver.js"

// ============================================================================
// Well-known columns
// ============================================================================

interface ColumnAnnotation {
	description: string
	examples?: string[]
}

const COLUMN_ANNOTATIONS: Record<string, ColumnAnnotation> = {
	instance_id: { description: "EC2 instance identifier", examples: ["i-1234567890abcdef0"] },
	instance_state: {
		description: "Current state of the EC2 instance",
		examples: ["running", "stopped", "pending", "terminated"],
	},
	instance_type: { description: "EC2 instance type/size", examples: ["t3.micro", "m5.large", "c5.xlarge"] },
	vpc_id: { description: "VPC identifier where resource is located", examples: ["vpc-12345678"] },
	region: { description: "Region where resource is located", examples: ["us-east-1", "us-west-2", "eu-west-1"] },
	name: { description: "Resource name or identifier" },
	tags: { description: "Resource tags as JSON object", examples: ['{"Environment": "prod", "Team": "platform"}'] },
}

const TABLE_NAME = /^[a-z0-9_]+$/

function schemaKey(provider: CloudProvider, table: string): string {
	return `${provider}.${table}`
}

function schemaQuery(table: string): string {
	return [
		"SELECT column_name, data_type, is_nullable",
		"FROM information_schema.columns",
		`WHERE table_name = '${table}'`,
		"ORDER BY ordinal_position",
	].join("\n")
}

/** information_schema rows → columns; rows without a column name are skipped */
export function parseColumns(rows: readonly Row[]): ColumnInfo[] {
	const columns: ColumnInfo[] = []
	for (const row of rows) {
		const name = row.column_name
		const dataType = row.data_type
		if (typeof name !== "string") continue
		columns.push({
			name,
			type: typeof dataType === "string" ? dataType : "unknown",
			description: "",
			required: row.is_nullable === "NO",
		})
	}
	return columns
}

export function annotateColumn(column: ColumnInfo): ColumnInfo {
	const annotation = COLUMN_ANNOTATIONS[column.name]
	if (!annotation) return column
	return {
		...column,
		description: annotation.description,
		...(annotation.examples ? { examples: [...annotation.examples] } : {}),
	}
}

// ============================================================================
// SchemaLearner
// ============================================================================

export interface SchemaLearnerOptions {
	executor: QueryExecutor
	logger: Logger
	now?: () => Date
}

export class SchemaLearner {
	private executor: QueryExecutor
	private logger: Logger
	private now: () => Date
	private schemas = new Map<string, TableSchema>()

	constructor(options: SchemaLearnerOptions) {
		this.executor = options.executor
		this.logger = options.logger
		this.now = options.now ?? (() => new Date())
	}

	/**
	 * Discover every common table of a provider. Tables that fail are logged
	 * and skipped; cancellation propagates. Returns the number learned.
	 */
	async learnSchema(provider: CloudProvider, credentials: Credentials, signal?: AbortSignal): Promise<number> {
		this.logger.info("Learning schemas for provider", { provider })
		let learned = 0

		for (const table of getCommonTables(provider)) {
			try {
				const schema = await this.discoverTableSchema(provider, table, credentials, signal)
				this.schemas.set(schemaKey(provider, table), schema)
				learned++
				this.logger.debug("Learned schema for table", { table, columns: schema.columns.length })
			} catch (error) {
				if (error instanceof CancellationError) throw error
				this.logger.debug("Failed to discover schema for table", { table, error })
			}
		}

		this.logger.info("Schema learning completed", { provider, tables_learned: learned })
		return learned
	}

	async refreshSchema(
		provider: CloudProvider,
		table: string,
		credentials: Credentials,
		signal?: AbortSignal,
	): Promise<TableSchema> {
		const schema = await this.discoverTableSchema(provider, table, credentials, signal)
		this.schemas.set(schemaKey(provider, table), schema)
		this.logger.info("Refreshed schema for table", { table, provider })
		return schema
	}

	getSchema(provider: CloudProvider, table: string): TableSchema | undefined {
		return this.schemas.get(schemaKey(provider, table))
	}

	hasSchemas(provider: CloudProvider): boolean {
		return this.getProviderTables(provider).length > 0
	}

	getProviderTables(provider: CloudProvider): string[] {
		const prefix = `${provider}.`
		const tables: string[] = []
		for (const key of this.schemas.keys()) {
			if (key.startsWith(prefix)) tables.push(key.slice(prefix.length))
		}
		return tables
	}

	/**
	 * Schema section for the given tables. Tables not yet learned are skipped;
	 * returns "" when none are known.
	 */
	generateSchemaPrompt(provider: CloudProvider, tables: readonly string[]): string {
		const sections: string[] = []

		for (const table of tables) {
			const schema = this.getSchema(provider, table)
			if (!schema) continue

			const lines = [`Table: ${table}`, `Description: ${schema.description}`, "Columns:"]
			for (const col of schema.columns) {
				lines.push(`  - ${col.name} (${col.type}): ${col.description}`.trimEnd())
				if (col.examples && col.examples.length > 0) {
					lines.push(`    Examples: ${col.examples.join(", ")}`)
				}
			}
			sections.push(lines.join("\n"))
		}

		if (sections.length === 0) return ""
		return [`Available ${provider} tables and their schemas:`, ...sections].join("\n\n")
	}

	private async discoverTableSchema(
		provider: CloudProvider,
		table: string,
		credentials: Credentials,
		signal?: AbortSignal,
	): Promise<TableSchema> {
		if (!TABLE_NAME.test(table)) {
			throw new Error(`Invalid table name: ${table}`)
		}

		const outcome = await this.executor.execute(provider, schemaQuery(table), credentials, "json", signal)
		if (!outcome.ok) {
			throw new Error(`Failed to query schema of ${provider}.${table}: ${outcome.error}`)
		}

		const columns = parseColumns(parseQueryPayload(outcome.payload))
		if (columns.length === 0) {
			throw new Error(`Table ${table} not found for ${provider}`)
		}

		return {
			table_name: table,
			provider,
			description: getTableDescription(provider, table),
			columns: columns.map(annotateColumn),
			last_updated: this.now().toISOString(),
		}
	}
}
