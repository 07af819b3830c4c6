/**
 * Table Relevance Resolver
 *
 * Keyword rules map a natural-language prompt to candidate Steampipe tables.
 * The provider's root table is always included, so the result is never empty.
 */

import type { CloudProvider } from "./agent_types.js"

interface TableRule {
	/** Lowercase keywords; any one present in the prompt selects the table */
	keywords: string[]
	table: string
	description: string
}

interface ProviderTables {
	/** Account/subscription/project table, always included */
	root: { table: string; description: string }
	rules: TableRule[]
}

const PROVIDER_TABLES: Record<CloudProvider, ProviderTables> = {
	aws: {
		root: { table: "aws_account", description: "AWS account details and aliases" },
		rules: [
			{ keywords: ["ec2", "instance", "server", "compute"], table: "aws_ec2_instance", description: "EC2 virtual machine instances" },
			{ keywords: ["security group", "firewall", "0.0.0.0", "open port", "ingress"], table: "aws_vpc_security_group", description: "VPC security groups and rules" },
			{ keywords: ["bucket", "s3"], table: "aws_s3_bucket", description: "S3 storage buckets" },
			{ keywords: ["iam", "user", "permission", "policy"], table: "aws_iam_user", description: "IAM users and their configurations" },
			{ keywords: ["iam", "role"], table: "aws_iam_role", description: "IAM roles and their policies" },
			{ keywords: ["access key", "credential"], table: "aws_iam_access_key", description: "IAM user access keys" },
			{ keywords: ["lambda", "function", "serverless"], table: "aws_lambda_function", description: "Lambda serverless functions" },
			{ keywords: ["rds", "database", "mysql", "postgres"], table: "aws_rds_db_instance", description: "RDS database instances" },
			{ keywords: ["vpc", "network", "subnet"], table: "aws_vpc", description: "Virtual Private Clouds (VPCs)" },
			{ keywords: ["ebs", "volume", "disk"], table: "aws_ebs_volume", description: "EBS block storage volumes" },
		],
	},
	azure: {
		root: { table: "azure_subscription", description: "Azure subscription details" },
		rules: [
			{ keywords: ["vm", "virtual machine", "compute", "instance"], table: "azure_compute_virtual_machine", description: "Azure virtual machines" },
			{ keywords: ["storage", "blob"], table: "azure_storage_account", description: "Azure storage accounts" },
			{ keywords: ["network security group", "nsg", "firewall"], table: "azure_network_security_group", description: "Network security groups and rules" },
			{ keywords: ["sql", "database"], table: "azure_sql_server", description: "Azure SQL servers" },
			{ keywords: ["key vault", "keyvault", "secret"], table: "azure_key_vault", description: "Key vaults" },
		],
	},
	gcp: {
		root: { table: "gcp_project", description: "GCP project details" },
		rules: [
			{ keywords: ["instance", "compute", "gce", "vm"], table: "gcp_compute_instance", description: "Compute Engine instances" },
			{ keywords: ["storage", "bucket", "gcs"], table: "gcp_storage_bucket", description: "Cloud Storage buckets" },
			{ keywords: ["firewall", "ingress"], table: "gcp_compute_firewall", description: "VPC firewall rules" },
			{ keywords: ["sql", "database"], table: "gcp_sql_database_instance", description: "Cloud SQL instances" },
			{ keywords: ["iam", "service account"], table: "gcp_service_account", description: "IAM service accounts" },
		],
	},
}

/**
 * Candidate tables for a prompt, in rule order, root table last.
 */
export function resolveTables(prompt: string, provider: CloudProvider): string[] {
	const { root, rules } = PROVIDER_TABLES[provider]
	const promptLower = prompt.toLowerCase()
	const tables: string[] = []

	for (const rule of rules) {
		if (tables.includes(rule.table)) continue
		if (rule.keywords.some((kw) => promptLower.includes(kw))) {
			tables.push(rule.table)
		}
	}

	tables.push(root.table)
	return tables
}

/** Every table the resolver knows for a provider, root first */
export function getCommonTables(provider: CloudProvider): string[] {
	const { root, rules } = PROVIDER_TABLES[provider]
	return [root.table, ...rules.map((r) => r.table)]
}

export function getTableDescription(provider: CloudProvider, table: string): string {
	const { root, rules } = PROVIDER_TABLES[provider]
	if (root.table === table) return root.description
	return rules.find((r) => r.table === table)?.description ?? `${table} table for ${provider} provider`
}
