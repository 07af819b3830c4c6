/**
 * Insight Extractor
 *
 * Two pure entry points:
 * - extractResultInsights: over the rows of one executed query
 * - extractInsightsFromText: over narrative text (plain-text payloads, reports)
 *
 * Every rule is independent; all matching rules fire, in table order.
 */

import type { CloudProvider, Insight, Row } from "./agent_types.js"

// ============================================================================
// Result Mode
// ============================================================================

export const NO_RESULTS_TITLE = "No results found - consider broadening the query scope"

interface QueryKeywordRule {
	provider: CloudProvider
	/** Lowercase keyword matched against the lowercased query */
	keyword: string
	insight: Omit<Insight, "confidence">
}

const QUERY_KEYWORD_RULES: QueryKeywordRule[] = [
	{
		provider: "aws",
		keyword: "ec2",
		insight: {
			type: "security",
			severity: "low",
			title: "Consider checking instance security groups and tags",
			description: "Instances were returned; their network exposure and ownership tags were not part of this query.",
			impact: "Untagged or broadly exposed instances are hard to attribute and easy to attack.",
			recommendation: "Query aws_vpc_security_group for the attached groups and review the tags column.",
		},
	},
	{
		provider: "aws",
		keyword: "s3",
		insight: {
			type: "security",
			severity: "low",
			title: "Consider checking bucket encryption and public access settings",
			description: "Buckets were returned; encryption and public access block settings were not part of this query.",
			impact: "Public or unencrypted buckets are a common source of data exposure.",
			recommendation: "Check server_side_encryption_configuration and the block_public_* columns of aws_s3_bucket.",
		},
	},
	{
		provider: "azure",
		keyword: "storage_account",
		insight: {
			type: "security",
			severity: "low",
			title: "Consider checking storage account network rules and HTTPS enforcement",
			description: "Storage accounts were returned; their firewall and transport settings were not part of this query.",
			impact: "Storage accounts open to all networks or accepting plain HTTP can leak data.",
			recommendation: "Check network_rule_default_action and enable_https_traffic_only on azure_storage_account.",
		},
	},
	{
		provider: "gcp",
		keyword: "storage_bucket",
		insight: {
			type: "security",
			severity: "low",
			title: "Consider checking bucket IAM bindings and uniform access",
			description: "Buckets were returned; their IAM policy and access mode were not part of this query.",
			impact: "allUsers or allAuthenticatedUsers bindings make objects public.",
			recommendation: "Check iam_policy and iam_configuration_uniform_bucket_level_access_enabled on gcp_storage_bucket.",
		},
	},
]

export function extractResultInsights(rows: readonly Row[], provider: CloudProvider, query: string): Insight[] {
	if (rows.length === 0) {
		return [
			{
				type: "coverage",
				severity: "info",
				title: NO_RESULTS_TITLE,
				description: "The query ran successfully but matched no resources.",
				impact: "An empty result can hide resources in other regions, accounts or tables.",
				recommendation: "Relax filters, check the region and connection, or query a related table.",
				confidence: 1,
			},
		]
	}

	const count = rows.length
	const insights: Insight[] = [
		{
			type: "inventory",
			severity: "info",
			title: `Found ${count} ${count === 1 ? "result" : "results"}`,
			description: `The query returned ${count} ${count === 1 ? "row" : "rows"}.`,
			impact: "",
			recommendation: "",
			confidence: 1,
		},
	]

	const queryLower = query.toLowerCase()
	for (const rule of QUERY_KEYWORD_RULES) {
		if (rule.provider === provider && queryLower.includes(rule.keyword)) {
			insights.push({ ...rule.insight, confidence: 0.6 })
		}
	}

	return insights
}

// ============================================================================
// Text Mode
// ============================================================================

interface PhraseGroup {
	/** Lowercase phrases; any one matching fires the group */
	phrases: string[]
	insight: (provider: CloudProvider) => Insight
}

const NETWORK_CONTROLS: Record<CloudProvider, string> = {
	aws: "security group rules",
	azure: "network security group rules",
	gcp: "VPC firewall rules",
}

const PHRASE_GROUPS: PhraseGroup[] = [
	{
		phrases: ["0.0.0.0/0", "::/0", "public"],
		insight: (provider) => ({
			type: "security",
			severity: "high",
			title: "Public Access Detected",
			description: "Found resources with public access that may pose security risks",
			impact: "Resources reachable from the internet are exposed to scanning and brute force.",
			recommendation: `Review ${NETWORK_CONTROLS[provider]} and restrict public access to essential services only`,
			confidence: 0.8,
		}),
	},
	{
		phrases: ["unencrypted", "no encryption", "encryption disabled", "not encrypted"],
		insight: () => ({
			type: "security",
			severity: "high",
			title: "Encryption Issue",
			description: "Found resources without proper encryption",
			impact: "Data at rest or in transit can be read if storage or traffic is intercepted.",
			recommendation: "Enable encryption for sensitive data and storage",
			confidence: 0.8,
		}),
	},
	{
		phrases: ["stopped", "idle", "unused", "unattached", "cost"],
		insight: () => ({
			type: "cost",
			severity: "medium",
			title: "Cost Optimization Opportunity",
			description: "Found unused or idle resources that may be costing money",
			impact: "Stopped instances still bill for attached volumes and reserved addresses.",
			recommendation: "Consider terminating or rightsizing unused resources",
			confidence: 0.7,
		}),
	},
	{
		phrases: ["compliance", "non-compliant", "regulation"],
		insight: () => ({
			type: "compliance",
			severity: "high",
			title: "Compliance Issue",
			description: "Found potential compliance concerns",
			impact: "Non-compliant resources can fail audits.",
			recommendation: "Review compliance requirements and implement necessary controls",
			confidence: 0.6,
		}),
	},
]

/**
 * Scan narrative text for risk and cost phrases.
 * Phrases are provider-neutral; recommendations name the provider's controls.
 */
export function extractInsightsFromText(narrative: string, provider: CloudProvider): Insight[] {
	const text = narrative.toLowerCase()
	const insights: Insight[] = []
	for (const group of PHRASE_GROUPS) {
		if (group.phrases.some((p) => text.includes(p))) {
			insights.push(group.insight(provider))
		}
	}
	return insights
}
