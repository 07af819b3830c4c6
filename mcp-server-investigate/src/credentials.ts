/**
 * Credential Provider
 *
 * Collects provider credentials from environment variables. Unset variables
 * are left out; AWS falls back to us-east-1 when no region is set.
 *
 * SteampipeExecutor reads only STEAMPIPE_CONNECTION from the result. Steampipe
 * plugins authenticate from the Steampipe service's own environment and
 * connection config, so the provider keys are carried for other QueryExecutor
 * implementations and are only ever logged by name.
 */

import type { CloudProvider, Credentials } from "./agent_types.js"
import { CONNECTION_CREDENTIAL } from "./query_executor.js"

export type CredentialProvider = (provider: CloudProvider) => Credentials

const PROVIDER_ENV_KEYS: Record<CloudProvider, readonly string[]> = {
	aws: ["AWS_ACCESS_KEY_ID", "AWS_SECRET_ACCESS_KEY", "AWS_SESSION_TOKEN", "AWS_REGION", "AWS_PROFILE"],
	azure: ["AZURE_CLIENT_ID", "AZURE_CLIENT_SECRET", "AZURE_TENANT_ID", "AZURE_SUBSCRIPTION_ID"],
	gcp: ["GOOGLE_APPLICATION_CREDENTIALS", "GOOGLE_CLOUD_PROJECT", "GCLOUD_PROJECT"],
}

export const DEFAULT_AWS_REGION = "us-east-1"

export function getProviderCredentials(
	provider: CloudProvider,
	env: NodeJS.ProcessEnv = process.env,
): Credentials {
	const credentials: Credentials = {}

	for (const key of PROVIDER_ENV_KEYS[provider]) {
		const value = env[key]
		if (value) credentials[key] = value
	}

	if (provider === "aws" && !credentials.AWS_REGION) {
		credentials.AWS_REGION = DEFAULT_AWS_REGION
	}

	// e.g. STEAMPIPE_AWS_CONNECTION=aws_prod
	const connection = env[`STEAMPIPE_${provider.toUpperCase()}_CONNECTION`]
	if (connection) credentials[CONNECTION_CREDENTIAL] = connection

	return credentials
}

/** Keys only; values are never logged */
export function describeCredentials(credentials: Credentials): string[] {
	return Object.keys(credentials).sort()
}
