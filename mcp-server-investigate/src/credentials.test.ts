import { describe, it, expect } from "vitest"
import { describeCredentials, getProviderCredentials } from "./credentials.js"

describe("getProviderCredentials", () => {
	it("should read AWS variables and skip empty ones", () => {
		const env = {
			AWS_ACCESS_KEY_ID: "test-key-id",
			AWS_SECRET_ACCESS_KEY: "test-secret",
			AWS_SESSION_TOKEN: "",
			AWS_REGION: "eu-west-1",
			AZURE_CLIENT_ID: "ignored",
		}
		expect(getProviderCredentials("aws", env)).toEqual({
			AWS_ACCESS_KEY_ID: "test-key-id",
			AWS_SECRET_ACCESS_KEY: "test-secret",
			AWS_REGION: "eu-west-1",
		})
	})

	it("should default the AWS region", () => {
		expect(getProviderCredentials("aws", { AWS_PROFILE: "dev" })).toEqual({
			AWS_PROFILE: "dev",
			AWS_REGION: "us-east-1",
		})
	})

	it("should read Azure and GCP variables without a region default", () => {
		expect(getProviderCredentials("azure", { AZURE_TENANT_ID: "tenant", AWS_REGION: "us-west-2" }))
			.toEqual({ AZURE_TENANT_ID: "tenant" })
		expect(getProviderCredentials("gcp", { GOOGLE_CLOUD_PROJECT: "demo-project" }))
			.toEqual({ GOOGLE_CLOUD_PROJECT: "demo-project" })
		expect(getProviderCredentials("gcp", {})).toEqual({})
	})

	it("should pick up a provider-specific Steampipe connection", () => {
		expect(getProviderCredentials("gcp", { STEAMPIPE_GCP_CONNECTION: "gcp_all" }))
			.toEqual({ STEAMPIPE_CONNECTION: "gcp_all" })
	})

	it("should describe credentials by key only", () => {
		expect(describeCredentials({ B: "test-secret", A: "test-secret" })).toEqual(["A", "B"])
	})
})
