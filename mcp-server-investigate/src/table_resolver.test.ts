import { describe, it, expect } from "vitest"
import { resolveTables, getCommonTables, getTableDescription } from "./table_resolver.js"

describe("resolveTables", () => {
	it("should include the EC2 and account tables for an EC2 prompt", () => {
		const tables = resolveTables("Find all running EC2 instances", "aws")
		expect(tables).toContain("aws_ec2_instance")
		expect(tables).toContain("aws_account")
	})

	it("should return only the root table when nothing matches", () => {
		expect(resolveTables("How is everything?", "aws")).toEqual(["aws_account"])
		expect(resolveTables("hello", "azure")).toEqual(["azure_subscription"])
		expect(resolveTables("hello", "gcp")).toEqual(["gcp_project"])
	})

	it("should union every matching rule, root last", () => {
		expect(resolveTables("Which S3 buckets and Lambda functions are public?", "aws"))
			.toEqual(["aws_s3_bucket", "aws_lambda_function", "aws_account"])
	})

	it("should match multi-word keywords", () => {
		expect(resolveTables("List every security group open to the world", "aws"))
			.toEqual(["aws_vpc_security_group", "aws_account"])
	})

	it("should select both IAM tables for an iam prompt", () => {
		expect(resolveTables("Audit IAM", "aws")).toEqual(["aws_iam_user", "aws_iam_role", "aws_account"])
	})

	it("should be case-insensitive", () => {
		expect(resolveTables("LAMBDA", "aws")).toEqual(["aws_lambda_function", "aws_account"])
	})

	it("should be deterministic", () => {
		const prompt = "users with old access keys on servers"
		expect(resolveTables(prompt, "aws")).toEqual(resolveTables(prompt, "aws"))
		expect(resolveTables(prompt, "aws"))
			.toEqual(["aws_ec2_instance", "aws_iam_user", "aws_iam_access_key", "aws_account"])
	})

	it("should not list a table twice", () => {
		const tables = resolveTables("gcs storage bucket", "gcp")
		expect(tables).toEqual(["gcp_storage_bucket", "gcp_project"])
	})

	it("should resolve Azure tables", () => {
		expect(resolveTables("virtual machine disks and blob storage", "azure"))
			.toEqual(["azure_compute_virtual_machine", "azure_storage_account", "azure_subscription"])
	})
})

describe("table catalogue", () => {
	it("should list the root table first", () => {
		expect(getCommonTables("gcp")[0]).toBe("gcp_project")
		expect(getCommonTables("azure")[0]).toBe("azure_subscription")
	})

	it("should describe known and unknown tables", () => {
		expect(getTableDescription("aws", "aws_s3_bucket")).toBe("S3 storage buckets")
		expect(getTableDescription("aws", "aws_account")).toBe("AWS account details and aliases")
		expect(getTableDescription("aws", "aws_kms_key")).toBe("aws_kms_key table for aws provider")
	})
})
