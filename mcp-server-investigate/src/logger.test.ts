import { describe, it, expect } from "vitest"
import { createLogger, formatLogLine, parseLogLevel } from "./logger.js"

describe("parseLogLevel", () => {
	it("should accept upper- and mixed-case names", () => {
		expect(parseLogLevel("DEBUG")).toBe("debug")
		expect(parseLogLevel("Warn")).toBe("warn")
		expect(parseLogLevel("warning")).toBe("warn")
		expect(parseLogLevel("error")).toBe("error")
	})

	it("should default to info", () => {
		expect(parseLogLevel(undefined)).toBe("info")
		expect(parseLogLevel("verbose")).toBe("info")
	})
})

describe("formatLogLine", () => {
	it("should prefix the level label", () => {
		expect(formatLogLine("info", "Investigation started")).toBe("[INFO] Investigation started")
	})

	it("should append data as JSON", () => {
		expect(formatLogLine("warn", "Step failed", { step: 2, error_type: "schema" }))
			.toBe('[WARN] Step failed {"step":2,"error_type":"schema"}')
	})

	it("should omit empty data", () => {
		expect(formatLogLine("error", "Boom", {})).toBe("[ERROR] Boom")
	})

	it("should render errors by name and message", () => {
		expect(formatLogLine("error", "Planner failed", { error: new TypeError("fetch failed") }))
			.toBe('[ERROR] Planner failed {"error":{"name":"TypeError","message":"fetch failed"}}')
	})
})

describe("createLogger", () => {
	it("should drop messages below the threshold", () => {
		const lines: string[] = []
		const logger = createLogger("warn", (line) => lines.push(line))

		logger.debug("hidden")
		logger.info("hidden too")
		logger.warn("shown")
		logger.error("also shown", { code: 1 })

		expect(lines).toEqual(["[WARN] shown", '[ERROR] also shown {"code":1}'])
	})

	it("should emit everything at debug", () => {
		const lines: string[] = []
		const logger = createLogger("debug", (line) => lines.push(line))
		logger.debug("a")
		logger.info("b")
		expect(lines).toEqual(["[DEBUG] a", "[INFO] b"])
	})
})
