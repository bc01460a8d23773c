import { describe, expect, it } from "vitest"
import { z } from "zod"
import { formatErrorChain } from "@/commands/outcome"
import type { IndexError, NotFoundError } from "@/core/types/error"

describe("formatErrorChain", () => {
	it("prints details and the cause indented", () => {
		const cause: NotFoundError = {
			message: "GitHub repo acme/foo not found (404).",
			status: 404,
			target: "acme/foo",
			type: "not_found",
		}
		const error: IndexError = {
			cause,
			message: "Source foo could not be loaded.",
			sourceId: "foo",
			type: "source",
		}

		expect(formatErrorChain(error).split("\n")).toEqual([
			"[source] Source foo could not be loaded. (sourceId=foo)",
			"Caused by:",
			"  [not_found] GitHub repo acme/foo not found (404). (status=404, target=acme/foo)",
		])
	})

	it("lists zod issues by path", () => {
		const parsed = z.object({ repo: z.string() }).safeParse({ repo: 3 })
		if (parsed.success) throw new Error("expected a validation failure")

		const error: IndexError = {
			field: "sources[0]",
			message: "Source 0 (release_scan) is invalid.",
			source: "zod",
			type: "validation",
			zodError: parsed.error,
		}

		expect(formatErrorChain(error).split("\n")).toEqual([
			"[validation] Source 0 (release_scan) is invalid. (field=sources[0], source=zod)",
			"  Zod issues:",
			"  - repo: Expected string, received number",
		])
	})
})
