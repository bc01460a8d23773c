import { describe, expect, it } from "vitest"
import {
	buildPackageTable,
	EMPTY_TABLE_TEXT,
	ensureMarkers,
	formatReadmeTimestamp,
	licenseCell,
	maintainerCell,
	readPackageList,
	renderReadmeBlock,
	replaceBlock,
} from "@/core/readme/render"

const NOW = new Date("2024-05-06T07:08:09Z")

describe("readPackageList", () => {
	it("accepts an object with packages or a bare array", () => {
		expect(readPackageList({ packages: [{ name: "a" }] })).toEqual([{ name: "a" }])
		expect(readPackageList([{ name: "b" }])).toEqual([{ name: "b" }])
		expect(readPackageList({ packages: "nope" })).toEqual([])
	})
})

describe("maintainerCell", () => {
	it("links the maintainer to their first contact URL", () => {
		const pkg = {
			maintainer: { contact: { email: "ann@example.com", web: "https://ann.example" }, name: "Ann" },
		}
		expect(maintainerCell(pkg)).toBe("[Ann](https://ann.example)")
	})

	it("falls back to the author, then a dash", () => {
		expect(maintainerCell({ author: { name: "Jane" }, maintainer: { name: " " } })).toBe("Jane")
		expect(maintainerCell({})).toBe("-")
	})
})

describe("licenseCell", () => {
	it("reads the license in its common shapes", () => {
		expect(licenseCell({ license: "MIT" })).toBe("MIT")
		expect(licenseCell({ license: { spdx_id: "GPL-3.0-or-later" } })).toBe("GPL-3.0-or-later")
		expect(licenseCell({ licenses: ["MIT", { name: "CC-BY-4.0" }] })).toBe("MIT, CC-BY-4.0")
		expect(licenseCell({ license: "", versions: [{ license: "Apache-2.0" }] })).toBe(
			"Apache-2.0",
		)
	})

	it("reports a missing license", () => {
		expect(licenseCell({ license: "" })).toBe("not specified")
	})
})

describe("buildPackageTable", () => {
	it("uses placeholder text when there are no packages", () => {
		expect(buildPackageTable([])).toBe(EMPTY_TABLE_TEXT)
	})

	it("sorts rows by name without regard to case", () => {
		const table = buildPackageTable([
			{ identifier: "com.example.zeta", license: "MIT", name: "zeta" },
			{
				license: "CC-BY-SA-4.0",
				name: "Alpha | Beta",
				resources: { homepage: "https://alpha.example" },
			},
		])

		expect(table.split("\n")).toEqual([
			"| 📦 Package | 👤 Maintainer | 🧾 License |",
			"|---|---|---|",
			"| [Alpha \\| Beta](https://alpha.example) | - | CC-BY-SA-4.0 |",
			"| zeta | - | MIT |",
		])
	})
})

describe("renderReadmeBlock", () => {
	it("wraps the table between the markers with a footer", () => {
		const lines = renderReadmeBlock([{ license: "MIT", name: "Foo" }], NOW).split("\n")

		expect(lines[0]).toBe("<!-- AUTO-INDEX:START -->")
		expect(lines[2]?.startsWith("> ⚖️ **Licensing Note:**")).toBe(true)
		expect(lines.slice(-2)).toEqual([
			"_Last updated: **2024-05-06 07:08 UTC** • Packages: **1**_",
			"<!-- AUTO-INDEX:END -->",
		])
	})

	it("formats the timestamp to the minute", () => {
		expect(formatReadmeTimestamp(NOW)).toBe("2024-05-06 07:08 UTC")
	})
})

describe("ensureMarkers", () => {
	it("starts from a default README when none exists", () => {
		const readme = ensureMarkers(null)

		expect(readme.startsWith("# KiCad PCM Repository\n")).toBe(true)
		expect(readme.endsWith("<!-- AUTO-INDEX:START -->\n<!-- AUTO-INDEX:END -->\n")).toBe(true)
	})

	it("appends a packages section when markers are missing", () => {
		expect(ensureMarkers("# Title\n\nIntro.\n\n")).toBe(
			"# Title\n\nIntro.\n\n## Packages\n\n<!-- AUTO-INDEX:START -->\n<!-- AUTO-INDEX:END -->\n",
		)
	})

	it("leaves a README with markers unchanged", () => {
		const readme = "# T\n<!-- AUTO-INDEX:START -->\nold\n<!-- AUTO-INDEX:END -->\n"
		expect(ensureMarkers(readme)).toBe(readme)
	})
})

describe("replaceBlock", () => {
	it("replaces only the text between the markers", () => {
		const readme = "# T\n\n<!-- AUTO-INDEX:START -->\nold\n<!-- AUTO-INDEX:END -->\n\nFooter $1\n"

		expect(replaceBlock(readme, "<!-- AUTO-INDEX:START -->\nnew $& text\n<!-- AUTO-INDEX:END -->")).toBe(
			"# T\n\n<!-- AUTO-INDEX:START -->\nnew $& text\n<!-- AUTO-INDEX:END -->\n\nFooter $1\n",
		)
	})
})
