import { describe, expect, it } from "vitest"
import { globToRegExp, matchesGlob } from "@/core/parsing/glob"

describe("globToRegExp", () => {
	it("anchors the pattern and escapes dots", () => {
		expect(globToRegExp("*.zip").source).toBe("^.*\\.zip$")
	})

	it("matches asset names by suffix", () => {
		expect(matchesGlob("*.zip", "footprints-1.0.0.zip")).toBe(true)
		expect(matchesGlob("*.zip", "footprints-1.0.0.zip.sha256")).toBe(false)
	})

	it("is case-sensitive", () => {
		expect(matchesGlob("*.zip", "FOOTPRINTS.ZIP")).toBe(false)
	})

	it("treats ? as exactly one character", () => {
		expect(matchesGlob("pkg-?.zip", "pkg-1.zip")).toBe(true)
		expect(matchesGlob("pkg-?.zip", "pkg-10.zip")).toBe(false)
		expect(matchesGlob("pkg-?.zip", "pkg-.zip")).toBe(false)
	})

	it("treats a character outside the BMP as one character", () => {
		expect(matchesGlob("lib-?.zip", "lib-😀.zip")).toBe(true)
		expect(matchesGlob("lib-??.zip", "lib-😀.zip")).toBe(false)
		expect(matchesGlob("😀-*.zip", "😀-footprints.zip")).toBe(true)
	})

	it("matches regular-expression characters literally", () => {
		expect(matchesGlob("lib(v2)[beta]+.zip", "lib(v2)[beta]+.zip")).toBe(true)
		expect(matchesGlob("lib(v2)[beta]+.zip", "libv2b.zip")).toBe(false)
		expect(matchesGlob("a.b", "axb")).toBe(false)
	})

	it("lets * match an empty run", () => {
		expect(matchesGlob("*", "")).toBe(true)
		expect(matchesGlob("kicad-*.tar.gz", "kicad-.tar.gz")).toBe(true)
	})
})
