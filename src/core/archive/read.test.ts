import { readFile } from "node:fs/promises"
import { describe, expect, it } from "vitest"
import {
	detectArchiveFormat,
	readManifestFromArchive,
	selectManifestName,
} from "@/core/archive/read"
import { buildTar, buildZip } from "../../../tests/helpers/archive"

const MANIFEST = '{"identifier": "com.example.foo", "version": "1.0.0"}'

// Both hold foo/manifest.json (MANIFEST) and foo/symbols/foo.kicad_sym.
async function fixture(name: string): Promise<Buffer> {
	return readFile(new URL(`../../../tests/fixtures/${name}`, import.meta.url))
}

describe("selectManifestName", () => {
	it("prefers manifest.json over metadata.json at the root", () => {
		expect(selectManifestName(["metadata.json", "manifest.json"])).toBe("manifest.json")
		expect(selectManifestName(["metadata.json", "footprints/a.kicad_mod"])).toBe(
			"metadata.json",
		)
	})

	it("looks inside a single top-level folder", () => {
		expect(selectManifestName(["README.txt", "pkg/manifest.json", "pkg/lib/a.kicad_sym"])).toBe(
			"pkg/manifest.json",
		)
		expect(selectManifestName(["pkg/metadata.json"])).toBe("pkg/metadata.json")
	})

	it("finds nothing when several folders are present", () => {
		expect(selectManifestName(["a/manifest.json", "b/readme.txt"])).toBeNull()
	})

	it("does not search deeper than one folder", () => {
		expect(selectManifestName(["outer/inner/manifest.json"])).toBeNull()
	})
})

describe("detectArchiveFormat", () => {
	it("recognizes zip, gzip and plain tar by their leading bytes", async () => {
		expect(detectArchiveFormat(await buildZip({ "a.txt": "a" }))).toBe("zip")
		expect(detectArchiveFormat(await buildTar({ "a.txt": "a" }, { gzip: true }))).toBe("gzip")
		expect(detectArchiveFormat(await buildTar({ "a.txt": "a" }, { gzip: false }))).toBe("tar")
	})

	it("recognizes xz and bzip2 tarballs", async () => {
		expect(detectArchiveFormat(await fixture("wrapped-manifest.tar.xz"))).toBe("xz")
		expect(detectArchiveFormat(await fixture("wrapped-manifest.tar.bz2"))).toBe("bzip2")
	})

	it("returns unrecognized for anything else", () => {
		expect(detectArchiveFormat(Buffer.from("just some text"))).toBe("unrecognized")
		expect(detectArchiveFormat(new Uint8Array(0))).toBe("unrecognized")
	})
})

describe("readManifestFromArchive", () => {
	it("reads a root manifest from a zip", async () => {
		const blob = await buildZip({ "footprints/a.kicad_mod": "(module a)", "manifest.json": MANIFEST })

		const result = await readManifestFromArchive(blob)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.entryName).toBe("manifest.json")
			expect(result.value.manifest.identifier).toBe("com.example.foo")
			expect(result.value.manifest.version).toBe("1.0.0")
		}
	})

	it("reads metadata.json from a wrapped zip", async () => {
		const blob = await buildZip({
			"foo-1.0/footprints/a.kicad_mod": "(module a)",
			"foo-1.0/metadata.json": '{"name": "Foo",}',
		})

		const result = await readManifestFromArchive(blob)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.entryName).toBe("foo-1.0/metadata.json")
			expect(result.value.manifest.name).toBe("Foo")
		}
	})

	it("reads a wrapped manifest from a tar.gz", async () => {
		const blob = await buildTar(
			{
				"foo/manifest.json": MANIFEST,
				"foo/symbols/foo.kicad_sym": "(kicad_symbol_lib)",
			},
			{ gzip: true },
		)

		const result = await readManifestFromArchive(blob)

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.entryName).toBe("foo/manifest.json")
			expect(result.value.manifest.identifier).toBe("com.example.foo")
		}
	})

	it("reads a wrapped manifest from a tar.xz", async () => {
		const result = await readManifestFromArchive(await fixture("wrapped-manifest.tar.xz"))

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.entryName).toBe("foo/manifest.json")
			expect(result.value.manifest.identifier).toBe("com.example.foo")
		}
	})

	it("reads a wrapped manifest from a tar.bz2", async () => {
		const result = await readManifestFromArchive(await fixture("wrapped-manifest.tar.bz2"))

		expect(result.ok).toBe(true)
		if (result.ok) {
			expect(result.value.entryName).toBe("foo/manifest.json")
			expect(result.value.manifest.version).toBe("1.0.0")
		}
	})

	it("skips a truncated xz stream as unreadable", async () => {
		const blob = await fixture("wrapped-manifest.tar.xz")

		const result = await readManifestFromArchive(blob.subarray(0, 40))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.reason).toBe("unreadable_archive")
			expect(result.error.message.startsWith("unreadable xz archive: ")).toBe(true)
		}
	})

	it("reads an uncompressed tar", async () => {
		const blob = await buildTar({ "manifest.json": MANIFEST }, { gzip: false })

		const result = await readManifestFromArchive(blob)
		expect(result.ok && result.value.entryName).toBe("manifest.json")
	})

	it("skips data that is not an archive", async () => {
		const result = await readManifestFromArchive(Buffer.from("not an archive"))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.reason).toBe("unrecognized_archive")
			expect(result.error.message).toBe("not a zip or tar archive")
		}
	})

	it("skips archives without a manifest", async () => {
		const result = await readManifestFromArchive(await buildZip({ "README.md": "# Foo" }))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.reason).toBe("manifest_missing")
			expect(result.error.message).toBe("no manifest.json or metadata.json found")
		}
	})

	it("skips manifests that cannot be parsed", async () => {
		const result = await readManifestFromArchive(await buildZip({ "manifest.json": "{broken" }))

		expect(result.ok).toBe(false)
		if (!result.ok) {
			expect(result.error.reason).toBe("manifest_parse")
			expect(result.error.entryName).toBe("manifest.json")
		}
	})

	it("skips manifests whose top level is not an object", async () => {
		const result = await readManifestFromArchive(await buildZip({ "manifest.json": "[1, 2]" }))
		expect(!result.ok && result.error.reason).toBe("manifest_not_object")
	})

	it("skips a truncated zip as unreadable", async () => {
		const blob = await buildZip({ "manifest.json": MANIFEST })

		const result = await readManifestFromArchive(blob.subarray(0, 12))
		expect(!result.ok && result.error.reason).toBe("unreadable_archive")
	})
})
