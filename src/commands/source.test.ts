import { readFile, writeFile } from "node:fs/promises"
import path from "node:path"
import { describe, expect, it } from "vitest"
import { parse } from "yaml"
import { sourceAddMirror, sourceAddRelease, sourceRemove } from "@/commands/source"
import { parseRepositoryConfig } from "@/core/config/load"
import { exists, withTempDir } from "../../tests/helpers/fs"

describe("source commands", () => {
	it("creates repos.yaml when adding the first source", async () => {
		await withTempDir(async (dir) => {
			const result = await sourceAddRelease("acme/Foo-Lib", "*.zip", "TRUE", { root: dir })

			expect(result.ok).toBe(true)
			const config: unknown = parse(await readFile(path.join(dir, "repos.yaml"), "utf8"))
			expect(config).toEqual({
				sources: [
					{
						asset_glob: "*.zip",
						id: "foo-lib",
						mode: "release_scan",
						only_latest: true,
						repo: "acme/Foo-Lib",
					},
				],
			})
		})
	})

	it("appends a mirror after existing entries", async () => {
		await withTempDir(async (dir) => {
			const configPath = path.join(dir, "repos.yaml")
			await writeFile(configPath, "# sources\nname: Acme\nsources:\n  - id: foo-lib\n")

			await sourceAddMirror("https://example.com/kicad/packages.json", { root: dir })

			const text = await readFile(configPath, "utf8")
			expect(text.startsWith("# sources\n")).toBe(true)
			expect(parse(text)).toEqual({
				name: "Acme",
				sources: [
					{ id: "foo-lib" },
					{
						id: "packages",
						mode: "mirror_packages_json",
						packages_url: "https://example.com/kicad/packages.json",
					},
				],
			})
		})
	})

	it("keeps YAML 1.1 booleans readable after an edit", async () => {
		await withTempDir(async (dir) => {
			const configPath = path.join(dir, "repos.yaml")
			await writeFile(
				configPath,
				"sources:\n  - id: foo-lib\n    mode: release_scan\n    repo: acme/foo-lib\n    only_latest: yes\n",
			)

			await sourceAddMirror("https://example.com/up.json", { root: dir })

			const text = await readFile(configPath, "utf8")
			expect(text).toContain("only_latest: yes\n")
			const loaded = parseRepositoryConfig(text, configPath)
			expect(loaded.ok && loaded.value.sources[0]).toEqual({
				assetGlob: "*.zip",
				id: "foo-lib",
				mode: "release_scan",
				onlyLatest: true,
				repo: "acme/foo-lib",
			})
		})
	})

	it("rejects an invalid repository slug without touching the file", async () => {
		await withTempDir(async (dir) => {
			const result = await sourceAddRelease("not a repo", "*.zip", "false", { root: dir })

			expect(!result.ok && result.error.type).toBe("validation")
			expect(await exists(path.join(dir, "repos.yaml"))).toBe(false)
		})
	})

	it("rejects a mirror URL that does not parse", async () => {
		await withTempDir(async (dir) => {
			const result = await sourceAddMirror("packages.json", { root: dir })
			expect(!result.ok && result.error.type).toBe("validation")
		})
	})

	it("removes sources by id", async () => {
		await withTempDir(async (dir) => {
			const configPath = path.join(dir, "repos.yaml")
			await writeFile(configPath, "sources:\n  - id: a\n  - id: b\n")

			const result = await sourceRemove("a", { root: dir })

			expect(result).toEqual({ ok: true, value: 1 })
			expect(parse(await readFile(configPath, "utf8"))).toEqual({ sources: [{ id: "b" }] })
		})
	})

	it("leaves the file alone when no id matches", async () => {
		await withTempDir(async (dir) => {
			const configPath = path.join(dir, "repos.yaml")
			await writeFile(configPath, "sources:\n  - id: a   # keep spacing\n")

			const result = await sourceRemove("missing", { root: dir })

			expect(result).toEqual({ ok: true, value: 0 })
			expect(await readFile(configPath, "utf8")).toBe("sources:\n  - id: a   # keep spacing\n")
		})
	})
})
