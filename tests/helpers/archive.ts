import { readFile } from "node:fs/promises"
import { join } from "node:path"
import JSZip from "jszip"
import { create } from "tar"
import { withTempDir, writeTree } from "./fs"

export async function buildZip(files: Record<string, string>): Promise<Buffer> {
	const zip = new JSZip()
	for (const [name, contents] of Object.entries(files)) {
		zip.file(name, contents)
	}
	return zip.generateAsync({ type: "nodebuffer" })
}

export async function buildTar(
	files: Record<string, string>,
	options: { gzip: boolean },
): Promise<Buffer> {
	return withTempDir(async (dir) => {
		const sourceDir = join(dir, "src")
		const outPath = join(dir, options.gzip ? "out.tar.gz" : "out.tar")
		await writeTree(sourceDir, files)
		await create(
			{ cwd: sourceDir, file: outPath, gzip: options.gzip, portable: true },
			Object.keys(files),
		)
		return readFile(outPath)
	})
}
