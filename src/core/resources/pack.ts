import type { Dirent } from "node:fs"
import { readdir, readFile, stat } from "node:fs/promises"
import path from "node:path"
import JSZip from "jszip"
import { ioFailure, isNotFound, pathExists, removeFile, writeFileBytes } from "@/core/io/fs"
import type { IndexError, Result } from "@/core/types/error"

export type BundleOutcome =
	| { status: "built"; size: number; packageCount: number; fileCount: number }
	| { status: "removed_stale"; reason: "no_assets_dir" | "no_package_dirs" }
	| { status: "nothing_to_build"; reason: "no_assets_dir" | "no_package_dirs" }

async function listEntries(dir: string): Promise<Result<Dirent[] | null, IndexError>> {
	try {
		return { ok: true, value: await readdir(dir, { withFileTypes: true }) }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}
		return ioFailure(error, dir, "readdir")
	}
}

/** Files below `dir`, as sorted POSIX paths relative to it. */
async function collectFiles(dir: string, prefix = ""): Promise<string[]> {
	const entries = await readdir(dir, { withFileTypes: true })
	const files: string[] = []

	for (const entry of entries) {
		const relative = prefix ? `${prefix}/${entry.name}` : entry.name
		if (entry.isDirectory()) {
			files.push(...(await collectFiles(path.join(dir, entry.name), relative)))
		} else if (entry.isFile()) {
			files.push(relative)
		}
	}

	return files.sort()
}

async function clearStaleBundle(
	outPath: string,
	reason: "no_assets_dir" | "no_package_dirs",
): Promise<Result<BundleOutcome, IndexError>> {
	if (!(await pathExists(outPath))) {
		return { ok: true, value: { reason, status: "nothing_to_build" } }
	}

	const removed = await removeFile(outPath)
	if (!removed.ok) {
		return removed
	}
	return { ok: true, value: { reason, status: "removed_stale" } }
}

/**
 * Pack every `assets/<identifier>/**` file into one zip, namespaced by the
 * package folder name. Without any package folders a previously built
 * bundle is deleted.
 */
export async function buildResourceBundle(
	assetsDir: string,
	outPath: string,
): Promise<Result<BundleOutcome, IndexError>> {
	const entries = await listEntries(assetsDir)
	if (!entries.ok) {
		return entries
	}
	if (entries.value === null) {
		return clearStaleBundle(outPath, "no_assets_dir")
	}

	const packageDirs = entries.value
		.filter((entry) => entry.isDirectory())
		.map((entry) => entry.name)
		.sort((a, b) => {
			const left = a.toLowerCase()
			const right = b.toLowerCase()
			if (left === right) return 0
			return left < right ? -1 : 1
		})
	if (packageDirs.length === 0) {
		return clearStaleBundle(outPath, "no_package_dirs")
	}

	const zip = new JSZip()
	let fileCount = 0

	for (const packageDir of packageDirs) {
		const base = path.join(assetsDir, packageDir)
		let files: string[]
		try {
			files = await collectFiles(base)
		} catch (error) {
			return ioFailure(error, base, "readdir")
		}

		for (const relative of files) {
			const fullPath = path.join(base, relative)
			try {
				const stats = await stat(fullPath)
				const contents = await readFile(fullPath)
				zip.file(`${packageDir}/${relative}`, contents, { date: stats.mtime })
				fileCount += 1
			} catch (error) {
				return ioFailure(error, fullPath, "readFile")
			}
		}
	}

	const archive = await zip.generateAsync({
		compression: "DEFLATE",
		type: "nodebuffer",
	})
	const written = await writeFileBytes(outPath, archive)
	if (!written.ok) {
		return written
	}

	return {
		ok: true,
		value: {
			fileCount,
			packageCount: packageDirs.length,
			size: archive.length,
			status: "built",
		},
	}
}
