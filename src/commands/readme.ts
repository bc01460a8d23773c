import { consola } from "consola"
import { isNotFound, readFileUtf8, writeFileBytes } from "@/core/io/fs"
import {
	ensureMarkers,
	readPackageList,
	renderReadmeBlock,
	replaceBlock,
} from "@/core/readme/render"
import type { IndexError, Result } from "@/core/types/error"
import { resolveProjectPaths } from "@/paths"
import { toRawError } from "@/utils/errors"

export interface ReadmeUpdate {
	changed: boolean
	packageCount: number
}

/**
 * Regenerate the package table between the README markers. The file is
 * only written when its content would change.
 */
export async function readmeCommand(
	options: { root?: string; now?: Date } = {},
): Promise<Result<ReadmeUpdate, IndexError>> {
	const paths = resolveProjectPaths(options.root)

	const index = await readFileUtf8(paths.packages)
	if (!index.ok) {
		return index
	}

	let document: unknown
	try {
		document = JSON.parse(index.value)
	} catch (error) {
		return {
			error: {
				message: "packages.json is not valid JSON.",
				path: paths.packages,
				rawError: toRawError(error),
				source: "packages.json",
				type: "parse",
			},
			ok: false,
		}
	}

	const packages = readPackageList(document)
	const block = renderReadmeBlock(packages, options.now ?? new Date())

	const existing = await readFileUtf8(paths.readme)
	if (!existing.ok && !isNotFound(existing.error.rawError)) {
		return existing
	}
	const current = existing.ok ? existing.value : null

	const content = ensureMarkers(current)
	const updated = replaceBlock(content, block)
	if (updated === content) {
		consola.info("README.md is already up to date.")
		return { ok: true, value: { changed: false, packageCount: packages.length } }
	}

	const written = await writeFileBytes(paths.readme, updated)
	if (!written.ok) {
		return written
	}

	consola.success("README.md updated.")
	return { ok: true, value: { changed: true, packageCount: packages.length } }
}
