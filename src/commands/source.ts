import { consola } from "consola"
import {
	addSource,
	buildMirrorSourceEntry,
	buildReleaseSourceEntry,
	loadConfigDocument,
	parseOnlyLatest,
	removeSource,
	type SourceEntry,
	saveConfigDocument,
} from "@/core/config/edit"
import type { IndexError, Result } from "@/core/types/error"
import { coerceGithubRepo, coerceNonEmpty } from "@/core/types/coerce"
import { CONFIG_FILENAME, resolveProjectPaths } from "@/paths"

interface EditOptions {
	root?: string
}

export async function sourceAddRelease(
	repo: string,
	assetGlob: string,
	onlyLatest: string,
	options: EditOptions = {},
): Promise<Result<SourceEntry, IndexError>> {
	const slug = coerceGithubRepo(repo)
	if (!slug) {
		return {
			error: {
				field: "repo",
				message: `Expected <owner/repo>, got "${repo}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const glob = coerceNonEmpty(assetGlob)
	if (!glob) {
		return {
			error: {
				field: "asset_glob",
				message: "Asset glob must not be empty.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return appendSource(buildReleaseSourceEntry(slug, glob, parseOnlyLatest(onlyLatest)), options)
}

export async function sourceAddMirror(
	url: string,
	options: EditOptions = {},
): Promise<Result<SourceEntry, IndexError>> {
	if (!URL.canParse(url)) {
		return {
			error: {
				field: "packages_url",
				message: `Expected a packages.json URL, got "${url}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return appendSource(buildMirrorSourceEntry(url), options)
}

async function appendSource(
	entry: SourceEntry,
	options: EditOptions,
): Promise<Result<SourceEntry, IndexError>> {
	const { config } = resolveProjectPaths(options.root)

	const document = await loadConfigDocument(config)
	if (!document.ok) {
		return document
	}

	const added = addSource(document.value, entry, config)
	if (!added.ok) {
		return added
	}
	if (added.value.duplicate) {
		consola.warn(`A source with id '${entry.id}' already exists; adding another.`)
	}

	const saved = await saveConfigDocument(config, document.value)
	if (!saved.ok) {
		return saved
	}

	consola.success(`${CONFIG_FILENAME} updated (added ${entry.id}).`)
	return { ok: true, value: entry }
}

export async function sourceRemove(
	id: string,
	options: EditOptions = {},
): Promise<Result<number, IndexError>> {
	const { config } = resolveProjectPaths(options.root)

	const document = await loadConfigDocument(config)
	if (!document.ok) {
		return document
	}

	const removed = removeSource(document.value, id)
	if (removed === 0) {
		consola.warn(`No source with id '${id}' in ${CONFIG_FILENAME}; nothing changed.`)
		return { ok: true, value: 0 }
	}

	const saved = await saveConfigDocument(config, document.value)
	if (!saved.ok) {
		return saved
	}

	consola.success(`${CONFIG_FILENAME} updated (removed ${id}).`)
	return { ok: true, value: removed }
}
