import path from "node:path"
import { Document, isMap, isSeq, parseDocument } from "yaml"
import { YAML_OPTIONS } from "@/core/config/load"
import { DEFAULT_ASSET_GLOB } from "@/core/config/schema"
import { isNotFound, readFileUtf8, writeFileBytes } from "@/core/io/fs"
import type { GithubRepo } from "@/core/types/branded"
import type { IndexError, Result } from "@/core/types/error"

export interface ReleaseSourceEntry {
	id: string
	mode: "release_scan"
	repo: string
	asset_glob: string
	only_latest: boolean
}

export interface MirrorSourceEntry {
	id: string
	mode: "mirror_packages_json"
	packages_url: string
}

export type SourceEntry = ReleaseSourceEntry | MirrorSourceEntry

const INVALID_ID_CHARS = /[^a-z0-9_-]+/g

export function sanitizeSourceId(value: string): string {
	return value.toLowerCase().replace(INVALID_ID_CHARS, "-")
}

/** `owner/Some.Repo` → `some-repo` */
export function sourceIdFromRepo(repo: string): string {
	const segments = repo.split("/")
	return sanitizeSourceId(segments[segments.length - 1] ?? repo)
}

/** File stem of the URL path: `https://host/x/packages.json` → `packages` */
export function sourceIdFromUrl(url: string): string {
	const trimmed = url.replace(/\/+$/, "")
	const basename = path.posix.basename(trimmed)
	const extension = path.posix.extname(basename)
	const stem = extension ? basename.slice(0, -extension.length) : basename
	return sanitizeSourceId(stem)
}

export function parseOnlyLatest(value: string): boolean {
	return value.toLowerCase() === "true"
}

// Key order is the order written to repos.yaml.
export function buildReleaseSourceEntry(
	repo: GithubRepo,
	assetGlob: string,
	onlyLatest: boolean,
): ReleaseSourceEntry {
	return {
		id: sourceIdFromRepo(repo),
		mode: "release_scan",
		repo,
		asset_glob: assetGlob || DEFAULT_ASSET_GLOB,
		only_latest: onlyLatest,
	}
}

export function buildMirrorSourceEntry(url: string): MirrorSourceEntry {
	return {
		id: sourceIdFromUrl(url),
		mode: "mirror_packages_json",
		packages_url: url,
	}
}

export async function loadConfigDocument(
	configPath: string,
): Promise<Result<Document, IndexError>> {
	const contents = await readFileUtf8(configPath)
	if (!contents.ok) {
		if (isNotFound(contents.error.rawError)) {
			return { ok: true, value: new Document({ sources: [] }, YAML_OPTIONS) }
		}
		return contents
	}

	const document = parseDocument(contents.value, YAML_OPTIONS)
	const [firstError] = document.errors
	if (firstError) {
		return {
			error: {
				message: `Invalid YAML: ${firstError.message}`,
				path: configPath,
				rawError: firstError,
				source: "yaml",
				type: "parse",
			},
			ok: false,
		}
	}

	return { ok: true, value: document }
}

function sourceIds(document: Document): string[] {
	const sources = document.get("sources")
	if (!isSeq(sources)) {
		return []
	}

	return sources.items.flatMap((item) => {
		const id = isMap(item) ? item.get("id") : null
		return typeof id === "string" ? [id] : []
	})
}

/**
 * Append a source entry. Comments and the order of everything already in
 * the document are kept.
 */
export function addSource(
	document: Document,
	entry: SourceEntry,
	configPath: string,
): Result<{ duplicate: boolean }, IndexError> {
	const duplicate = sourceIds(document).includes(entry.id)
	const sources = document.get("sources")

	if (sources === undefined || sources === null) {
		document.set("sources", document.createNode([entry]))
		return { ok: true, value: { duplicate } }
	}

	if (!isSeq(sources)) {
		return {
			error: {
				field: "sources",
				message: "`sources` must be a list.",
				path: configPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	sources.add(document.createNode(entry))
	return { ok: true, value: { duplicate } }
}

/** Drop every source carrying `id`; returns how many were removed. */
export function removeSource(document: Document, id: string): number {
	const sources = document.get("sources")
	if (!isSeq(sources)) {
		return 0
	}

	const before = sources.items.length
	sources.items = sources.items.filter((item) => !(isMap(item) && item.get("id") === id))
	return before - sources.items.length
}

export async function saveConfigDocument(
	configPath: string,
	document: Document,
): Promise<Result<void, IndexError>> {
	return writeFileBytes(configPath, document.toString())
}
