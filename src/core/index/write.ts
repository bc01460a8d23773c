import { stringify } from "lossless-json"
import { readFileBytes, safeStat, writeFileBytes } from "@/core/io/fs"
import type { IndexError, Result } from "@/core/types/error"
import { PACKAGES_FILENAME, type ProjectPaths, RESOURCES_FILENAME } from "@/paths"
import { sha256Hex } from "@/utils/hash"

export const REPOSITORY_SCHEMA_URL =
	"https://gitlab.com/kicad/code/kicad/-/raw/master/kicad/pcm/schemas/pcm.v1.schema.json#/definitions/Repository"

export interface FileReference {
	url: string
	sha256: string
	update_time_utc: string
	update_timestamp: number
}

export interface RepositoryDescriptor {
	$schema: string
	name: string
	maintainer: Record<string, unknown>
	packages: FileReference
	resources?: FileReference
}

export interface PublishTarget {
	/** `owner/repo` of the repository hosting the index. */
	repository: string
	branch: string
}

/**
 * `packages.json` contents. Two-space indentation and a trailing newline;
 * key order follows the objects as built, so equal input gives equal bytes.
 * Mirrored numbers are written back with the digits they arrived with.
 */
export function serializePackageIndex(packages: readonly unknown[]): string {
	return `${stringify({ packages }, null, 2) ?? ""}\n`
}

export function rawFileUrl(target: PublishTarget, filename: string): string {
	return `https://raw.githubusercontent.com/${target.repository}/${target.branch}/${filename}`
}

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatUpdateTime(date: Date): string {
	return date.toISOString().slice(0, 19).replace("T", " ")
}

export function buildFileReference(url: string, sha256: string, now: Date): FileReference {
	return {
		url,
		sha256,
		update_time_utc: formatUpdateTime(now),
		update_timestamp: Math.floor(now.getTime() / 1000),
	}
}

export function buildRepositoryDescriptor(options: {
	name: string
	maintainer: Record<string, unknown>
	packages: FileReference
	resources?: FileReference
}): RepositoryDescriptor {
	const descriptor: RepositoryDescriptor = {
		$schema: REPOSITORY_SCHEMA_URL,
		name: options.name,
		maintainer: options.maintainer,
		packages: options.packages,
	}

	if (options.resources) {
		descriptor.resources = options.resources
	}

	return descriptor
}

export interface WrittenIndex {
	packageCount: number
	packagesSha256: string
	resourcesSha256: string | null
}

/**
 * Write `packages.json`, then `repository.json` pointing at it (and at
 * `resources.zip` when one exists). The recorded hash is taken over the
 * exact bytes written.
 */
export async function writeIndexFiles(options: {
	paths: ProjectPaths
	name: string
	maintainer: Record<string, unknown>
	packages: readonly unknown[]
	target: PublishTarget
	now?: Date
}): Promise<Result<WrittenIndex, IndexError>> {
	const { paths, target } = options
	const now = options.now ?? new Date()

	const indexBytes = Buffer.from(serializePackageIndex(options.packages), "utf8")
	const written = await writeFileBytes(paths.packages, indexBytes)
	if (!written.ok) {
		return written
	}
	const packagesSha256 = sha256Hex(indexBytes)

	let resources: FileReference | undefined
	const resourcesStat = await safeStat(paths.resources)
	if (!resourcesStat.ok) {
		return resourcesStat
	}
	if (resourcesStat.value?.isFile()) {
		const bundle = await readFileBytes(paths.resources)
		if (!bundle.ok) {
			return bundle
		}
		resources = buildFileReference(
			rawFileUrl(target, RESOURCES_FILENAME),
			sha256Hex(bundle.value),
			now,
		)
	}

	const descriptor = buildRepositoryDescriptor({
		maintainer: options.maintainer,
		name: options.name,
		packages: buildFileReference(rawFileUrl(target, PACKAGES_FILENAME), packagesSha256, now),
		resources,
	})

	const descriptorWritten = await writeFileBytes(
		paths.repository,
		`${JSON.stringify(descriptor, null, 2)}\n`,
	)
	if (!descriptorWritten.ok) {
		return descriptorWritten
	}

	return {
		ok: true,
		value: {
			packageCount: options.packages.length,
			packagesSha256,
			resourcesSha256: resources?.sha256 ?? null,
		},
	}
}
