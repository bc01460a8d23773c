import path from "node:path"
import { fsAssetLookup, type LocalAssetLookup } from "@/core/io/fs"
import type { ManifestInfo } from "@/core/manifest/types"
import {
	type AssetDownload,
	DEFAULT_KICAD_VERSION,
	DEFAULT_PACKAGE_TYPE,
	DEFAULT_VERSION_STATUS,
	FALLBACK_VERSION,
	type IndexPackage,
	type MergeResult,
	PACKAGE_SCHEMA_URL,
	type PackageVersion,
} from "@/core/packages/types"

/**
 * Version string for an asset: the manifest's own version, else the release
 * tag without its leading `v`, else `0.0.0`.
 */
export function resolveVersionString(manifest: ManifestInfo, tag: string | null): string {
	const declared = manifest.version?.trim()
	if (declared) {
		return declared
	}

	const fromTag = tag?.replace(/^v+/, "").trim()
	if (fromTag) {
		return fromTag
	}

	return FALLBACK_VERSION
}

/**
 * Integers (or integer strings) are kept. Falsy values, fractions and
 * anything non-numeric yield undefined.
 */
export function coerceInstallSize(value: unknown): number | undefined {
	if (typeof value === "number") {
		return Number.isSafeInteger(value) && value !== 0 ? value : undefined
	}

	if (typeof value === "string" && /^\s*[+-]?\d+\s*$/.test(value)) {
		const parsed = Number.parseInt(value, 10)
		return Number.isSafeInteger(parsed) ? parsed : undefined
	}

	return undefined
}

export function buildVersionRecord(
	manifest: ManifestInfo,
	version: string,
	download: AssetDownload,
): PackageVersion {
	const record: PackageVersion = {
		version,
		download_url: download.url,
		download_sha256: download.sha256,
		download_size: download.size,
		status: manifest.status ?? DEFAULT_VERSION_STATUS,
		kicad_version: manifest.kicadVersion ?? DEFAULT_KICAD_VERSION,
	}

	const installSize = coerceInstallSize(manifest.installSize)
	if (installSize !== undefined) {
		record.install_size = installSize
	}

	return record
}

export function createPackage(identifier: string, manifest: ManifestInfo): IndexPackage {
	const { author, descriptionFull, maintainer } = manifest
	return {
		$schema: PACKAGE_SCHEMA_URL,
		identifier,
		name: manifest.name ?? identifier,
		type: manifest.type ?? DEFAULT_PACKAGE_TYPE,
		description: manifest.description ?? `${identifier} package`,
		...(descriptionFull ? { description_full: descriptionFull } : {}),
		license: manifest.license ?? "",
		...(author ? { author } : {}),
		...(maintainer ? { maintainer } : {}),
		resources: { ...manifest.resources },
		versions: [],
	}
}

/**
 * Fold one asset's manifest into the package it belongs to.
 *
 * Display fields are only read from the manifest that creates the package;
 * later manifests contribute nothing but a version. A version string that
 * is already present is reported as a duplicate and not added.
 */
export function mergeManifestIntoPackage(
	existing: IndexPackage | undefined,
	incoming: {
		identifier: string
		manifest: ManifestInfo
		version: PackageVersion
	},
): MergeResult {
	const base = existing ?? createPackage(incoming.identifier, incoming.manifest)
	const outcome = existing ? "added" : "created"

	if (base.versions.some((entry) => entry.version === incoming.version.version)) {
		return { outcome: "duplicate", pkg: base, version: incoming.version.version }
	}

	return {
		outcome,
		pkg: { ...base, versions: [...base.versions, incoming.version] },
		version: incoming.version.version,
	}
}

/** Descending by raw string comparison; "1.9.0" sorts above "1.10.0". */
export function sortVersionsDescending(versions: readonly PackageVersion[]): PackageVersion[] {
	return [...versions].sort((a, b) => {
		if (a.version === b.version) return 0
		return a.version > b.version ? -1 : 1
	})
}

/**
 * Point `resources.icon` and `resources.screenshot` at files under
 * `<assetsDir>/<identifier>/` when they exist and the manifest did not set
 * them. Paths are relative to the resources bundle root.
 */
export async function attachLocalResources(
	pkg: IndexPackage,
	assetsDir: string,
	lookup: LocalAssetLookup = fsAssetLookup,
): Promise<IndexPackage> {
	const packageDir = path.join(assetsDir, pkg.identifier)
	if (!(await lookup.isDirectory(packageDir))) {
		return pkg
	}

	const resources = { ...pkg.resources }
	for (const key of ["icon", "screenshot"] as const) {
		if (key in resources) continue
		if (await lookup.isFile(path.join(packageDir, `${key}.png`))) {
			resources[key] = `${pkg.identifier}/${key}.png`
		}
	}

	return { ...pkg, resources }
}
