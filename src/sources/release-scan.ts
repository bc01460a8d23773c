import { consola } from "consola"
import { readManifestFromArchive } from "@/core/archive/read"
import type { ReleaseScanSource } from "@/core/config/types"
import {
	attachLocalResources,
	buildVersionRecord,
	mergeManifestIntoPackage,
	resolveVersionString,
	sortVersionsDescending,
} from "@/core/packages/merge"
import type { IndexPackage } from "@/core/packages/types"
import { matchesGlob } from "@/core/parsing/glob"
import type { IndexError, Result } from "@/core/types/error"
import {
	downloadAsset,
	listReleases,
	releaseDownloadUrl,
	sortReleasesNewestFirst,
} from "@/sources/github"
import type { SourceContext } from "@/sources/types"
import { sha256Hex } from "@/utils/hash"

/**
 * Build packages from the release assets of one GitHub repository.
 *
 * Listing or downloading failures abort the scan. A problem with a single
 * asset (unknown archive, missing or broken manifest, duplicate version) is
 * logged and the scan moves on.
 */
export async function scanReleaseSource(
	source: ReleaseScanSource,
	context: SourceContext,
): Promise<Result<IndexPackage[], IndexError>> {
	const log = consola.withTag(source.id)

	log.start(
		`Scanning ${source.repo} (only_latest=${source.onlyLatest}, glob='${source.assetGlob}')`,
	)

	const listed = await listReleases(source.repo, { token: context.token })
	if (!listed.ok) {
		return listed
	}

	const releases = sortReleasesNewestFirst(listed.value)
	if (releases.length === 0) {
		log.info("No releases found.")
	}

	const packages = new Map<string, IndexPackage>()

	for (const release of releases) {
		const tag = release.tagName
		log.info(`Release ${tag ?? "(untagged)"}: ${release.assets.length} asset(s)`)

		let matched = 0
		for (const asset of release.assets) {
			if (!asset.name || !asset.url) {
				log.info("Skip: asset missing name/url")
				continue
			}
			if (!matchesGlob(source.assetGlob, asset.name)) {
				log.info(`Skip: '${asset.name}' (does not match glob)`)
				continue
			}

			matched += 1
			log.info(`Fetch: ${asset.name}`)

			const body = await downloadAsset(asset.url)
			if (!body.ok) {
				return body
			}

			const read = await readManifestFromArchive(body.value)
			if (!read.ok) {
				log.warn(`Skip: ${asset.name}: ${read.error.message}`)
				continue
			}

			const { entryName, manifest } = read.value
			const identifier = manifest.identifier || source.id
			const version = resolveVersionString(manifest, tag)
			const merged = mergeManifestIntoPackage(packages.get(identifier), {
				identifier,
				manifest,
				version: buildVersionRecord(manifest, version, {
					sha256: sha256Hex(body.value),
					size: body.value.length,
					url: releaseDownloadUrl(source.repo, tag ?? "", asset.name),
				}),
			})

			packages.set(
				identifier,
				await attachLocalResources(merged.pkg, context.assetsDir, context.assetLookup),
			)

			if (merged.outcome === "duplicate") {
				log.info(
					`Version ${version} of ${identifier} already present; skipping duplicate asset`,
				)
			} else {
				log.success(`Found ${entryName}; ${identifier} version=${version}`)
			}
		}

		if (matched === 0) {
			log.info("No assets matched the glob for this release")
		}
		if (source.onlyLatest) {
			break
		}
	}

	return {
		ok: true,
		value: [...packages.values()].map((pkg) => ({
			...pkg,
			versions: sortVersionsDescending(pkg.versions),
		})),
	}
}
