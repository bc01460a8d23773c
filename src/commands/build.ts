import { consola } from "consola"
import { loadRepositoryConfig } from "@/core/config/load"
import { type PublishTarget, type WrittenIndex, writeIndexFiles } from "@/core/index/write"
import type { LocalAssetLookup } from "@/core/io/fs"
import { coerceGithubRepo } from "@/core/types/coerce"
import type { IndexError, Result } from "@/core/types/error"
import { env, githubToken } from "@/env"
import { resolveProjectPaths } from "@/paths"
import { loadSource } from "@/sources"

export interface BuildOptions {
	root?: string
	token?: string
	target?: PublishTarget
	assetLookup?: LocalAssetLookup
	now?: Date
}

/**
 * Where the published files will live. GitHub Actions sets
 * GITHUB_REPOSITORY; elsewhere it must be given explicitly.
 */
export function resolvePublishTarget(
	repository: string | undefined,
	branch: string,
): Result<PublishTarget, IndexError> {
	if (repository === undefined) {
		return {
			error: {
				field: "GITHUB_REPOSITORY",
				message: "GITHUB_REPOSITORY is not set; it names the owner/repo that hosts the index.",
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const slug = coerceGithubRepo(repository)
	if (!slug) {
		return {
			error: {
				field: "GITHUB_REPOSITORY",
				message: `GITHUB_REPOSITORY must be an owner/repo slug, got "${repository}".`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	return { ok: true, value: { branch, repository: slug } }
}

/**
 * Run the whole pipeline: read repos.yaml, load every source in order and
 * write packages.json plus repository.json.
 */
export async function buildCommand(
	options: BuildOptions = {},
): Promise<Result<WrittenIndex, IndexError>> {
	const paths = resolveProjectPaths(options.root)

	const target = options.target
		? { ok: true as const, value: options.target }
		: resolvePublishTarget(env.GITHUB_REPOSITORY, env.PCM_BRANCH)
	if (!target.ok) {
		return target
	}

	const config = await loadRepositoryConfig(paths.config)
	if (!config.ok) {
		return config
	}

	for (const ignored of config.value.ignored) {
		consola.warn(
			`Unknown mode '${ignored.mode ?? "(none)"}' for source ${ignored.id ?? "(no id)"}; skipping.`,
		)
	}

	const context = {
		assetLookup: options.assetLookup,
		assetsDir: paths.assets,
		token: options.token ?? githubToken(),
	}

	const packages: unknown[] = []
	for (const source of config.value.sources) {
		const loaded = await loadSource(source, context)
		if (!loaded.ok) {
			return {
				error: {
					cause: loaded.error,
					message: `Source ${source.id} could not be loaded.`,
					sourceId: source.id,
					type: "source",
				},
				ok: false,
			}
		}
		packages.push(...loaded.value)
	}

	const written = await writeIndexFiles({
		maintainer: config.value.maintainer,
		name: config.value.name,
		now: options.now,
		packages,
		paths,
		target: target.value,
	})
	if (!written.ok) {
		return written
	}

	consola.success(
		`Wrote ${written.value.packageCount} package entries (sha256 ${written.value.packagesSha256}).`,
	)
	return written
}
