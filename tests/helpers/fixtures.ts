import type { ReleaseScanSource } from "@/core/config/types"
import type { GithubRepo } from "@/core/types/branded"
import { coerceGithubRepo } from "@/core/types/coerce"

export function githubRepo(value: string): GithubRepo {
	const repo = coerceGithubRepo(value)
	if (!repo) {
		throw new Error(`Invalid repo fixture: ${value}`)
	}
	return repo
}

export function releaseSource(overrides: Partial<ReleaseScanSource> = {}): ReleaseScanSource {
	return {
		assetGlob: "*.zip",
		id: "foo-lib",
		mode: "release_scan",
		onlyLatest: false,
		repo: githubRepo("acme/foo-lib"),
		...overrides,
	}
}
