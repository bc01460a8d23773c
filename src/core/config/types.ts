import type { GithubRepo } from "@/core/types/branded"

export const SOURCE_MODES = ["release_scan", "mirror_packages_json"] as const

export type SourceMode = (typeof SOURCE_MODES)[number]

export interface ReleaseScanSource {
	id: string
	mode: "release_scan"
	repo: GithubRepo
	assetGlob: string
	onlyLatest: boolean
}

export interface MirrorSource {
	id: string
	mode: "mirror_packages_json"
	packagesUrl: string
}

export type Source = ReleaseScanSource | MirrorSource

/** A configured source whose mode this tool does not know. */
export interface IgnoredSource {
	id: string | null
	mode: string | null
}

export interface RepositoryConfig {
	name: string
	maintainer: Record<string, unknown>
	sources: Source[]
	ignored: IgnoredSource[]
}
