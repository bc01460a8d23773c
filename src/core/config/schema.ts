import { z } from "zod"
import type { MirrorSource, ReleaseScanSource, SourceMode } from "@/core/config/types"
import { SOURCE_MODES } from "@/core/config/types"
import { coerceGithubRepo } from "@/core/types/coerce"

export const DEFAULT_REPOSITORY_NAME = "Custom KiCad PCM Repository"
export const DEFAULT_ASSET_GLOB = "*.zip"

const idSchema = z.string().trim().min(1)

const githubRepoSchema = z.string().transform((value, ctx) => {
	const repo = coerceGithubRepo(value)
	if (!repo) {
		ctx.addIssue({
			code: z.ZodIssueCode.custom,
			message: `Expected an owner/repo slug, got "${value}".`,
		})
		return z.NEVER
	}
	return repo
})

export const releaseScanSourceSchema = z
	.object({
		asset_glob: z.string().min(1).default(DEFAULT_ASSET_GLOB),
		id: idSchema,
		mode: z.literal("release_scan"),
		only_latest: z.boolean().default(false),
		repo: githubRepoSchema,
	})
	.transform(
		(value): ReleaseScanSource => ({
			assetGlob: value.asset_glob,
			id: value.id,
			mode: value.mode,
			onlyLatest: value.only_latest,
			repo: value.repo,
		}),
	)

export const mirrorSourceSchema = z
	.object({
		id: idSchema,
		mode: z.literal("mirror_packages_json"),
		packages_url: z.string().url(),
	})
	.transform(
		(value): MirrorSource => ({
			id: value.id,
			mode: value.mode,
			packagesUrl: value.packages_url,
		}),
	)

export const repositoryConfigSchema = z.object({
	maintainer: z
		.record(z.string(), z.unknown())
		.default({ contact: {}, name: "Unknown" }),
	name: z.string().default(DEFAULT_REPOSITORY_NAME),
	sources: z
		.array(z.unknown())
		.nullish()
		.transform((value) => value ?? []),
})

const KNOWN_MODES: ReadonlySet<string> = new Set(SOURCE_MODES)

export function isKnownMode(value: unknown): value is SourceMode {
	return typeof value === "string" && KNOWN_MODES.has(value)
}
