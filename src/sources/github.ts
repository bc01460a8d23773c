import { consola } from "consola"
import { z } from "zod"
import type { GithubRepo } from "@/core/types/branded"
import { splitGithubRepo } from "@/core/types/coerce"
import type { IndexError, Result } from "@/core/types/error"
import { toRawError } from "@/utils/errors"

const GITHUB_API = "https://api.github.com"
const RELEASES_PER_PAGE = 100
const USER_AGENT = "kicad-pcm-index"

export interface GithubAsset {
	name: string | null
	url: string | null
}

export interface GithubRelease {
	tagName: string | null
	createdAt: string
	assets: GithubAsset[]
}

export interface GithubRequestOptions {
	token?: string
}

const releaseSchema = z.object({
	assets: z
		.array(
			z.object({
				browser_download_url: z.string().nullish(),
				name: z.string().nullish(),
			}),
		)
		.nullish(),
	created_at: z.string().nullish(),
	tag_name: z.string().nullish(),
})

const releasesSchema = z.array(releaseSchema)

export function releaseDownloadUrl(repo: GithubRepo, tag: string, assetName: string): string {
	const { name, owner } = splitGithubRepo(repo)
	return `https://github.com/${owner}/${name}/releases/download/${tag}/${assetName}`
}

/**
 * Every release of `repo`, in the order the API lists them. Pages are
 * followed through the `Link` header.
 */
export async function listReleases(
	repo: GithubRepo,
	options: GithubRequestOptions = {},
): Promise<Result<GithubRelease[], IndexError>> {
	const releases: GithubRelease[] = []
	let url: string | null = `${GITHUB_API}/repos/${repo}/releases?per_page=${RELEASES_PER_PAGE}`

	while (url) {
		const responseResult = await fetchGithubApi({ target: repo, token: options.token, url })
		if (!responseResult.ok) {
			return responseResult
		}
		const response = responseResult.value

		let payload: unknown
		try {
			payload = await response.json()
		} catch (error) {
			return {
				error: {
					message: "GitHub response parsing failed.",
					rawError: toRawError(error),
					source: url,
					type: "parse",
				},
				ok: false,
			}
		}

		const parsed = releasesSchema.safeParse(payload)
		if (!parsed.success) {
			return {
				error: {
					field: "releases",
					message: `Unexpected releases payload for ${repo}.`,
					source: "zod",
					type: "validation",
					zodError: parsed.error,
				},
				ok: false,
			}
		}

		for (const release of parsed.data) {
			releases.push({
				assets: (release.assets ?? []).map((asset) => ({
					name: asset.name ?? null,
					url: asset.browser_download_url ?? null,
				})),
				createdAt: release.created_at ?? "",
				tagName: release.tag_name ?? null,
			})
		}

		url = nextPageUrl(response.headers.get("link"))
	}

	return { ok: true, value: releases }
}

/** Newest first by creation time; releases created together keep API order. */
export function sortReleasesNewestFirst(releases: readonly GithubRelease[]): GithubRelease[] {
	return [...releases].sort((a, b) => {
		if (a.createdAt === b.createdAt) return 0
		return a.createdAt > b.createdAt ? -1 : 1
	})
}

export function nextPageUrl(linkHeader: string | null): string | null {
	if (!linkHeader) {
		return null
	}

	for (const part of linkHeader.split(",")) {
		const match = /<([^>]+)>\s*;\s*rel="([^"]+)"/.exec(part.trim())
		if (match?.[2]?.split(/\s+/).includes("next")) {
			return match[1] ?? null
		}
	}

	return null
}

/** Download a release asset body in full. */
export async function downloadAsset(url: string): Promise<Result<Buffer, IndexError>> {
	let response: Response
	try {
		response = await fetch(url, { headers: { "User-Agent": USER_AGENT } })
	} catch (error) {
		return {
			error: {
				message: "Asset download failed.",
				rawError: toRawError(error),
				source: url,
				type: "network",
			},
			ok: false,
		}
	}

	if (!response.ok) {
		return {
			error: {
				message: `Asset download failed with status ${response.status}.`,
				source: url,
				status: response.status,
				type: "network",
			},
			ok: false,
		}
	}

	try {
		return { ok: true, value: Buffer.from(await response.arrayBuffer()) }
	} catch (error) {
		return {
			error: {
				message: "Asset download was interrupted.",
				rawError: toRawError(error),
				source: url,
				type: "network",
			},
			ok: false,
		}
	}
}

/**
 * Low-level GitHub API fetch with standard error handling.
 * Handles network errors, rate limiting (403/429), 401, 404 and other
 * non-2xx responses.
 */
async function fetchGithubApi(options: {
	url: string
	target: string
	token?: string
}): Promise<Result<Response, IndexError>> {
	const { target, token, url } = options
	const headers = buildGithubHeaders(token)

	let response: Response
	try {
		response = await fetch(url, { headers })
	} catch (error) {
		return {
			error: {
				message: "GitHub request failed.",
				rawError: toRawError(error),
				source: url,
				type: "network",
			},
			ok: false,
		}
	}

	if (response.ok) {
		return { ok: true, value: response }
	}

	const message = await readGithubMessage(response, url)

	if (response.status === 404) {
		return {
			error: {
				message: `GitHub repo ${target} not found (404).`,
				status: response.status,
				target,
				type: "not_found",
			},
			ok: false,
		}
	}

	if (response.status === 401) {
		return {
			error: {
				message: withDetail("GitHub request unauthorized (401)", message),
				source: url,
				status: response.status,
				type: "network",
			},
			ok: false,
		}
	}

	if (
		response.status === 429 ||
		(response.status === 403 && isRateLimitResponse(response, message))
	) {
		return {
			error: {
				message: "GitHub rate limit exceeded.",
				retryable: true,
				source: url,
				status: response.status,
				type: "network",
			},
			ok: false,
		}
	}

	if (response.status === 403) {
		return {
			error: {
				message: withDetail("GitHub request forbidden (403)", message),
				source: url,
				status: response.status,
				type: "network",
			},
			ok: false,
		}
	}

	return {
		error: {
			message: `GitHub request failed with status ${response.status}.`,
			source: url,
			status: response.status,
			type: "network",
		},
		ok: false,
	}
}

export function buildGithubHeaders(token?: string): Record<string, string> {
	const headers: Record<string, string> = {
		Accept: "application/vnd.github+json",
		"User-Agent": USER_AGENT,
		"X-GitHub-Api-Version": "2022-11-28",
	}

	if (token) {
		headers.Authorization = `Bearer ${token}`
	}

	return headers
}

function isRateLimitResponse(response: Response, message: string | null): boolean {
	if (response.headers.get("x-ratelimit-remaining") === "0") {
		return true
	}
	return message?.toLowerCase().includes("rate limit") ?? false
}

function withDetail(summary: string, message: string | null): string {
	if (message && message.trim().length > 0) {
		return `${summary}: ${message.trim()}`
	}
	return `${summary}.`
}

async function readGithubMessage(response: Response, url: string): Promise<string | null> {
	let body: string | null = null
	try {
		const text = (await response.text()).trim()
		body = text.length > 0 ? text : null
	} catch {
		body = null
	}

	consola.debug(`[github] ${response.status} response from ${url}${body ? `: ${body}` : ""}`)

	if (!body) {
		return null
	}

	try {
		const parsed: unknown = JSON.parse(body)
		if (
			typeof parsed === "object" &&
			parsed !== null &&
			"message" in parsed &&
			typeof parsed.message === "string"
		) {
			return parsed.message
		}
	} catch {
		// not JSON; fall through to the raw body
	}

	return body
}
