import type { GithubRepo, NonEmptyString } from "@/core/types/branded"

export function coerceNonEmpty(value: string): NonEmptyString | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	return trimmed as NonEmptyString
}

const GITHUB_REPO_PATTERN = /^([a-zA-Z0-9_.-]+)\/([a-zA-Z0-9_.-]+)$/

export function coerceGithubRepo(value: string): GithubRepo | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	const match = GITHUB_REPO_PATTERN.exec(trimmed)
	if (!match) return null

	const [, owner, repo] = match
	if (!owner || !repo) return null

	return trimmed as GithubRepo
}

export function splitGithubRepo(repo: GithubRepo): { owner: string; name: string } {
	const [owner = "", name = ""] = repo.split("/", 2)
	return { name, owner }
}
