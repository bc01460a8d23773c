export const README_START_MARKER = "<!-- AUTO-INDEX:START -->"
export const README_END_MARKER = "<!-- AUTO-INDEX:END -->"

export const EMPTY_TABLE_TEXT = "_No packages indexed yet._"
export const UNKNOWN_LICENSE = "not specified"

const LICENSING_NOTE =
	"> ⚖️ **Licensing Note:** This index aggregates third-party KiCad packages. " +
	"Please review and respect each project’s license before use or redistribution. " +
	"If a license isn’t specified here, check the upstream repository. " +
	"The packages listed here retain their original licenses."

const DEFAULT_README = [
	"# KiCad PCM Repository",
	"",
	"This repository hosts a custom KiCad PCM index.",
	"",
	"## Packages",
	"",
	README_START_MARKER,
	README_END_MARKER,
	"",
].join("\n")

const URL_KEYS = [
	"homepage",
	"website",
	"web",
	"url",
	"github",
	"gitlab",
	"source",
	"repo",
	"repository",
	"twitter",
] as const

const LICENSE_OBJECT_KEYS = ["spdx_id", "id", "name", "license", "title"] as const

type Loose = Record<string, unknown>

function asRecord(value: unknown): Loose {
	return typeof value === "object" && value !== null && !Array.isArray(value)
		? Object.fromEntries(Object.entries(value))
		: {}
}

function nonEmptyString(value: unknown): string | null {
	if (typeof value !== "string") return null
	const trimmed = value.trim()
	return trimmed.length > 0 ? trimmed : null
}

function escapeCell(text: string): string {
	return text.replace(/\|/g, "\\|")
}

/** The package list of a `packages.json` document (object or bare array). */
export function readPackageList(document: unknown): unknown[] {
	if (Array.isArray(document)) {
		return document
	}
	const packages = asRecord(document).packages
	return Array.isArray(packages) ? packages : []
}

export function displayName(pkg: unknown): string {
	const record = asRecord(pkg)
	if ("name" in record) return String(record.name)
	if ("identifier" in record) return String(record.identifier)
	return "(unknown)"
}

function packageCell(pkg: unknown): string {
	const name = escapeCell(displayName(pkg))
	const homepage = asRecord(asRecord(pkg).resources).homepage
	return homepage ? `[${name}](${String(homepage)})` : name
}

export function firstUrlLike(contact: unknown): string | null {
	const record = asRecord(contact)
	for (const key of URL_KEYS) {
		const value = record[key]
		if (
			typeof value === "string" &&
			(value.startsWith("http://") || value.startsWith("https://"))
		) {
			return value
		}
	}
	return null
}

/** Maintainer name, else author name, linked to their first contact URL. */
export function maintainerCell(pkg: unknown): string {
	const record = asRecord(pkg)
	for (const person of [record.maintainer, record.author]) {
		const details = asRecord(person)
		const name = nonEmptyString(details.name)
		if (!name) continue
		const url = firstUrlLike(details.contact)
		return url ? `[${escapeCell(name)}](${url})` : escapeCell(name)
	}
	return "-"
}

/**
 * Flatten the shapes a license is given in: a string, an object naming it
 * under a well-known key, or a list of either.
 */
export function normalizeLicense(value: unknown): string | null {
	if (!value) return null

	if (typeof value === "string") {
		return nonEmptyString(value)
	}

	if (Array.isArray(value)) {
		const parts = value
			.map((item) => normalizeLicense(item))
			.filter((item): item is string => item !== null)
		return parts.length > 0 ? parts.join(", ") : null
	}

	if (typeof value === "object") {
		const record = asRecord(value)
		for (const key of LICENSE_OBJECT_KEYS) {
			const found = nonEmptyString(record[key])
			if (found) return found
		}
	}

	return null
}

export function licenseCell(pkg: unknown): string {
	const record = asRecord(pkg)
	const resources = asRecord(record.resources)
	const [newest] = Array.isArray(record.versions) ? record.versions : []
	const latest = asRecord(newest)

	const candidates = [
		record.license,
		record.licenses,
		resources.license || resources.licenses,
		latest.license || latest.licenses,
		asRecord(latest.resources).license,
	]

	for (const candidate of candidates) {
		const license = normalizeLicense(candidate)
		if (license) return escapeCell(license)
	}

	return UNKNOWN_LICENSE
}

export function buildPackageTable(packages: readonly unknown[]): string {
	if (packages.length === 0) {
		return EMPTY_TABLE_TEXT
	}

	const sorted = [...packages].sort((a, b) => {
		const left = displayName(a).toLowerCase()
		const right = displayName(b).toLowerCase()
		if (left === right) return 0
		return left < right ? -1 : 1
	})

	const header = "| 📦 Package | 👤 Maintainer | 🧾 License |\n|---|---|---|"
	const rows = sorted.map(
		(pkg) => `| ${packageCell(pkg)} | ${maintainerCell(pkg)} | ${licenseCell(pkg)} |`,
	)
	return [header, ...rows].join("\n")
}

/** `YYYY-MM-DD HH:MM UTC` */
export function formatReadmeTimestamp(date: Date): string {
	return `${date.toISOString().slice(0, 16).replace("T", " ")} UTC`
}

export function renderReadmeBlock(packages: readonly unknown[], now: Date): string {
	return [
		README_START_MARKER,
		"",
		LICENSING_NOTE,
		"",
		buildPackageTable(packages),
		"",
		`_Last updated: **${formatReadmeTimestamp(now)}** • Packages: **${packages.length}**_`,
		README_END_MARKER,
	].join("\n")
}

/** README text that is guaranteed to contain both markers. */
export function ensureMarkers(readme: string | null): string {
	if (readme === null) {
		return DEFAULT_README
	}
	if (readme.includes(README_START_MARKER) && readme.includes(README_END_MARKER)) {
		return readme
	}
	return `${readme.trimEnd()}\n\n## Packages\n\n${README_START_MARKER}\n${README_END_MARKER}\n`
}

function escapeRegExp(text: string): string {
	return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

const BLOCK_PATTERN = new RegExp(
	`${escapeRegExp(README_START_MARKER)}[\\s\\S]*?${escapeRegExp(README_END_MARKER)}`,
	"g",
)

export function replaceBlock(readme: string, block: string): string {
	return readme.replace(BLOCK_PATTERN, () => block)
}
