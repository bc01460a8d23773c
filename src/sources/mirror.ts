import { consola } from "consola"
import { isLosslessNumber, parse } from "lossless-json"
import type { MirrorSource } from "@/core/config/types"
import type { IndexError, Result } from "@/core/types/error"
import { toRawError } from "@/utils/errors"

const MIRROR_LIST_KEYS = ["packages", "data"] as const

/**
 * The package list inside a mirrored index: a bare array, or the first
 * non-empty `packages` / `data` member of an object. `null` when the
 * payload holds no list at all.
 */
export function extractMirrorPackages(payload: unknown): unknown[] | null {
	if (Array.isArray(payload)) {
		return payload
	}

	if (typeof payload !== "object" || payload === null) {
		return null
	}

	for (const key of MIRROR_LIST_KEYS) {
		const value: unknown = Reflect.get(payload, key)
		if (!isPresent(value)) {
			continue
		}
		return Array.isArray(value) ? value : null
	}

	return []
}

function isPresent(value: unknown): boolean {
	if (isLosslessNumber(value)) return Number(value.value) !== 0
	if (Array.isArray(value)) return value.length > 0
	if (typeof value === "object" && value !== null) return Object.keys(value).length > 0
	return Boolean(value)
}

/** Fetch a pre-built package index and pass its entries through as-is. */
export async function importMirror(
	source: MirrorSource,
): Promise<Result<unknown[], IndexError>> {
	const url = source.packagesUrl
	consola.start(`Mirroring ${url}`)

	let response: Response
	try {
		response = await fetch(url, { headers: { "User-Agent": "kicad-pcm-index" } })
	} catch (error) {
		return {
			error: {
				message: "Mirror request failed.",
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
				message: `Mirror request failed with status ${response.status}.`,
				source: url,
				status: response.status,
				type: "network",
			},
			ok: false,
		}
	}

	let payload: unknown
	try {
		// Numbers stay as written (`6.0`, 64-bit sizes) until serialized again.
		payload = parse(await response.text())
	} catch (error) {
		return {
			error: {
				message: "Mirrored index is not valid JSON.",
				rawError: toRawError(error),
				source: url,
				type: "parse",
			},
			ok: false,
		}
	}

	const packages = extractMirrorPackages(payload)
	if (!packages) {
		return {
			error: {
				field: "packages",
				message: "Mirrored index does not contain a package list.",
				path: url,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	consola.info(`Mirrored ${packages.length} package entries from ${source.id}`)
	return { ok: true, value: packages }
}
