import { parse, YAMLParseError } from "yaml"
import {
	isKnownMode,
	mirrorSourceSchema,
	releaseScanSourceSchema,
	repositoryConfigSchema,
} from "@/core/config/schema"
import type { IgnoredSource, RepositoryConfig, Source } from "@/core/config/types"
import { readFileUtf8 } from "@/core/io/fs"
import type { IndexError, Result } from "@/core/types/error"
import { toRawError } from "@/utils/errors"

// YAML 1.1 reads yes/no/on/off as booleans, as existing repos.yaml files expect.
export const YAML_OPTIONS = { version: "1.1" } as const

export function parseRepositoryConfig(
	contents: string,
	configPath: string,
): Result<RepositoryConfig> {
	let data: unknown
	try {
		data = parse(contents, YAML_OPTIONS)
	} catch (error) {
		const message =
			error instanceof YAMLParseError ? `Invalid YAML: ${error.message}` : "Invalid YAML."
		return {
			error: {
				message,
				path: configPath,
				rawError: toRawError(error),
				source: "yaml",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = repositoryConfigSchema.safeParse(data ?? {})
	if (!parsed.success) {
		return {
			error: {
				field: "config",
				message: "Configuration validation failed.",
				path: configPath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const sources: Source[] = []
	const ignored: IgnoredSource[] = []

	for (const [index, raw] of parsed.data.sources.entries()) {
		const mode = readField(raw, "mode")
		if (!isKnownMode(mode)) {
			ignored.push({ id: readField(raw, "id"), mode })
			continue
		}

		const source =
			mode === "release_scan"
				? releaseScanSourceSchema.safeParse(raw)
				: mirrorSourceSchema.safeParse(raw)
		if (!source.success) {
			return {
				error: {
					field: `sources[${index}]`,
					message: `Source ${index} (${mode}) is invalid.`,
					path: configPath,
					source: "zod",
					type: "validation",
					zodError: source.error,
				},
				ok: false,
			}
		}
		sources.push(source.data)
	}

	return {
		ok: true,
		value: {
			ignored,
			maintainer: parsed.data.maintainer,
			name: parsed.data.name,
			sources,
		},
	}
}

function readField(raw: unknown, key: string): string | null {
	if (typeof raw !== "object" || raw === null || !(key in raw)) {
		return null
	}
	const value: unknown = Reflect.get(raw, key)
	return typeof value === "string" ? value : null
}

export async function loadRepositoryConfig(
	configPath: string,
): Promise<Result<RepositoryConfig, IndexError>> {
	const contents = await readFileUtf8(configPath)
	if (!contents.ok) {
		return contents
	}

	return parseRepositoryConfig(contents.value, configPath)
}
