import { z } from "zod"
import type { ManifestInfo } from "@/core/manifest/types"
import { parseJsonTolerant } from "@/core/parsing/json"
import type { ParseError, Result, ValidationError } from "@/core/types/error"

const scalarString = z.union([z.string(), z.number()]).transform((value) => String(value))
const optionalScalar = scalarString.optional().catch(undefined)
const optionalRecord = z.record(z.string(), z.unknown()).optional().catch(undefined)

const manifestSchema = z.object({
	author: optionalRecord,
	description: optionalScalar,
	description_full: optionalScalar,
	identifier: optionalScalar,
	install_size: z.unknown(),
	kicad_version: optionalScalar,
	license: optionalScalar,
	maintainer: optionalRecord,
	name: optionalScalar,
	resources: optionalRecord,
	status: optionalScalar,
	type: optionalScalar,
	version: optionalScalar,
})

export type ManifestDocumentError = ParseError | ValidationError

/**
 * Read a manifest document. The body is parsed tolerantly; the top level
 * must be a JSON object, individual fields of the wrong shape are dropped.
 */
export function parseManifestDocument(
	contents: string,
	entryName: string,
): Result<ManifestInfo, ManifestDocumentError> {
	const parsed = parseJsonTolerant(contents, entryName)
	if (!parsed.ok) {
		return parsed
	}

	const document = parsed.value
	if (typeof document !== "object" || document === null || Array.isArray(document)) {
		return {
			error: {
				field: entryName,
				message: `${entryName} must contain a JSON object.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const result = manifestSchema.safeParse(document)
	if (!result.success) {
		return {
			error: {
				field: entryName,
				message: `${entryName} validation failed.`,
				source: "zod",
				type: "validation",
				zodError: result.error,
			},
			ok: false,
		}
	}

	const data = result.data
	return {
		ok: true,
		value: {
			author: data.author,
			description: data.description,
			descriptionFull: data.description_full,
			identifier: data.identifier,
			installSize: data.install_size,
			kicadVersion: data.kicad_version,
			license: data.license,
			maintainer: data.maintainer,
			name: data.name,
			resources: data.resources,
			status: data.status,
			type: data.type,
			version: data.version,
		},
	}
}
