import { xz } from "@napi-rs/lzma"
import JSZip from "jszip"
import { Parser, type ReadEntry } from "tar"
import unbzip2 from "unbzip2-stream"
import { parseManifestDocument } from "@/core/manifest/parse"
import { MANIFEST_FILENAMES, type ManifestInfo } from "@/core/manifest/types"
import type { BaseError, Result } from "@/core/types/error"
import { formatError, toRawError } from "@/utils/errors"

export type ArchiveFormat = "zip" | "gzip" | "xz" | "bzip2" | "tar" | "unrecognized"

export type ManifestSkipReason =
	| "unrecognized_archive"
	| "unreadable_archive"
	| "manifest_missing"
	| "manifest_parse"
	| "manifest_not_object"

/** A per-asset problem. Logged and skipped, never fatal. */
export interface ManifestSkip extends BaseError {
	type: "skip"
	reason: ManifestSkipReason
	entryName?: string
}

export interface ArchiveManifest {
	manifest: ManifestInfo
	entryName: string
}

interface ArchiveContents {
	names: string[]
	read(name: string): Promise<string | null>
}

const XZ_MAGIC = [0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]
const BZIP2_MAGIC = [0x42, 0x5a, 0x68]
const TAR_MAGIC = "ustar"
const TAR_MAGIC_OFFSET = 257
const TAR_FILE_TYPES: ReadonlySet<string> = new Set(["File", "OldFile", "ContiguousFile"])

function startsWith(blob: Uint8Array, magic: readonly number[]): boolean {
	return blob.length >= magic.length && magic.every((byte, index) => blob[index] === byte)
}

export function detectArchiveFormat(blob: Uint8Array): ArchiveFormat {
	if (
		blob.length >= 4 &&
		blob[0] === 0x50 &&
		blob[1] === 0x4b &&
		((blob[2] === 0x03 && blob[3] === 0x04) || (blob[2] === 0x05 && blob[3] === 0x06))
	) {
		return "zip"
	}

	if (blob.length >= 2 && blob[0] === 0x1f && blob[1] === 0x8b) {
		return "gzip"
	}

	if (startsWith(blob, XZ_MAGIC)) {
		return "xz"
	}

	if (startsWith(blob, BZIP2_MAGIC)) {
		return "bzip2"
	}

	const magic = Buffer.from(
		blob.subarray(TAR_MAGIC_OFFSET, TAR_MAGIC_OFFSET + TAR_MAGIC.length),
	).toString("latin1")
	if (magic === TAR_MAGIC) {
		return "tar"
	}

	return "unrecognized"
}

/**
 * Pick the manifest entry: `manifest.json` or `metadata.json` at the root,
 * else inside the single top-level folder shared by every nested entry.
 * Deeper wrapping or several top-level folders find nothing.
 */
export function selectManifestName(names: readonly string[]): string | null {
	const available = new Set(names)

	for (const filename of MANIFEST_FILENAMES) {
		if (available.has(filename)) {
			return filename
		}
	}

	const topLevels = new Set(
		names
			.filter((name) => name.includes("/"))
			.map((name) => name.slice(0, name.indexOf("/"))),
	)
	if (topLevels.size !== 1) {
		return null
	}

	const [root] = topLevels
	for (const filename of MANIFEST_FILENAMES) {
		const candidate = `${root}/${filename}`
		if (available.has(candidate)) {
			return candidate
		}
	}

	return null
}

function isManifestCandidate(name: string): boolean {
	const parts = name.split("/")
	const basename = parts[parts.length - 1] ?? ""
	return parts.length <= 2 && (MANIFEST_FILENAMES as readonly string[]).includes(basename)
}

function normalizeEntryName(name: string): string {
	return name.replace(/^(\.\/)+/, "")
}

async function readZipContents(blob: Uint8Array): Promise<ArchiveContents> {
	const zip = await JSZip.loadAsync(blob)
	const names = Object.values(zip.files)
		.filter((entry) => !entry.dir)
		.map((entry) => normalizeEntryName(entry.name))

	return {
		names,
		async read(name) {
			const entry = zip.file(name) ?? zip.file(`./${name}`)
			return entry ? entry.async("string") : null
		},
	}
}

// One pass over the stream; only manifest candidates are buffered.
async function readTarContents(blob: Uint8Array): Promise<ArchiveContents> {
	const names: string[] = []
	const candidates = new Map<string, Buffer>()

	await new Promise<void>((resolve, reject) => {
		const parser = new Parser({ strict: true })

		parser.on("entry", (entry: ReadEntry) => {
			const name = normalizeEntryName(entry.path)
			if (!TAR_FILE_TYPES.has(entry.type)) {
				entry.resume()
				return
			}

			names.push(name)
			if (!isManifestCandidate(name)) {
				entry.resume()
				return
			}

			const chunks: Buffer[] = []
			entry.on("data", (chunk: Buffer) => {
				chunks.push(chunk)
			})
			entry.on("end", () => {
				candidates.set(name, Buffer.concat(chunks))
			})
		})
		parser.on("error", reject)
		parser.on("end", () => resolve())
		parser.end(Buffer.from(blob))
	})

	return {
		names,
		async read(name) {
			return candidates.get(name)?.toString("utf8") ?? null
		},
	}
}

async function decompressBzip2(blob: Uint8Array): Promise<Buffer> {
	const chunks: Buffer[] = []
	await new Promise<void>((resolve, reject) => {
		const stream = unbzip2()
		stream.on("data", (chunk: Buffer) => {
			chunks.push(chunk)
		})
		stream.on("end", () => resolve())
		stream.on("error", reject)
		stream.end(Buffer.from(blob))
	})
	return Buffer.concat(chunks)
}

// gzip is left to the tar parser, which unzips on its own.
async function readArchiveContents(
	format: Exclude<ArchiveFormat, "unrecognized">,
	blob: Uint8Array,
): Promise<ArchiveContents> {
	switch (format) {
		case "zip":
			return readZipContents(blob)
		case "xz":
			return readTarContents(await xz.decompress(Buffer.from(blob)))
		case "bzip2":
			return readTarContents(await decompressBzip2(blob))
		case "gzip":
		case "tar":
			return readTarContents(blob)
	}
}

function skip(
	reason: ManifestSkipReason,
	message: string,
	extra: { entryName?: string; cause?: BaseError; rawError?: Error } = {},
): { ok: false; error: ManifestSkip } {
	return {
		error: { ...extra, message, reason, type: "skip" },
		ok: false,
	}
}

/**
 * Find and parse the manifest inside a zip or tar release asset. Tarballs
 * may be plain or compressed with gzip, xz or bzip2.
 * Every failure is reported as a skip for the caller to log.
 */
export async function readManifestFromArchive(
	blob: Uint8Array,
): Promise<Result<ArchiveManifest, ManifestSkip>> {
	const format = detectArchiveFormat(blob)
	if (format === "unrecognized") {
		return skip("unrecognized_archive", "not a zip or tar archive")
	}

	let contents: ArchiveContents
	try {
		contents = await readArchiveContents(format, blob)
	} catch (error) {
		return skip("unreadable_archive", `unreadable ${format} archive: ${formatError(error)}`, {
			rawError: toRawError(error),
		})
	}

	const entryName = selectManifestName(contents.names)
	if (!entryName) {
		return skip("manifest_missing", "no manifest.json or metadata.json found")
	}

	const text = await contents.read(entryName)
	if (text === null) {
		return skip("manifest_missing", `${entryName} could not be read`, { entryName })
	}

	const parsed = parseManifestDocument(text, entryName)
	if (!parsed.ok) {
		const reason = parsed.error.type === "parse" ? "manifest_parse" : "manifest_not_object"
		return skip(reason, parsed.error.message, { cause: parsed.error, entryName })
	}

	return { ok: true, value: { entryName, manifest: parsed.value } }
}
