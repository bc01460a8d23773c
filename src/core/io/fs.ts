import { readFile, rm, stat, writeFile } from "node:fs/promises"
import type { IoError, Result } from "@/core/types/error"
import { formatError, toRawError } from "@/utils/errors"

export type IoResult<T> = Result<T, IoError>

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>

export function ioFailure<T>(
	error: unknown,
	path: string,
	operation: string,
): IoResult<T> {
	return {
		error: {
			message: formatError(error),
			operation,
			path,
			rawError: toRawError(error),
			type: "io",
		},
		ok: false,
	}
}

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, targetPath, "stat")
	}
}

export async function pathExists(targetPath: string): Promise<boolean> {
	const stats = await safeStat(targetPath)
	return stats.ok && stats.value !== null
}

export interface LocalAssetLookup {
	isDirectory(target: string): Promise<boolean>
	isFile(target: string): Promise<boolean>
}

export const fsAssetLookup: LocalAssetLookup = {
	async isDirectory(target) {
		const stats = await safeStat(target)
		return stats.ok && stats.value !== null && stats.value.isDirectory()
	},
	async isFile(target) {
		const stats = await safeStat(target)
		return stats.ok && stats.value !== null && stats.value.isFile()
	},
}

export async function readFileUtf8(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(error, targetPath, "readFile")
	}
}

export async function readFileBytes(targetPath: string): Promise<IoResult<Buffer>> {
	try {
		const contents = await readFile(targetPath)
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(error, targetPath, "readFile")
	}
}

export async function writeFileBytes(
	targetPath: string,
	contents: string | Uint8Array,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "writeFile")
	}
}

export async function removeFile(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, targetPath, "rm")
	}
}

export function isNotFound(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	)
}
