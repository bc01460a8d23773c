import { consola } from "consola"
import { ZodError } from "zod"
import type { BaseError } from "@/core/types/error"

type PrintableError = BaseError

export function formatErrorChain(error: PrintableError): string {
	return formatErrorChainLines(error, 0).join("\n")
}

export function printError(error: PrintableError): void {
	consola.error(formatErrorChain(error))
	printRawErrorChain(error)
	process.exitCode = 1
}

function formatErrorChainLines(error: PrintableError, indent: number): string[] {
	const prefix = " ".repeat(indent)
	const detailParts = buildDetailParts(error)
	const details = detailParts.length ? ` (${detailParts.join(", ")})` : ""
	const lines = [`${prefix}[${error.type}] ${error.message}${details}`]

	const zodError = readZodError(error)
	if (zodError) {
		lines.push(`${prefix}  Zod issues:`)
		for (const issue of zodError.issues) {
			const pathLabel = issue.path.length > 0 ? issue.path.join(".") : "<root>"
			lines.push(`${prefix}  - ${pathLabel}: ${issue.message}`)
		}
	}

	if (error.cause) {
		lines.push(`${prefix}Caused by:`)
		lines.push(...formatErrorChainLines(error.cause, indent + 2))
	}

	return lines
}

function readZodError(error: PrintableError): ZodError | null {
	const value: unknown = Reflect.get(error, "zodError")
	return value instanceof ZodError ? value : null
}

function printRawErrorChain(error: PrintableError): void {
	if (error.rawError) {
		consola.error(error.rawError)
	}
	if (error.cause) {
		printRawErrorChain(error.cause)
	}
}

function buildDetailParts(error: PrintableError): string[] {
	const details: string[] = []
	for (const key of ["sourceId", "field", "path", "operation", "status", "source", "target"]) {
		const value: unknown = Reflect.get(error, key)
		if (typeof value === "string" || typeof value === "number") {
			details.push(`${key}=${value}`)
		}
	}
	return details
}
