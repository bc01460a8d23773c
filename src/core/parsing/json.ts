import type { ParseError, Result } from "@/core/types/error"

type JsonAttempt = { ok: true; value: unknown } | { ok: false; message: string }

function tryParseJson(text: string): JsonAttempt {
	try {
		return { ok: true, value: JSON.parse(text) }
	} catch (error) {
		return { message: error instanceof Error ? error.message : String(error), ok: false }
	}
}

/**
 * Remove line and block comments and trailing commas before `}` or `]`.
 * String literals are copied through untouched, so URLs survive.
 */
export function stripJsonExtras(text: string): string {
	let output = ""
	let index = 0

	while (index < text.length) {
		const char = text[index]
		const next = text[index + 1]

		if (char === '"') {
			const end = findStringEnd(text, index)
			output += text.slice(index, end)
			index = end
			continue
		}

		if (char === "/" && next === "/") {
			const newline = text.indexOf("\n", index)
			index = newline === -1 ? text.length : newline
			continue
		}

		if (char === "/" && next === "*") {
			const close = text.indexOf("*/", index + 2)
			index = close === -1 ? text.length : close + 2
			continue
		}

		if (char === "," && closesAfterTrailingComma(text, index + 1)) {
			index += 1
			continue
		}

		output += char
		index += 1
	}

	return output
}

// Index just past the closing quote of the string starting at `start`.
function findStringEnd(text: string, start: number): number {
	let index = start + 1
	while (index < text.length) {
		const char = text[index]
		if (char === "\\") {
			index += 2
			continue
		}
		if (char === '"') {
			return index + 1
		}
		index += 1
	}
	return text.length
}

function closesAfterTrailingComma(text: string, from: number): boolean {
	let index = from
	while (index < text.length) {
		const char = text[index]
		if (char === "}" || char === "]") {
			return true
		}
		if (char === "/" && (text[index + 1] === "/" || text[index + 1] === "*")) {
			index = skipComment(text, index)
			continue
		}
		if (char === undefined || !/\s/.test(char)) {
			return false
		}
		index += 1
	}
	return false
}

function skipComment(text: string, start: number): number {
	if (text[start + 1] === "/") {
		const newline = text.indexOf("\n", start)
		return newline === -1 ? text.length : newline
	}
	const close = text.indexOf("*/", start + 2)
	return close === -1 ? text.length : close + 2
}

/**
 * Strict parse first; on failure strip comments and trailing commas and
 * parse exactly once more.
 */
export function parseJsonTolerant(
	text: string,
	source: string,
): Result<unknown, ParseError> {
	const contents = text.startsWith("\uFEFF") ? text.slice(1) : text

	const strict = tryParseJson(contents)
	if (strict.ok) {
		return strict
	}

	const relaxed = tryParseJson(stripJsonExtras(contents))
	if (relaxed.ok) {
		return relaxed
	}

	return {
		error: {
			message: `Invalid JSON in ${source}: ${relaxed.message} (strict parse: ${strict.message})`,
			source,
			type: "parse",
		},
		ok: false,
	}
}
