const REGEXP_SPECIAL = /[.*+?^${}()|[\]\\/]/

/**
 * Convert an asset glob into an anchored, case-sensitive expression.
 * Only `*` (any run of characters) and `?` (any single code point) are
 * wildcards; everything else matches literally.
 */
export function globToRegExp(pattern: string): RegExp {
	let source = ""
	for (const char of pattern) {
		if (char === "*") {
			source += ".*"
		} else if (char === "?") {
			source += "."
		} else if (REGEXP_SPECIAL.test(char)) {
			source += `\\${char}`
		} else {
			source += char
		}
	}
	return new RegExp(`^${source}$`, "su")
}

export function matchesGlob(pattern: string, name: string): boolean {
	return globToRegExp(pattern).test(name)
}
