/**
 * Manifest fields read from `manifest.json` / `metadata.json` inside a
 * release asset. Every field is optional; absent and wrongly shaped values
 * are left undefined and filled with defaults when the package is built.
 */
export interface ManifestInfo {
	identifier?: string
	name?: string
	type?: string
	description?: string
	descriptionFull?: string
	license?: string
	author?: Record<string, unknown>
	maintainer?: Record<string, unknown>
	resources?: Record<string, unknown>
	version?: string
	status?: string
	kicadVersion?: string
	/** Raw value; validated by `coerceInstallSize` when a version is built. */
	installSize?: unknown
}

export const MANIFEST_FILENAMES = ["manifest.json", "metadata.json"] as const
