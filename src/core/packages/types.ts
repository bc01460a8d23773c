/**
 * Wire shapes of `packages.json`. Property order in these types is the
 * order objects are built in, and therefore the serialized order.
 */

export const PACKAGE_SCHEMA_URL = "https://go.kicad.org/pcm/schemas/v1"

export const DEFAULT_PACKAGE_TYPE = "library"
export const DEFAULT_VERSION_STATUS = "testing"
export const DEFAULT_KICAD_VERSION = "8.0"
export const FALLBACK_VERSION = "0.0.0"

export type PackageVersion = {
	version: string
	download_url: string
	download_sha256: string
	download_size: number
	status: string
	kicad_version: string
	install_size?: number
}

export type IndexPackage = {
	$schema: string
	identifier: string
	name: string
	type: string
	description: string
	description_full?: string
	license: string
	author?: Record<string, unknown>
	maintainer?: Record<string, unknown>
	resources: Record<string, unknown>
	versions: PackageVersion[]
}

/** The downloaded bytes of one release asset, as measured on receipt. */
export interface AssetDownload {
	url: string
	sha256: string
	size: number
}

export type MergeOutcome = "created" | "added" | "duplicate"

export interface MergeResult {
	pkg: IndexPackage
	outcome: MergeOutcome
	version: string
}
