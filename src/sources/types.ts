import type { LocalAssetLookup } from "@/core/io/fs"
import type { IndexError, Result } from "@/core/types/error"

export interface SourceContext {
	token?: string
	/** Root of the per-package asset folders (`assets/`). */
	assetsDir: string
	assetLookup?: LocalAssetLookup
}

/**
 * Entries a source contributes to `packages.json`. Release scans yield
 * `IndexPackage` records; mirrors yield whatever the upstream index holds.
 */
export type SourcePackages = Result<unknown[], IndexError>

