import path from "node:path"
import { consola } from "consola"
import { buildResourceBundle } from "@/core/resources/pack"
import { resolveProjectPaths } from "@/paths"
import { formatError } from "@/utils/errors"

/**
 * Build resources.zip from assets/. A packing failure is reported as a
 * warning only; publishing goes on without the bundle.
 */
export async function resourcesCommand(options: { root?: string } = {}): Promise<void> {
	const paths = resolveProjectPaths(options.root)
	const bundleName = path.basename(paths.resources)

	try {
		const result = await buildResourceBundle(paths.assets, paths.resources)
		if (!result.ok) {
			consola.warn(`[resources] warning: ${result.error.message}`)
			return
		}

		const outcome = result.value
		switch (outcome.status) {
			case "built":
				consola.success(
					`Built ${bundleName} (${outcome.size} bytes) from ${outcome.packageCount} package folder(s).`,
				)
				return
			case "removed_stale":
				consola.info(
					outcome.reason === "no_assets_dir"
						? `Removed stale ${bundleName} (no assets/ found).`
						: `Removed stale ${bundleName} (assets/ empty).`,
				)
				return
			case "nothing_to_build":
				consola.info(
					outcome.reason === "no_assets_dir"
						? "No assets/ directory; nothing to build."
						: "assets/ has no package folders; nothing to build.",
				)
				return
		}
	} catch (error) {
		consola.warn(`[resources] warning: ${formatError(error)}`)
	}
}
