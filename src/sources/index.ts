import type { Source } from "@/core/config/types"
import { importMirror } from "@/sources/mirror"
import { scanReleaseSource } from "@/sources/release-scan"
import type { SourceContext, SourcePackages } from "@/sources/types"

export function loadSource(source: Source, context: SourceContext): Promise<SourcePackages> {
	switch (source.mode) {
		case "release_scan":
			return scanReleaseSource(source, context)
		case "mirror_packages_json":
			return importMirror(source)
	}
}
