import fs from "node:fs"
import path from "node:path"
import { fileURLToPath } from "node:url"

/**
 * Project root resolution.
 *
 * Output files (packages.json, repository.json, resources.zip, README.md)
 * and inputs (repos.yaml, assets/) live at the root of this package. The
 * root is found by walking up from this file to the package.json that
 * carries our package name, falling back to the working directory.
 */

const PACKAGE_NAME = "kicad-pcm-index"

export const CONFIG_FILENAME = "repos.yaml"
export const PACKAGES_FILENAME = "packages.json"
export const REPOSITORY_FILENAME = "repository.json"
export const RESOURCES_FILENAME = "resources.zip"
export const README_FILENAME = "README.md"
export const ASSETS_DIRNAME = "assets"

let _projectDir: string | null = null

function findPackageRoot(startDir: string): string | null {
	let currentDir = startDir

	for (let i = 0; i < 10; i++) {
		const pkgPath = path.join(currentDir, "package.json")

		if (fs.existsSync(pkgPath) && readPackageName(pkgPath) === PACKAGE_NAME) {
			return currentDir
		}

		const parentDir = path.dirname(currentDir)
		if (parentDir === currentDir) {
			break
		}
		currentDir = parentDir
	}

	return null
}

function readPackageName(pkgPath: string): string | null {
	try {
		const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"))
		if (typeof pkg === "object" && pkg !== null && "name" in pkg) {
			return typeof pkg.name === "string" ? pkg.name : null
		}
	} catch {
		// unreadable package.json, keep walking
	}
	return null
}

export function getProjectDir(): string {
	if (_projectDir !== null) {
		return _projectDir
	}

	const startDir = path.dirname(fileURLToPath(import.meta.url))
	_projectDir =
		findPackageRoot(startDir) ?? findPackageRoot(process.cwd()) ?? process.cwd()
	return _projectDir
}

export interface ProjectPaths {
	root: string
	config: string
	packages: string
	repository: string
	resources: string
	readme: string
	assets: string
}

/**
 * Resolve every input and output location under a project root.
 *
 * @example
 * const paths = resolveProjectPaths("/srv/pcm")
 * // paths.packages => "/srv/pcm/packages.json"
 */
export function resolveProjectPaths(root: string = getProjectDir()): ProjectPaths {
	const base = path.resolve(root)
	return {
		assets: path.join(base, ASSETS_DIRNAME),
		config: path.join(base, CONFIG_FILENAME),
		packages: path.join(base, PACKAGES_FILENAME),
		readme: path.join(base, README_FILENAME),
		repository: path.join(base, REPOSITORY_FILENAME),
		resources: path.join(base, RESOURCES_FILENAME),
		root: base,
	}
}
