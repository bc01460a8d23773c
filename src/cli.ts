#!/usr/bin/env node

import { Command } from "commander"
import { consola } from "consola"
import { buildCommand } from "@/commands/build"
import { printError } from "@/commands/outcome"
import { readmeCommand } from "@/commands/readme"
import { resourcesCommand } from "@/commands/resources"
import { sourceAddMirror, sourceAddRelease, sourceRemove } from "@/commands/source"
import { getProjectDir } from "@/paths"
import { formatError } from "@/utils/errors"

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("pcm-index")
		.description("Build a static KiCad PCM repository from GitHub releases and mirrors")
		.option("--root <dir>", "Project root holding repos.yaml and the output files")
		.option("--verbose", "Show debug output")
		.showHelpAfterError()
		.showSuggestionAfterError()
		.hook("preAction", () => {
			if (program.opts<{ verbose?: boolean }>().verbose) {
				consola.level = 4
			}
		})

	const root = (): string => program.opts<{ root?: string }>().root ?? getProjectDir()

	program
		.command("build")
		.description("Scan sources and write packages.json and repository.json")
		.action(async () => {
			const result = await buildCommand({ root: root() })
			if (!result.ok) {
				printError(result.error)
			}
		})

	program
		.command("readme")
		.description("Regenerate the package table in README.md")
		.action(async () => {
			const result = await readmeCommand({ root: root() })
			if (!result.ok) {
				printError(result.error)
			}
		})

	program
		.command("resources")
		.description("Pack assets/<identifier>/ folders into resources.zip")
		.action(async () => {
			await resourcesCommand({ root: root() })
		})

	const source = program.command("source").description("Edit the sources in repos.yaml")

	source
		.command("add-release")
		.description("Add a GitHub release-scan source")
		.argument("<owner/repo>", "GitHub repository")
		.argument("<asset_glob>", "Glob selecting release assets, e.g. '*.zip'")
		.argument("<only_latest>", "true to scan the newest release only")
		.action(async (repo: string, assetGlob: string, onlyLatest: string) => {
			const result = await sourceAddRelease(repo, assetGlob, onlyLatest, { root: root() })
			if (!result.ok) {
				printError(result.error)
			}
		})

	source
		.command("add-mirror")
		.description("Add a mirrored packages.json")
		.argument("<packages_json_url>", "URL of an existing package index")
		.action(async (url: string) => {
			const result = await sourceAddMirror(url, { root: root() })
			if (!result.ok) {
				printError(result.error)
			}
		})

	source
		.command("remove")
		.description("Remove every source with the given id")
		.argument("<id>", "Source id")
		.action(async (id: string) => {
			const result = await sourceRemove(id, { root: root() })
			if (!result.ok) {
				printError(result.error)
			}
		})

	if (process.argv.length <= 2) {
		program.outputHelp()
		process.exitCode = 1
		return
	}

	await program.parseAsync(process.argv)
}

main().catch((error) => {
	consola.error(formatError(error))
	process.exit(1)
})
