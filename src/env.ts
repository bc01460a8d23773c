import fs from "node:fs"
import path from "node:path"
import dotenv from "dotenv"
import { z } from "zod"
import { getProjectDir } from "@/paths"

function findEnvFile(): string | undefined {
	const candidates = [
		path.resolve(getProjectDir(), ".env"),
		path.resolve(process.cwd(), ".env"),
	]

	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate
		}
	}

	return undefined
}

const envPath = findEnvFile()
const dotenvResult = envPath ? dotenv.config({ path: envPath }) : { parsed: {} }

const str = () => z.string().trim().min(1)

// CI runners export unset secrets as empty strings.
const blankAsUnset = (value: unknown) =>
	typeof value === "string" && value.trim().length === 0 ? undefined : value

export const schema = z.object({
	GH_TOKEN: z.preprocess(blankAsUnset, str().optional()),
	GITHUB_REPOSITORY: z.preprocess(blankAsUnset, str().optional()),
	GITHUB_TOKEN: z.preprocess(blankAsUnset, str().optional()),
	PCM_BRANCH: z.preprocess(blankAsUnset, str().default("main")),
})

const mergedEnv = {
	...(dotenvResult.parsed ?? {}),
	...process.env,
}

export const env = schema.parse(mergedEnv)

/** Either accepted token variable; GITHUB_TOKEN wins when both are set. */
export function githubToken(): string | undefined {
	return env.GITHUB_TOKEN ?? env.GH_TOKEN
}
