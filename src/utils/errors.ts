export function formatError(error: unknown): string {
	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}

export function toRawError(error: unknown): Error | undefined {
	return error instanceof Error ? error : undefined
}
