import type { ZodError } from "zod"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: string
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: string
	  })

export interface ParseError extends BaseError {
	type: "parse"
	source: string
	path?: string
}

export interface IoError extends BaseError {
	type: "io"
	path: string
	operation: string
}

export interface NetworkError extends BaseError {
	type: "network"
	source: string
	status?: number
	retryable?: boolean
}

export interface NotFoundError extends BaseError {
	type: "not_found"
	target: string
	status?: number
}

/** Wraps the fatal error that stopped one configured source. */
export interface SourceError extends BaseError {
	type: "source"
	sourceId: string
}

export type IndexError =
	| ValidationError
	| ParseError
	| IoError
	| NetworkError
	| NotFoundError
	| SourceError

export type Result<T, E extends BaseError = IndexError> =
	| { ok: true; value: T }
	| { ok: false; error: E }
