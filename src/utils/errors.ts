/**
 * Base error class for taglog errors
 */
export class TaglogError extends Error {
	constructor(
		message: string,
		public readonly code: string,
		public readonly suggestion?: string
	) {
		super(message)
		this.name = 'TaglogError'
	}
}

/**
 * Git-related errors
 */
export class GitError extends TaglogError {
	constructor(message: string, suggestion?: string) {
		super(message, 'GIT_ERROR', suggestion)
		this.name = 'GitError'
	}
}

/**
 * Configuration errors (conflicting flags, unknown tags, unreadable config files)
 */
export class ConfigError extends TaglogError {
	constructor(message: string, suggestion?: string) {
		super(message, 'CONFIG_ERROR', suggestion)
		this.name = 'ConfigError'
	}
}

/**
 * A bound exists but cannot be mapped onto a tag
 */
export class ResolutionError extends TaglogError {
	constructor(message: string, suggestion?: string) {
		super(message, 'RESOLUTION_ERROR', suggestion)
		this.name = 'ResolutionError'
	}
}

export class CancelledError extends TaglogError {
	constructor(message = 'Changelog generation was cancelled') {
		super(message, 'CANCELLED')
		this.name = 'CancelledError'
	}
}

/**
 * Format error message with suggestion
 */
export function formatError(error: unknown): string {
	if (error instanceof TaglogError) {
		let message = `[${error.code}] ${error.message}`
		if (error.suggestion) {
			message += `\n\n💡 ${error.suggestion}`
		}
		return message
	}

	if (error instanceof Error) {
		return error.message
	}

	return String(error)
}
