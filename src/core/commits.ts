import type { CommitFetcher, CommitFilter, GitRepository, RangeExpression, ResolvedConfig } from '../types.ts'

export interface CommitFetcherOptions extends Pick<ResolvedConfig, 'format' | 'mergeFormat' | 'logOptions'> {
	filter: CommitFilter
}

/**
 * Revision arguments for a range expression
 */
export function rangeArgs(range: RangeExpression): string[] {
	switch (range.kind) {
		case 'all':
			return []
		case 'upTo':
			return [range.ref]
		case 'between':
			return [`${range.from}..${range.to ?? ''}`]
	}
}

/**
 * git log arguments (without the `log` subcommand) for one section
 */
export function buildLogArgs(range: RangeExpression, options: CommitFetcherOptions): string[] {
	const args = [...options.logOptions]

	if (options.filter === 'no-merges') args.push('--no-merges')
	if (options.filter === 'merges-only') args.push('--merges')

	const format = options.filter === 'merges-only' ? options.mergeFormat : options.format
	args.push(`--pretty=format:${format}`)

	return [...args, ...rangeArgs(range)]
}

/**
 * Split log output into lines, dropping the trailing blank ones
 */
export function splitLogLines(output: string): string[] {
	const lines = output.split('\n')
	while (lines.length > 0 && !lines[lines.length - 1]?.trim()) {
		lines.pop()
	}
	return lines
}

export function createCommitFetcher(
	repository: Pick<GitRepository, 'log'>,
	options: CommitFetcherOptions
): CommitFetcher {
	return {
		async fetch(range) {
			const output = await repository.log(buildLogArgs(range, options))
			return splitLogLines(output)
		},
	}
}
