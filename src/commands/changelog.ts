import { isAbsolute, join } from 'node:path'
import consola from 'consola'
import pc from 'picocolors'
import {
	buildTagIndex,
	createBoundsRequest,
	createCommitFetcher,
	generateChangelog,
	loadConfig,
	parseTagLog,
	resolveBounds,
} from '../core/index.ts'
import type { BoundsRequest, CommitFilter, GitRepository, TagIndex } from '../types.ts'
import { openInEditor } from '../utils/editor.ts'
import { CancelledError, ConfigError } from '../utils/errors.ts'
import { DEFAULT_CHANGELOG_FILE, findChangelogFile, readFile, writeFileAtomic } from '../utils/fs.ts'
import { createGitRepository, getGitRoot } from '../utils/git.ts'

export interface ChangelogCommandOptions {
	cwd?: string
	/** Whole history as one section */
	all?: boolean
	/** Plain list instead of titled sections */
	list?: boolean
	/** Label of the unreleased section */
	tag?: string
	finalTag?: string
	startTag?: string
	startCommit?: string
	noMerges?: boolean
	mergesOnly?: boolean
	/** Drop the existing changelog instead of appending it */
	prune?: boolean
	stdout?: boolean
	/** Changelog file, relative to the repository root */
	file?: string
	/** Open the written file in the git editor (default: true) */
	editor?: boolean
	signal?: AbortSignal
	repository?: GitRepository
	now?: Date
	env?: NodeJS.ProcessEnv
	/** Receives the changelog in stdout mode */
	write?: (content: string) => void
}

export interface ChangelogResult {
	content: string
	/** Written file, or null in stdout mode */
	file: string | null
}

function commitFilter(options: ChangelogCommandOptions): CommitFilter {
	if (options.noMerges && options.mergesOnly) {
		throw new ConfigError('--no-merges and --merges-only are mutually exclusive')
	}
	if (options.mergesOnly) return 'merges-only'
	if (options.noMerges) return 'no-merges'
	return 'all'
}

/**
 * Without any bound, start at the latest tag reachable from HEAD so the
 * changelog shows the unreleased commits and the latest release
 */
async function defaultBounds(
	request: BoundsRequest,
	index: TagIndex,
	repository: GitRepository
): Promise<BoundsRequest> {
	if (request.start.kind !== 'none' || request.final.kind !== 'none' || index.length === 0) {
		return request
	}
	const latest = await repository.nearestTag('HEAD')
	if (!latest || !index.some((tag) => tag.name === latest)) return request
	return { ...request, start: { kind: 'tag', name: latest } }
}

function resolveChangelogPath(root: string, file: string | undefined): string {
	const name = file ?? findChangelogFile(root) ?? DEFAULT_CHANGELOG_FILE
	return isAbsolute(name) ? name : join(root, name)
}

export async function runChangelog(
	options: ChangelogCommandOptions = {}
): Promise<ChangelogResult> {
	// Flag conflicts are reported before git is queried
	const request = createBoundsRequest(options)
	const filter = commitFilter(options)

	// The changelog owns stdout; log lines go to stderr
	if (options.stdout) consola.options.stdout = process.stderr

	const cwd = options.cwd ?? process.cwd()
	const repository = options.repository ?? createGitRepository(await getGitRoot(cwd))
	const config = await loadConfig(repository, options.env)

	const index = buildTagIndex(parseTagLog(await repository.readTagLog()))
	consola.debug(`Found ${index.length} tags`)

	const bounds = await resolveBounds(
		index,
		options.all ? request : await defaultBounds(request, index, repository),
		repository
	)

	const fetcher = createCommitFetcher(repository, { ...config, filter })
	const target = resolveChangelogPath(repository.root, options.file ?? config.file)
	const previous = options.prune ? null : readFile(target)

	const content = await generateChangelog(
		index,
		bounds,
		fetcher,
		{
			listAll: Boolean(options.all),
			untaggedLabel: options.tag ?? config.untaggedLabel,
			today: (options.now ?? new Date()).toISOString().split('T')[0] ?? '',
			mode: options.list ? 'plain' : 'titled',
			signal: options.signal,
		},
		previous
	)

	if (options.signal?.aborted) throw new CancelledError()

	if (options.stdout) {
		const write = options.write ?? ((text: string) => process.stdout.write(text))
		write(content)
		return { content, file: null }
	}

	writeFileAtomic(target, content)
	consola.success(`Changelog written to ${pc.cyan(target)}`)

	if (options.editor !== false) {
		const editor = await repository.editor()
		if (editor) await openInEditor(editor, target, repository.root)
	}

	return { content, file: target }
}
