import consola from 'consola'
import type {
	BoundsRequest,
	RangeBound,
	RangeExpression,
	ResolvedBounds,
	SectionBoundary,
	SelectOptions,
	TagIndex,
	TagResolver,
} from '../types.ts'
import { ConfigError, ResolutionError } from '../utils/errors.ts'
import { findTag, tagPosition } from './tags.ts'

export const NO_BOUND: RangeBound = { kind: 'none' }

const ALL_HISTORY: RangeExpression = { kind: 'all' }

/**
 * Map a tag-form bound onto a tag of the index. A name that is not a tag
 * itself (a branch, a commit) resolves to the nearest tag reachable from it.
 */
async function resolveTagBound(
	index: TagIndex,
	ref: string,
	flag: string,
	resolver: TagResolver
): Promise<string> {
	if (findTag(index, ref)) return ref

	const nearest = await resolver.nearestTag(ref)
	if (!nearest) {
		throw new ConfigError(`Could not find the ${flag} "${ref}"`, 'Check the name with `git tag --list`')
	}
	if (!findTag(index, nearest)) {
		throw new ConfigError(`The ${flag} "${ref}" resolves to "${nearest}", which is not a release tag`)
	}
	return nearest
}

/**
 * Resolve user bounds against the index before anything is fetched
 */
export async function resolveBounds(
	index: TagIndex,
	request: BoundsRequest,
	resolver: TagResolver
): Promise<ResolvedBounds> {
	const { start, final } = request

	if (final.kind === 'commit') {
		throw new ConfigError('The final bound must be a tag')
	}

	let startTag: string | null = null
	let startCommit: string | null = null

	if (start.kind === 'tag') {
		startTag = await resolveTagBound(index, start.name, '--start-tag', resolver)
	} else if (start.kind === 'commit') {
		if (!(await resolver.commitExists(start.ref))) {
			throw new ConfigError(`Could not find the --start-commit "${start.ref}"`)
		}
		startCommit = start.ref
		const containing = await resolver.containingTag(start.ref)
		if (containing && !findTag(index, containing)) {
			throw new ConfigError(
				`The --start-commit "${start.ref}" is contained in "${containing}", which is not a release tag`
			)
		}
		startTag = containing
	}

	const finalTag =
		final.kind === 'tag' ? await resolveTagBound(index, final.name, '--final-tag', resolver) : null

	if (startCommit && !startTag && finalTag) {
		throw new ResolutionError(
			`No tag contains the --start-commit "${startCommit}"`,
			'Drop --final-tag to list every commit since the start commit'
		)
	}

	if (startTag && finalTag && tagPosition(index, finalTag) > tagPosition(index, startTag)) {
		throw new ConfigError(`--final-tag "${finalTag}" is older than the start tag "${startTag}"`)
	}

	return { start: startTag, final: finalTag, startCommit }
}

/**
 * Validate the flag combination and turn it into bounds
 */
export function createBoundsRequest(options: {
	startTag?: string
	startCommit?: string
	finalTag?: string
}): BoundsRequest {
	if (options.startTag && options.startCommit) {
		throw new ConfigError('--start-tag and --start-commit are mutually exclusive')
	}

	let start: RangeBound = NO_BOUND
	if (options.startTag) start = { kind: 'tag', name: options.startTag }
	else if (options.startCommit) start = { kind: 'commit', ref: options.startCommit }

	const final: RangeBound = options.finalTag ? { kind: 'tag', name: options.finalTag } : NO_BOUND

	return { start, final }
}

/**
 * Walk the tag index newest to oldest and yield one boundary per section.
 *
 * - the leading section covers commits newer than the latest tag and is
 *   only produced when no final tag is set; the renderer drops it when
 *   that range turns out empty
 * - with neither start nor final, the leading section is all there is
 * - a final tag skips everything newer than it
 * - each tag's section covers (older tag, tag]; the oldest tag's covers its
 *   whole history
 * - reaching the start tag ends the walk; with a start commit, that last
 *   section begins at the start commit instead of the older tag
 */
export function* selectRanges(
	index: TagIndex,
	bounds: ResolvedBounds,
	options: SelectOptions
): Generator<SectionBoundary, void, undefined> {
	const { start, final, startCommit } = bounds
	const untagged = { title: options.untaggedLabel, date: options.today }

	if (options.listAll) {
		yield { ...untagged, range: ALL_HISTORY }
		return
	}

	// A start commit that no tag contains: everything since it, no tag walk
	if (startCommit && !final && !start) {
		yield { ...untagged, range: { kind: 'between', from: `${startCommit}~`, to: null } }
		return
	}

	if (index.length === 0) {
		yield { ...untagged, range: ALL_HISTORY }
		return
	}

	let finalFound = false

	for (const [i, tag] of index.entries()) {
		const olderTag = index[i + 1] ?? null

		if (i === 0 && !final) {
			yield { ...untagged, range: { kind: 'between', from: tag.name, to: null }, leading: true }
		}

		if (!start && !final) return

		if (final && !finalFound) {
			if (tag.name !== final) continue
			finalFound = true
		}

		if (startCommit && tag.name === start) {
			consola.debug(`Start commit ${startCommit} ends at ${tag.name}`)
			yield {
				title: tag.name,
				date: tag.date,
				range: { kind: 'between', from: `${startCommit}~`, to: tag.name },
			}
			return
		}

		yield {
			title: tag.name,
			date: tag.date,
			range: olderTag
				? { kind: 'between', from: olderTag.name, to: tag.name }
				: { kind: 'upTo', ref: tag.name },
		}

		if (tag.name === start) return
	}
}
