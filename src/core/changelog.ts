import consola from 'consola'
import type {
	CommitFetcher,
	RenderMode,
	ResolvedBounds,
	SelectOptions,
	TagIndex,
} from '../types.ts'
import { CancelledError } from '../utils/errors.ts'
import { selectRanges } from './range.ts'
import { renderSection } from './render.ts'

export interface ChangelogOptions extends SelectOptions {
	mode: RenderMode
	signal?: AbortSignal
}

/**
 * Fetch and render sections one at a time, newest first
 */
export async function* renderSections(
	index: TagIndex,
	bounds: ResolvedBounds,
	fetcher: CommitFetcher,
	options: ChangelogOptions
): AsyncGenerator<string, void, undefined> {
	for (const boundary of selectRanges(index, bounds, options)) {
		if (options.signal?.aborted) throw new CancelledError()

		consola.debug(`Section ${boundary.title}: ${JSON.stringify(boundary.range)}`)
		const lines = await fetcher.fetch(boundary.range)
		// Nothing since the latest tag
		if (boundary.leading && lines.length === 0) continue
		yield renderSection({ title: boundary.title, date: boundary.date, lines }, options.mode)
	}
}

/**
 * Join rendered sections and append the previous changelog, if any
 */
export function assembleChangelog(
	blocks: string[],
	mode: RenderMode,
	previous: string | null = null
): string {
	const parts = mode === 'plain' ? blocks.filter((block) => block.length > 0) : blocks
	let content = parts.join(mode === 'plain' ? '\n' : '\n\n')
	if (content) content += '\n'

	if (previous) {
		content = content ? `${content}\n${previous}` : previous
	}

	return content
}

/**
 * Generate the new part of a changelog
 */
export async function generateChangelog(
	index: TagIndex,
	bounds: ResolvedBounds,
	fetcher: CommitFetcher,
	options: ChangelogOptions,
	previous: string | null = null
): Promise<string> {
	const blocks: string[] = []
	for await (const block of renderSections(index, bounds, fetcher, options)) {
		blocks.push(block)
	}
	return assembleChangelog(blocks, options.mode, previous)
}
