import type { Tag, TagIndex, TagRecord } from '../types.ts'

/**
 * Parse the tag log (`%h<TAB>%ad<TAB>%d` per line) into raw records
 */
export function parseTagLog(raw: string): TagRecord[] {
	const records: TagRecord[] = []

	for (const line of raw.split('\n')) {
		if (!line.trim()) continue
		const [commitRef = '', date = '', ...rest] = line.split('\t')
		records.push({
			commitRef: commitRef.trim(),
			date: date.trim(),
			decorations: rest.join('\t').trim(),
		})
	}

	return records
}

/**
 * First tag named in a decoration string, ignoring HEAD, branches and remotes
 *
 * `(HEAD -> main, tag: v1.2.0, tag: stable, origin/main)` → `v1.2.0`
 */
export function extractTagName(decorations: string): string | null {
	const inner = decorations.trim().replace(/^\(/, '').replace(/\)$/, '')

	for (const ref of inner.split(', ')) {
		// "HEAD" and "HEAD -> branch" mark the current tip, not a tag
		if (ref.startsWith('tag: ')) {
			const name = ref.slice('tag: '.length).trim()
			if (name) return name
		}
	}

	return null
}

/**
 * Build the tag index from records ordered newest first by the history walk.
 * Records without a tag are skipped; a tag name seen before is not added again.
 */
export function buildTagIndex(records: Iterable<TagRecord>): TagIndex {
	const tags: Tag[] = []
	const seen = new Set<string>()

	for (const record of records) {
		const name = extractTagName(record.decorations)
		if (!name || seen.has(name)) continue

		seen.add(name)
		tags.push({ name, commitRef: record.commitRef, date: record.date })
	}

	return tags
}

export function findTag(index: TagIndex, name: string): Tag | undefined {
	return index.find((tag) => tag.name === name)
}

export function tagPosition(index: TagIndex, name: string): number {
	return index.findIndex((tag) => tag.name === name)
}
