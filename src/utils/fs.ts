import { existsSync, readFileSync, readdirSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'

export const DEFAULT_CHANGELOG_FILE = 'History.md'

const CHANGELOG_NAME = /change|history/i

export function fileExists(path: string): boolean {
	return existsSync(path)
}

export function readFile(path: string): string | null {
	if (!existsSync(path)) return null
	return readFileSync(path, 'utf-8')
}

/**
 * Find an existing changelog in `dir`: the first file, by name, that mentions
 * "change" or "history"
 */
export function findChangelogFile(dir: string): string | null {
	if (!existsSync(dir)) return null

	const candidates = readdirSync(dir, { withFileTypes: true })
		.filter((entry) => entry.isFile() && CHANGELOG_NAME.test(entry.name))
		.map((entry) => entry.name)
		.sort()

	return candidates[0] ?? null
}

/**
 * Write through a sibling temporary file so the target is either the old
 * content or the new one, never a partial write
 */
export function writeFileAtomic(path: string, content: string): void {
	const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
	try {
		writeFileSync(tmpPath, content, 'utf-8')
		renameSync(tmpPath, path)
	} finally {
		rmSync(tmpPath, { force: true })
	}
}
