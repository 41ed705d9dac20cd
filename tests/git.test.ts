import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdirSync, realpathSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { $ } from 'zx'
import { splitLogLines } from '../src/core/commits.ts'
import { buildTagIndex, parseTagLog } from '../src/core/tags.ts'
import { parseEditorCommand } from '../src/utils/editor.ts'
import {
	clearGitRootCache,
	commitExists,
	createGitRepository,
	getContainingTag,
	getGitConfig,
	getGitRoot,
	getNearestTag,
	readTagLog,
	stripDescribeSuffix,
} from '../src/utils/git.ts'

const TEST_DIR = join(tmpdir(), 'taglog-git-test')

async function git(args: string[], date = '2024-01-01 12:00:00 +0000') {
	const env = { ...process.env, GIT_AUTHOR_DATE: date, GIT_COMMITTER_DATE: date }
	const output = await $({ cwd: TEST_DIR, env, quiet: true })`git ${args}`
	return output.stdout.trim()
}

async function commit(message: string, date: string) {
	await git(
		[
			'-c',
			'user.name=Test',
			'-c',
			'user.email=test@example.com',
			'-c',
			'commit.gpgsign=false',
			'commit',
			'--allow-empty',
			'--no-verify',
			'-q',
			'-m',
			message,
		],
		date
	)
	return git(['rev-parse', 'HEAD'])
}

describe('git utils', () => {
	beforeEach(async () => {
		clearGitRootCache()
		rmSync(TEST_DIR, { recursive: true, force: true })
		mkdirSync(TEST_DIR, { recursive: true })
		await git(['init', '-q'])
	})

	afterEach(() => {
		rmSync(TEST_DIR, { recursive: true, force: true })
	})

	describe('empty repository', () => {
		it('should read no tags', async () => {
			expect(await readTagLog(TEST_DIR)).toBe('')
		})

		it('should find no nearest tag', async () => {
			expect(await getNearestTag(TEST_DIR, 'HEAD')).toBe(null)
		})
	})

	describe('tagged repository', () => {
		let first = ''

		beforeEach(async () => {
			first = await commit('Initial commit', '2024-01-01 12:00:00 +0000')
			await git(['tag', 'v0.9.0'])
			await commit('Release 1.0', '2024-02-01 12:00:00 +0000')
			await git(['tag', 'v1.0.0'])
			await git(['tag', 'v1.0.0-rc.1'])
			await git(['branch', 'release-1.0'])
			await commit('Add search', '2024-03-01 12:00:00 +0000')
		})

		it('should list each tagged commit once, newest first', async () => {
			const index = buildTagIndex(parseTagLog(await readTagLog(TEST_DIR)))

			expect(index).toHaveLength(2)
			expect(['v1.0.0', 'v1.0.0-rc.1']).toContain(index[0]?.name)
			expect(index[0]?.date).toBe('2024-02-01')
			expect(index[1]?.name).toBe('v0.9.0')
			expect(index[1]?.date).toBe('2024-01-01')
		})

		it('should find the nearest reachable tag', async () => {
			expect(await getNearestTag(TEST_DIR, 'HEAD~2')).toBe('v0.9.0')
			expect(await getNearestTag(TEST_DIR, 'no-such-ref')).toBe(null)
		})

		it('should find the tag containing a commit', async () => {
			expect(await getContainingTag(TEST_DIR, first)).toBe('v0.9.0')
			expect(await getContainingTag(TEST_DIR, 'HEAD')).toBe(null)
		})

		it('should check that commits exist', async () => {
			expect(await commitExists(TEST_DIR, first)).toBe(true)
			expect(await commitExists(TEST_DIR, 'v0.9.0')).toBe(true)
			expect(await commitExists(TEST_DIR, 'no-such-ref')).toBe(false)
		})

		it('should read git config values', async () => {
			expect(await getGitConfig(TEST_DIR, 'changelog.format')).toBe(null)

			await git(['config', 'changelog.format', '  * %s (%an)'])

			expect(await getGitConfig(TEST_DIR, 'changelog.format')).toBe('  * %s (%an)')
		})

		it('should resolve the repository root from a subdirectory', async () => {
			mkdirSync(join(TEST_DIR, 'docs'))

			expect(realpathSync(await getGitRoot(join(TEST_DIR, 'docs')))).toBe(realpathSync(TEST_DIR))
		})

		it('should run git log through the repository', async () => {
			const repository = createGitRepository(TEST_DIR)

			const output = await repository.log(['--pretty=format:%s', 'v0.9.0..'])

			expect(splitLogLines(output)).toEqual(['Add search', 'Release 1.0'])
			expect(await repository.nearestTag('HEAD~2')).toBe('v0.9.0')
		})
	})

	describe('stripDescribeSuffix', () => {
		it('should keep a bare tag name', () => {
			expect(stripDescribeSuffix('v1.0.0')).toBe('v1.0.0')
		})

		it('should drop ancestry suffixes', () => {
			expect(stripDescribeSuffix('v1.0.0~3')).toBe('v1.0.0')
			expect(stripDescribeSuffix('v1.0.0^0')).toBe('v1.0.0')
			expect(stripDescribeSuffix('release-2024~2^2~1')).toBe('release-2024')
		})
	})

	describe('parseEditorCommand', () => {
		it('should split the program from its arguments', () => {
			expect(parseEditorCommand('code --wait')).toEqual(['code', '--wait'])
			expect(parseEditorCommand('  vim ')).toEqual(['vim'])
		})

		it('should return nothing for an empty setting', () => {
			expect(parseEditorCommand('')).toEqual([])
		})
	})
})
