import consola from 'consola'
import { $ } from 'zx'
import type { GitRepository } from '../types.ts'
import { GitError } from './errors.ts'

$.quiet = true

interface GitResult {
	exitCode: number | null
	stdout: string
	stderr: string
}

// Cached per working directory (cleared per CLI invocation)
const cachedGitRoots = new Map<string, string>()

async function runGit(cwd: string, args: string[]): Promise<GitResult> {
	consola.debug(`git ${args.join(' ')}`)
	const output = await $({ cwd })`git ${args}`.nothrow()
	return { exitCode: output.exitCode, stdout: output.stdout, stderr: output.stderr }
}

async function gitText(cwd: string, args: string[]): Promise<string> {
	const result = await runGit(cwd, args)
	if (result.exitCode !== 0) {
		throw new GitError(
			`git ${args.join(' ')} failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`
		)
	}
	return result.stdout
}

/**
 * Get the git root directory containing `cwd` (cached)
 */
export async function getGitRoot(cwd: string): Promise<string> {
	const cached = cachedGitRoots.get(cwd)
	if (cached !== undefined) return cached

	const result = await runGit(cwd, ['rev-parse', '--show-toplevel'])
	if (result.exitCode !== 0) {
		throw new GitError(`Not a git repository: ${cwd}`, 'Run taglog inside a git work tree')
	}
	const root = result.stdout.trim()
	cachedGitRoots.set(cwd, root)
	return root
}

/**
 * Clear git root cache
 */
export function clearGitRootCache(): void {
	cachedGitRoots.clear()
}

/**
 * Tag log: one `hash<TAB>date<TAB>decorations` line per decorated commit, newest first
 */
export async function readTagLog(cwd: string): Promise<string> {
	// A repository without commits has no tags either
	const head = await runGit(cwd, ['rev-parse', '--verify', '--quiet', 'HEAD'])
	if (head.exitCode !== 0) return ''

	const result = await runGit(cwd, [
		'log',
		'--tags',
		'--simplify-by-decoration',
		'--decorate=short',
		'--date=short',
		'--pretty=format:%h%x09%ad%x09%d',
	])
	if (result.exitCode === 0) return result.stdout
	throw new GitError(`Could not read tags: ${result.stderr.trim()}`)
}

/**
 * `git describe --contains` names commits relative to a tag (v1.0.0~2^2);
 * keep the tag part only
 */
export function stripDescribeSuffix(name: string): string {
	return name.replace(/[~^].*$/, '')
}

/**
 * Nearest tag reachable from a ref
 */
export async function getNearestTag(cwd: string, ref: string): Promise<string | null> {
	const result = await runGit(cwd, ['describe', '--tags', '--abbrev=0', ref])
	if (result.exitCode !== 0) return null
	return result.stdout.trim() || null
}

/**
 * Nearest tag containing a commit
 */
export async function getContainingTag(cwd: string, ref: string): Promise<string | null> {
	const result = await runGit(cwd, ['describe', '--tags', '--contains', ref])
	if (result.exitCode !== 0) return null
	return stripDescribeSuffix(result.stdout.trim()) || null
}

export async function commitExists(cwd: string, ref: string): Promise<boolean> {
	const result = await runGit(cwd, ['rev-parse', '--verify', '--quiet', `${ref}^{commit}`])
	return result.exitCode === 0
}

/**
 * Read a git config value; null when the key is unset
 */
export async function getGitConfig(cwd: string, key: string): Promise<string | null> {
	const result = await runGit(cwd, ['config', '--get', key])
	// git config exits with 1 for a missing key
	if (result.exitCode === 1) return null
	if (result.exitCode !== 0) {
		throw new GitError(`Could not read git config ${key}: ${result.stderr.trim()}`)
	}
	// Formats keep their leading indentation
	return result.stdout.replace(/\r?\n$/, '') || null
}

export async function getGitEditor(cwd: string): Promise<string | null> {
	const result = await runGit(cwd, ['var', 'GIT_EDITOR'])
	if (result.exitCode !== 0) return null
	return result.stdout.trim() || null
}

export function createGitRepository(root: string): GitRepository {
	return {
		root,
		readTagLog: () => readTagLog(root),
		nearestTag: (ref) => getNearestTag(root, ref),
		containingTag: (ref) => getContainingTag(root, ref),
		commitExists: (ref) => commitExists(root, ref),
		readConfig: (key) => getGitConfig(root, key),
		log: (args) => gitText(root, ['log', ...args]),
		editor: () => getGitEditor(root),
	}
}
