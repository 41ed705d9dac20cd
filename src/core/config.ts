import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { defu } from 'defu'
import type { GitRepository, ResolvedConfig, TaglogConfig } from '../types.ts'
import { ConfigError } from '../utils/errors.ts'
import { fileExists, readFile } from '../utils/fs.ts'

const CONFIG_FILES = [
	'taglog.config.ts',
	'taglog.config.js',
	'taglog.config.json',
	'.taglogrc',
	'.taglogrc.json',
]

const DEFAULT_CONFIG: ResolvedConfig = {
	format: '  * %s',
	mergeFormat: '  * %s%n%w(64,4,4)%b',
	logOptions: [],
	untaggedLabel: 'n.n.n',
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

/**
 * Keep only the known, well-typed fields of a user config
 */
export function validateConfig(value: unknown, source: string): TaglogConfig {
	if (!isRecord(value)) {
		throw new ConfigError(`${source} must export an object`)
	}

	const config: TaglogConfig = {}
	for (const key of ['format', 'mergeFormat', 'untaggedLabel', 'file'] as const) {
		const field = value[key]
		if (field === undefined) continue
		if (typeof field !== 'string') {
			throw new ConfigError(`${source}: "${key}" must be a string`)
		}
		config[key] = field
	}

	const logOptions = value.logOptions
	if (logOptions !== undefined) {
		if (!isStringArray(logOptions)) {
			throw new ConfigError(`${source}: "logOptions" must be an array of strings`)
		}
		config.logOptions = logOptions
	}

	return config
}

/**
 * Split a log options string (`--first-parent --no-decorate`) into arguments
 */
export function splitLogOptions(value: string): string[] {
	return value.split(/\s+/).filter(Boolean)
}

/**
 * Load config from file
 */
export async function loadConfigFile(cwd: string): Promise<TaglogConfig> {
	for (const configFile of CONFIG_FILES) {
		const configPath = join(cwd, configFile)
		if (!fileExists(configPath)) continue

		if (configFile.endsWith('.ts') || configFile.endsWith('.js')) {
			let module: unknown
			try {
				module = await import(pathToFileURL(configPath).href)
			} catch (error) {
				throw new ConfigError(
					`Failed to load ${configFile}: ${error instanceof Error ? error.message : String(error)}`
				)
			}
			const userConfig = isRecord(module) && 'default' in module ? module.default : module
			return validateConfig(userConfig, configFile)
		}

		const content = readFile(configPath) ?? ''
		let userConfig: unknown
		try {
			userConfig = JSON.parse(content)
		} catch {
			throw new ConfigError(`Failed to parse ${configFile}`, 'The file must contain valid JSON')
		}
		return validateConfig(userConfig, configFile)
	}

	return {}
}

/**
 * Formats and log options set through `git config changelog.*`
 */
export async function loadGitConfig(repository: GitRepository): Promise<TaglogConfig> {
	const config: TaglogConfig = {}

	const format = await repository.readConfig('changelog.format')
	if (format) config.format = format

	const mergeFormat = await repository.readConfig('changelog.mergeformat')
	if (mergeFormat) config.mergeFormat = mergeFormat

	const opts = await repository.readConfig('changelog.opts')
	if (opts) config.logOptions = splitLogOptions(opts)

	return config
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): TaglogConfig {
	const config: TaglogConfig = {}
	if (env.TAGLOG_FORMAT) config.format = env.TAGLOG_FORMAT
	if (env.TAGLOG_MERGE_FORMAT) config.mergeFormat = env.TAGLOG_MERGE_FORMAT
	if (env.TAGLOG_LOG_OPTS) config.logOptions = splitLogOptions(env.TAGLOG_LOG_OPTS)
	return config
}

/**
 * Load the run configuration, once: environment over git config over the
 * config file over defaults
 */
export async function loadConfig(
	repository: GitRepository,
	env: NodeJS.ProcessEnv = process.env
): Promise<ResolvedConfig> {
	const fileConfig = await loadConfigFile(repository.root)
	const gitConfig = await loadGitConfig(repository)
	const envConfig = loadEnvConfig(env)

	const merged: TaglogConfig = defu(envConfig, gitConfig, fileConfig)

	return {
		format: merged.format ?? DEFAULT_CONFIG.format,
		mergeFormat: merged.mergeFormat ?? DEFAULT_CONFIG.mergeFormat,
		// defu concatenates arrays; log options replace each other instead
		logOptions:
			envConfig.logOptions ?? gitConfig.logOptions ?? fileConfig.logOptions ?? [...DEFAULT_CONFIG.logOptions],
		untaggedLabel: merged.untaggedLabel ?? DEFAULT_CONFIG.untaggedLabel,
		file: merged.file,
	}
}

/**
 * Get default config
 */
export function getDefaultConfig(): ResolvedConfig {
	return { ...DEFAULT_CONFIG, logOptions: [] }
}

/**
 * Define config helper for TypeScript support
 */
export function defineConfig(config: TaglogConfig): TaglogConfig {
	return config
}
