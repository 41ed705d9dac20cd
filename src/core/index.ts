export {
	loadConfig,
	loadConfigFile,
	loadGitConfig,
	loadEnvConfig,
	getDefaultConfig,
	defineConfig,
	validateConfig,
	splitLogOptions,
} from './config.ts'
export { parseTagLog, extractTagName, buildTagIndex, findTag, tagPosition } from './tags.ts'
export { resolveBounds, createBoundsRequest, selectRanges, NO_BOUND } from './range.ts'
export { renderSection, normalizeBullet, formatHeading, underline } from './render.ts'
export {
	createCommitFetcher,
	buildLogArgs,
	rangeArgs,
	splitLogLines,
	type CommitFetcherOptions,
} from './commits.ts'
export {
	renderSections,
	assembleChangelog,
	generateChangelog,
	type ChangelogOptions,
} from './changelog.ts'
