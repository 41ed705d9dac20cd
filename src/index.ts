// Types
export type {
	RenderMode,
	CommitFilter,
	TaglogConfig,
	ResolvedConfig,
	TagRecord,
	Tag,
	TagIndex,
	RangeBound,
	BoundsRequest,
	ResolvedBounds,
	RangeExpression,
	SectionBoundary,
	Section,
	SelectOptions,
	CommitFetcher,
	TagResolver,
	GitRepository,
} from './types.ts'

// Config
export { defineConfig, loadConfig, getDefaultConfig } from './core/config.ts'

// Core functionality
export { parseTagLog, extractTagName, buildTagIndex } from './core/tags.ts'
export { resolveBounds, createBoundsRequest, selectRanges } from './core/range.ts'
export { renderSection, formatHeading, underline, normalizeBullet } from './core/render.ts'
export { createCommitFetcher, buildLogArgs } from './core/commits.ts'
export {
	renderSections,
	assembleChangelog,
	generateChangelog,
	type ChangelogOptions,
} from './core/changelog.ts'

// Commands (for programmatic use)
export {
	runChangelog,
	type ChangelogCommandOptions,
	type ChangelogResult,
} from './commands/changelog.ts'

// Git adapter
export { createGitRepository } from './utils/git.ts'

export {
	TaglogError,
	GitError,
	ConfigError,
	ResolutionError,
	CancelledError,
	formatError,
} from './utils/errors.ts'
