export type RenderMode = 'plain' | 'titled'

export type CommitFilter = 'all' | 'no-merges' | 'merges-only'

export interface TaglogConfig {
	/** git log pretty format for regular commits */
	format?: string
	/** git log pretty format used in merges-only mode */
	mergeFormat?: string
	/** Extra arguments passed to every git log query */
	logOptions?: string[]
	/** Title of the section holding commits newer than the latest tag */
	untaggedLabel?: string
	/** Changelog file path, relative to the repository root */
	file?: string
}

export type ResolvedConfig = Required<Omit<TaglogConfig, 'file'>> & Pick<TaglogConfig, 'file'>

/**
 * One line of the tag log, before decorations are interpreted
 */
export interface TagRecord {
	commitRef: string
	date: string
	decorations: string
}

export interface Tag {
	name: string
	/** Short hash of the tagged commit */
	commitRef: string
	/** Commit date, YYYY-MM-DD */
	date: string
}

/** Tags ordered newest first. Empty means the repository has no tags. */
export type TagIndex = readonly Tag[]

export type RangeBound =
	| { kind: 'none' }
	| { kind: 'tag'; name: string }
	| { kind: 'commit'; ref: string }

export interface BoundsRequest {
	start: RangeBound
	final: RangeBound
}

export interface ResolvedBounds {
	/** Oldest tag to render, always a member of the index */
	start: string | null
	/** Newest tag to render, always a member of the index */
	final: string | null
	startCommit: string | null
}

export type RangeExpression =
	| { kind: 'all' }
	| { kind: 'upTo'; ref: string }
	/** `from` is exclusive, `to` inclusive; a null `to` is the current tip */
	| { kind: 'between'; from: string; to: string | null }

export interface SectionBoundary {
	title: string
	date: string
	range: RangeExpression
	/** Commits newer than the latest tag; dropped when there are none */
	leading?: boolean
}

export interface Section {
	title: string
	date: string
	lines: string[]
}

export interface SelectOptions {
	listAll: boolean
	untaggedLabel: string
	/** Date printed beside the untagged label, YYYY-MM-DD */
	today: string
}

export interface CommitFetcher {
	fetch(range: RangeExpression): Promise<string[]>
}

/**
 * Repository lookups needed to turn user bounds into tags of the index
 */
export interface TagResolver {
	/** Nearest tag reachable from `ref`, or null */
	nearestTag(ref: string): Promise<string | null>
	/** Nearest tag that contains `ref`, or null */
	containingTag(ref: string): Promise<string | null>
	commitExists(ref: string): Promise<boolean>
}

/**
 * Everything taglog reads from git. The zx-backed implementation lives in
 * utils/git.ts; tests provide an in-memory one.
 */
export interface GitRepository extends TagResolver {
	root: string
	readTagLog(): Promise<string>
	readConfig(key: string): Promise<string | null>
	log(args: string[]): Promise<string>
	editor(): Promise<string | null>
}
