#!/usr/bin/env node
import consola from 'consola'
import { defineCommand, runMain, showUsage } from 'citty'
import pkg from '../package.json'
import { runChangelog } from './commands/changelog.ts'
import { isHelpRequest } from './utils/args.ts'
import { formatError } from './utils/errors.ts'

function optionalString(value: unknown): string | undefined {
	return typeof value === 'string' && value !== '' ? value : undefined
}

const taglog = defineCommand({
	meta: {
		name: 'taglog',
		version: pkg.version,
		description: pkg.description,
	},
	args: {
		file: {
			type: 'positional',
			description: 'Changelog file to write (default: existing change/history file, or History.md)',
			required: false,
		},
		all: {
			type: 'boolean',
			description: 'Render the whole history as one section',
			alias: 'a',
		},
		list: {
			type: 'boolean',
			description: 'Plain list without section titles',
			alias: 'l',
		},
		tag: {
			type: 'string',
			description: 'Label of the section holding unreleased commits',
			alias: 't',
		},
		'final-tag': {
			type: 'string',
			description: 'Newest tag to include',
			alias: 'f',
		},
		'start-tag': {
			type: 'string',
			description: 'Oldest tag to include',
			alias: 's',
		},
		'start-commit': {
			type: 'string',
			description: 'Oldest commit to include (cannot be combined with --start-tag)',
		},
		merges: {
			type: 'boolean',
			description: 'Include merge commits (--no-merges to exclude them)',
			default: true,
		},
		'exclude-merges': {
			type: 'boolean',
			description: 'Exclude merge commits',
			alias: 'n',
		},
		'merges-only': {
			type: 'boolean',
			description: 'Only list merge commits, with their body',
			alias: 'm',
		},
		'prune-old': {
			type: 'boolean',
			description: 'Replace the existing changelog instead of appending it',
			alias: 'p',
		},
		stdout: {
			type: 'boolean',
			description: 'Write to stdout instead of the changelog file',
			alias: 'x',
		},
		editor: {
			type: 'boolean',
			description: 'Open the changelog in the git editor (--no-editor to skip)',
			default: true,
		},
	},
	run: async ({ args }) => {
		const controller = new AbortController()
		const onInterrupt = () => controller.abort()
		process.once('SIGINT', onInterrupt)

		try {
			await runChangelog({
				file: optionalString(args.file),
				all: Boolean(args.all),
				list: Boolean(args.list),
				tag: optionalString(args.tag),
				finalTag: optionalString(args['final-tag']),
				startTag: optionalString(args['start-tag']),
				startCommit: optionalString(args['start-commit']),
				noMerges: args.merges === false || Boolean(args['exclude-merges']),
				mergesOnly: Boolean(args['merges-only']),
				prune: Boolean(args['prune-old']),
				stdout: Boolean(args.stdout),
				editor: args.editor !== false,
				signal: controller.signal,
			})
		} catch (error) {
			consola.error(formatError(error))
			process.exit(1)
		} finally {
			process.off('SIGINT', onInterrupt)
		}
	},
})

// Help exits with 1
if (isHelpRequest(process.argv.slice(2))) {
	await showUsage(taglog)
	process.exit(1)
}

await runMain(taglog)
