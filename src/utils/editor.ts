import consola from 'consola'
import { $ } from 'zx'
import { TaglogError } from './errors.ts'

/**
 * Split an editor setting such as `code --wait` into program and arguments
 */
export function parseEditorCommand(command: string): string[] {
	return command.trim().split(/\s+/).filter(Boolean)
}

/**
 * Open `file` in the user's editor and wait for it to exit
 */
export async function openInEditor(command: string, file: string, cwd: string): Promise<void> {
	const [program, ...args] = parseEditorCommand(command)
	if (!program) return

	consola.debug(`Opening ${file} with ${program}`)
	const output = await $({ cwd, stdio: 'inherit' })`${program} ${args} ${file}`.nothrow()
	if (output.exitCode !== 0) {
		throw new TaglogError(`Editor exited with code ${output.exitCode}`, 'EDITOR_ERROR')
	}
}
