/**
 * Whether the command line asks for usage (`--help` or `-h` before any `--`)
 */
export function isHelpRequest(argv: string[]): boolean {
	for (const arg of argv) {
		if (arg === '--') return false
		if (arg === '--help' || arg === '-h') return true
	}
	return false
}
