import type { RenderMode, Section } from '../types.ts'

/**
 * Some formats print their own bullet in front of the template's one
 * (`  * * subject`); collapse it to a single bullet
 */
export function normalizeBullet(line: string): string {
	return line.replace(/^ {2}\* \*/, '  *')
}

export function formatHeading(title: string, date: string): string {
	return `${title} / ${date}`
}

/**
 * `=` repeated once per character (code point) of `text`
 */
export function underline(text: string): string {
	return '='.repeat(Array.from(text).length)
}

/**
 * Render one section. The result has no trailing newline.
 */
export function renderSection(section: Section, mode: RenderMode): string {
	const body = section.lines.map(normalizeBullet).join('\n')
	if (mode === 'plain') return body

	const heading = formatHeading(section.title, section.date)
	const block = [heading, underline(heading)]
	if (body) block.push('', body)
	return block.join('\n')
}
