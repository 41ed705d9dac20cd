import { describe, expect, it } from 'vitest'
import { formatHeading, normalizeBullet, renderSection, underline } from '../src/core/render.ts'

describe('render', () => {
	const section = {
		title: 'v1.0.0',
		date: '2024-01-01',
		lines: ['  * Add export command', '  * Fix date parsing'],
	}

	describe('renderSection', () => {
		it('should render a titled block', () => {
			expect(renderSection(section, 'titled')).toBe(
				[
					'v1.0.0 / 2024-01-01',
					'===================',
					'',
					'  * Add export command',
					'  * Fix date parsing',
				].join('\n')
			)
		})

		it('should render plain lines without heading', () => {
			expect(renderSection(section, 'plain')).toBe('  * Add export command\n  * Fix date parsing')
		})

		it('should render only the heading of an empty titled section', () => {
			expect(renderSection({ ...section, lines: [] }, 'titled')).toBe(
				'v1.0.0 / 2024-01-01\n==================='
			)
		})

		it('should normalize doubled bullets', () => {
			const result = renderSection({ ...section, lines: ['  * * Merge branch fix'] }, 'plain')

			expect(result).toBe('  * Merge branch fix')
		})
	})

	describe('underline', () => {
		it('should match the heading length', () => {
			const heading = formatHeading('n.n.n', '2024-04-01')

			expect(heading).toBe('n.n.n / 2024-04-01')
			expect(underline(heading)).toHaveLength(heading.length)
		})

		it('should count characters, not UTF-16 units', () => {
			expect(underline('v1 🚀')).toBe('====')
		})
	})

	describe('normalizeBullet', () => {
		it('should leave single bullets and indented bodies alone', () => {
			expect(normalizeBullet('  * Add feature')).toBe('  * Add feature')
			expect(normalizeBullet('    * body bullet')).toBe('    * body bullet')
		})
	})
})
