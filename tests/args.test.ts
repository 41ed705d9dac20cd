import { describe, expect, it } from 'vitest'
import { isHelpRequest } from '../src/utils/args.ts'

describe('args utils', () => {
	describe('isHelpRequest', () => {
		it('should detect long and short help flags', () => {
			expect(isHelpRequest(['--help'])).toBe(true)
			expect(isHelpRequest(['-x', '-h'])).toBe(true)
		})

		it('should ignore other arguments', () => {
			expect(isHelpRequest([])).toBe(false)
			expect(isHelpRequest(['-x', 'CHANGES.md'])).toBe(false)
		})

		it('should stop at the end of options', () => {
			expect(isHelpRequest(['--', '--help'])).toBe(false)
		})
	})
})
