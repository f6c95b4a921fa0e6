import { describe, expect, it } from 'vitest'
import { MatchIndex } from './matchIndex'
import { resolveNearest } from './resolveNearest'
import { spans } from './testing/spans'
import type { CursorState } from './types'

const range = { topLine: 1, bottomLine: 40 }
const index = new MatchIndex(spans([1, 1, 4], [5, 3, 6], [5, 10, 13]))

const forward = (line: number, column: number): CursorState => ({
	line,
	column,
	searchForward: true,
})
const backward = (line: number, column: number): CursorState => ({
	line,
	column,
	searchForward: false,
})

describe('resolveNearest', () => {
	it('returns null for an empty match list', () => {
		expect(resolveNearest(new MatchIndex([]), forward(1, 1), range, null)).toBeNull()
	})

	it('reports offset 0 when the cursor is on the nearest match', () => {
		const nearest = resolveNearest(index, forward(1, 1), range, null)
		expect(nearest).toEqual({
			index: 0,
			rawOffset: 0,
			topLine: 1,
			botLine: 40,
			fold: null,
		})
		expect(resolveNearest(index, forward(5, 13), range, null)?.index).toBe(2)
		expect(resolveNearest(index, backward(1, 4), range, null)?.rawOffset).toBe(0)
	})

	it('picks the next match when searching forward', () => {
		const nearest = resolveNearest(index, forward(3, 1), range, null)
		expect(nearest?.index).toBe(1)
		expect(nearest?.rawOffset).toBe(1)

		const between = resolveNearest(index, forward(5, 7), range, null)
		expect(between?.index).toBe(2)
		expect(between?.rawOffset).toBe(1)
	})

	it('picks the previous match when searching backward', () => {
		const nearest = resolveNearest(index, backward(5, 7), range, null)
		expect(nearest?.index).toBe(1)
		expect(nearest?.rawOffset).toBe(-1)
	})

	it('wraps to the first match past the end', () => {
		const nearest = resolveNearest(index, forward(9, 1), range, null)
		expect(nearest?.index).toBe(0)
		expect(nearest?.rawOffset).toBe(1)
	})

	it('wraps to the last match before the start when searching backward', () => {
		const later = new MatchIndex(spans([2, 1, 3], [4, 1, 3]))
		const nearest = resolveNearest(later, backward(1, 5), range, null)
		expect(nearest?.index).toBe(1)
		expect(nearest?.rawOffset).toBe(-1)
	})

	it('passes the viewport and fold through', () => {
		const fold = { startLine: 4, endLine: 6 }
		const nearest = resolveNearest(
			index,
			forward(5, 4),
			{ topLine: 3, bottomLine: 9 },
			fold
		)
		expect(nearest?.topLine).toBe(3)
		expect(nearest?.botLine).toBe(9)
		expect(nearest?.fold).toBe(fold)
	})
})
