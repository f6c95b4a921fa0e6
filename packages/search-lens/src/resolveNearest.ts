import { comparePosition } from './position'
import type { MatchIndex } from './matchIndex'
import type { CursorState, FoldRange, VisibleRange } from './types'

/** -1: nearest is one backward step away, 0: cursor is on it, 1: one forward step */
export type NearestOffset = -1 | 0 | 1

export interface NearestMatch {
	index: number
	rawOffset: NearestOffset
	topLine: number
	botLine: number
	fold: FoldRange | null
}

/**
 * Binary search for the first match whose end is at or after the cursor.
 * Returns `index.length` when the cursor is past every match.
 */
const firstEndingAtOrAfter = (index: MatchIndex, cursor: CursorState): number => {
	let lo = 0
	let hi = index.length

	while (lo < hi) {
		const mid = (lo + hi) >>> 1
		if (comparePosition(index.endOf(mid), cursor) < 0) {
			lo = mid + 1
		} else {
			hi = mid
		}
	}

	return lo
}

/**
 * Binary search for the last match starting at or before the cursor.
 * Returns -1 when the cursor is before every match.
 */
const lastStartingAtOrBefore = (index: MatchIndex, cursor: CursorState): number => {
	let lo = 0
	let hi = index.length

	while (lo < hi) {
		const mid = (lo + hi) >>> 1
		if (comparePosition(index.startOf(mid), cursor) <= 0) {
			lo = mid + 1
		} else {
			hi = mid
		}
	}

	return lo - 1
}

/**
 * Finds the match the next search step would land on, wrapping around the
 * buffer like search navigation does. Forward searches pick the first match
 * ending at or after the cursor (wrapping to the first match), backward
 * searches the last match starting at or before it (wrapping to the last).
 *
 * Returns null for an empty match list.
 */
export function resolveNearest(
	index: MatchIndex,
	cursor: CursorState,
	range: VisibleRange,
	fold: FoldRange | null
): NearestMatch | null {
	if (index.length === 0) return null

	let nearest: number
	if (cursor.searchForward) {
		nearest = firstEndingAtOrAfter(index, cursor)
		if (nearest === index.length) nearest = 0
	} else {
		nearest = lastStartingAtOrBefore(index, cursor)
		if (nearest < 0) nearest = index.length - 1
	}

	const inside =
		comparePosition(index.startOf(nearest), cursor) <= 0 &&
		comparePosition(cursor, index.endOf(nearest)) <= 0

	return {
		index: nearest,
		rawOffset: inside ? 0 : cursor.searchForward ? 1 : -1,
		topLine: range.topLine,
		botLine: range.bottomLine,
		fold,
	}
}
