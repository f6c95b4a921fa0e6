import type { MatchIndex } from './matchIndex'
import type { NearestMatch } from './resolveNearest'
import type { LensEntry } from './types'

/**
 * Collects the non-nearest lenses between the viewport edges, one per line.
 *
 * Both walks count in visible navigation steps: matches inside the closed
 * fold around the cursor are stepped over before counting starts. Backward
 * entries are numbered from the slot before the cursor (`i - t - 1`), forward
 * entries from the cursor's own slot (`i - b`), so the two directions differ
 * by one on purpose.
 *
 * In both directions a line is claimed by its last match: walking backward
 * that is the first match reached, walking forward it is where repeated
 * forward steps leave the cursor before they cross to the next line.
 */
export function walkLensRange(
	index: MatchIndex,
	nearest: NearestMatch
): LensEntry[] {
	const { topLine, botLine, fold, rawOffset } = nearest
	const length = index.length
	const nearestLine = index.lineOf(nearest.index)
	const byLine = new Map<number, LensEntry>()

	const claim = (line: number, matchIndex: number, relativeIndex: number) => {
		if (line < topLine || line > botLine) return
		byLine.set(line, { matchIndex, relativeIndex, nearest: false })
	}

	let t = nearest.index - 1 - Math.min(rawOffset, 0)
	if (fold) {
		while (t >= 0 && index.lineOf(t) >= fold.startLine) t--
	}

	let lastLine = -1
	for (let i = t; i >= 0; i--) {
		const line = index.lineOf(i)
		if (line < topLine) break
		if (line !== lastLine) {
			lastLine = line
			claim(line, i, i - t - 1)
		}
	}

	let b = nearest.index + 1 - Math.max(rawOffset, 0)
	if (fold) {
		while (b < length && index.lineOf(b) <= fold.endLine) b++
	}

	lastLine = nearestLine
	let lastIndex = -1
	let line = -1
	for (let i = b; i < length; i++) {
		lastIndex = i
		line = index.lineOf(i)
		if (line !== lastLine) {
			lastLine = line
			// i - 1 < b is the nearest line or a skipped fold line
			if (i - 1 >= b) claim(index.lineOf(i - 1), i - 1, i - b)
		}
		if (line > botLine) break
	}

	if (lastIndex >= 0 && line <= botLine) {
		claim(line, lastIndex, lastIndex - b + 1)
	}

	byLine.delete(nearestLine)

	return [...byLine.entries()]
		.sort(([a], [c]) => a - c)
		.map(([, entry]) => entry)
}
