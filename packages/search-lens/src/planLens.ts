import type { NearestFloatWhen } from '@lensline/settings'
import type { MatchIndex } from './matchIndex'
import type {
	LensChunk,
	LensEntry,
	LensFormatter,
	LensWindow,
	PlacedLens,
	PlacementDecision,
} from './types'

/**
 * `n` when the match is reached by repeating the last search's direction,
 * `N` when it takes the opposite direction. Distances above one are prefixed
 * with the step count.
 */
export function formatIndicator(
	relativeIndex: number,
	searchForward: boolean
): string {
	const steps = Math.abs(relativeIndex)
	if (steps === 0) return ''
	const letter = searchForward !== relativeIndex > 0 ? 'N' : 'n'
	return steps === 1 ? letter : `${steps}${letter}`
}

export const defaultLensFormatter: LensFormatter = ({
	matches,
	index,
	relativeIndex,
	nearest,
	searchForward,
}) => {
	const indicator = formatIndicator(relativeIndex, searchForward)
	const position = index + 1

	if (nearest) {
		const text = indicator
			? `[${indicator} ${position}/${matches.length}]`
			: `[${position}/${matches.length}]`
		return [
			{ text: ' ', style: 'padding' },
			{ text, style: 'lensNear' },
		]
	}

	return [
		{ text: ' ', style: 'padding' },
		{ text: `[${indicator} ${position}]`, style: 'lens' },
	]
}

export const chunksToText = (chunks: readonly LensChunk[]): string =>
	chunks.map((chunk) => chunk.text).join('')

/** Cells a label takes, counted in code points */
export const labelWidth = (text: string): number => [...text].length

/** Non-negative remainder */
const mod = (value: number, divisor: number) =>
	((value % divisor) + divisor) % divisor

/**
 * Free cells after the end of a line. With wrapping only the last screen row
 * of the line counts.
 */
export function remainingWidth(
	lineWidth: number,
	lineEndColumn: number,
	wrap: boolean
): number {
	if (wrap) {
		if (lineWidth <= 0) return 0
		return lineWidth - mod(lineEndColumn - 1, lineWidth) - 1
	}
	return Math.max(0, lineWidth - lineEndColumn)
}

export interface PlacementContext {
	window: LensWindow
	policy: NearestFloatWhen
	/** Rendered width of a line, in cells */
	lineRenderWidth: (line: number) => number
}

/**
 * Only the nearest lens may float; every other lens is trailing text.
 */
export function decidePlacement(
	entry: LensEntry,
	anchorLine: number,
	anchorColumn: number,
	chunks: LensChunk[],
	context: PlacementContext
): PlacementDecision {
	const text = chunksToText(chunks)
	const anchor = { line: anchorLine, column: anchorColumn }
	const inline: PlacementDecision = { mode: 'inline', anchor, chunks, text }
	const floating: PlacementDecision = { mode: 'floating', anchor, chunks, text }

	const { window, policy } = context
	if (!entry.nearest || policy === 'never' || window.commandLine) {
		return inline
	}
	if (policy === 'always') return floating

	const lineWidth = window.width - window.gutterWidth
	const free = remainingWidth(
		lineWidth,
		context.lineRenderWidth(anchorLine),
		window.wrap
	)
	return free > labelWidth(text) ? inline : floating
}

export interface LensPlanInput {
	index: MatchIndex
	nearest: LensEntry
	others: readonly LensEntry[]
	searchForward: boolean
	formatter: LensFormatter
	placement: PlacementContext
}

/**
 * Formats and places every lens of one cycle. The nearest lens, when the
 * formatter produces one, comes first.
 */
export function planLenses(input: LensPlanInput): PlacedLens[] {
	const { index, formatter, searchForward, placement } = input
	const placed: PlacedLens[] = []

	for (const entry of [input.nearest, ...input.others]) {
		const chunks = formatter({
			matches: index.list,
			index: entry.matchIndex,
			relativeIndex: entry.relativeIndex,
			nearest: entry.nearest,
			searchForward,
		})
		if (!chunks) continue

		const start = index.startOf(entry.matchIndex)
		placed.push({
			entry,
			placement: decidePlacement(
				entry,
				start.line,
				start.column,
				chunks,
				placement
			),
		})
	}

	return placed
}
