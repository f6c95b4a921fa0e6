export type BufferId = string
export type WindowId = string

/** 1-indexed line and column */
export interface MatchPosition {
	line: number
	column: number
}

/** A match span; both ends are inclusive */
export interface MatchSpan {
	start: MatchPosition
	end: MatchPosition
}

/** Spans in strictly ascending document order of their start */
export type MatchList = readonly MatchSpan[]

export interface MatchSnapshot {
	matches: MatchList
	/**
	 * The pattern moves the cursor away from the match start (e.g. to the
	 * match end), so relative distances to other matches are meaningless.
	 */
	offsetPattern?: boolean
}

export interface CursorState extends MatchPosition {
	/** Direction of the last search */
	searchForward: boolean
}

export interface VisibleRange {
	topLine: number
	bottomLine: number
}

/** A closed fold, displayed as a single line */
export interface FoldRange {
	startLine: number
	endLine: number
}

export interface LensWindow {
	id: WindowId
	/** Total width in cells, gutter included */
	width: number
	gutterWidth: number
	wrap: boolean
	/** Command-line windows always get trailing-text lenses */
	commandLine?: boolean
}

export interface LensEntry {
	matchIndex: number
	/**
	 * Signed navigation distance from the cursor. Negative before the cursor
	 * in document order, positive after it, 0 when the cursor is on the match.
	 */
	relativeIndex: number
	nearest: boolean
}

export type LensStyle = 'padding' | 'lens' | 'lensNear'

export interface LensChunk {
	text: string
	style: LensStyle
}

export type PlacementMode = 'inline' | 'floating'

export interface PlacementDecision {
	mode: PlacementMode
	anchor: MatchPosition
	chunks: LensChunk[]
	/** Concatenated chunk text */
	text: string
}

export interface PlacedLens {
	entry: LensEntry
	placement: PlacementDecision
}

export interface LensFormatInput {
	matches: MatchList
	index: number
	relativeIndex: number
	nearest: boolean
	searchForward: boolean
}

/**
 * Produces the chunks of one lens. Returning null draws no lens for that
 * match.
 */
export type LensFormatter = (input: LensFormatInput) => LensChunk[] | null
