import type {
	BufferId,
	CursorState,
	FoldRange,
	LensChunk,
	LensWindow,
	MatchPosition,
	MatchSnapshot,
	VisibleRange,
	WindowId,
} from './types'

/**
 * Editor state the engine reads on every refresh.
 */
export interface LensHost {
	currentBuffer(): BufferId
	/** Null when matches cannot be computed for the buffer; the engine stops */
	findMatches(buffer: BufferId): MatchSnapshot | null
	getCursor(): CursorState
	getViewport(): VisibleRange
	/** The closed fold containing `line`, innermost first */
	getFold(line: number): FoldRange | null
	/** Null when the buffer is not shown in any window */
	getWindow(buffer: BufferId): LensWindow | null
	/** Rendered width of a line in cells, excluding the gutter */
	getLineRenderWidth(window: WindowId, line: number): number
	/** Whether search highlighting is currently on */
	isSearchActive(): boolean
	/** Turns search highlighting off */
	clearSearchHighlight(): void
}

export type LensEventName =
	| 'CursorMoved'
	| 'TextChanged'
	| 'TextChangedInsert'
	| 'TermEnter'
	/** Search pattern or direction changed */
	| 'RegionChanged'

export type LensEventHandler = () => void

export interface LensEventSource {
	/** Returns an unsubscribe function */
	on(event: LensEventName, handler: LensEventHandler): () => void
}

export type OverlayHandle = number | string

export interface InlineAnnotator {
	/** Trailing text at the end of `line` */
	setInlineAnnotation(
		buffer: BufferId,
		line: number,
		column: number,
		chunks: LensChunk[]
	): void
	clearBufferAnnotations(buffer: BufferId): void
	clearAllAnnotations(): void
}

export interface FloatingOverlaySink {
	openFloatingOverlay(
		window: WindowId,
		anchor: MatchPosition,
		chunks: LensChunk[],
		width: number
	): OverlayHandle
	closeFloatingOverlay(handle: OverlayHandle): void
}

export interface RegionHighlighter {
	/** Replaces the previous nearest-match highlight */
	setNearestHighlight(
		window: WindowId,
		start: MatchPosition,
		end: MatchPosition
	): void
	clearAllHighlights(): void
}

export interface LensSinks {
	inline: InlineAnnotator
	overlay: FloatingOverlaySink
	highlighter: RegionHighlighter
}
