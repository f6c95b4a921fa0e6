import { OverlayTracker } from './overlayTracker'
import type { LensSinks } from './host'
import type { BufferId, LensWindow, MatchSpan, PlacedLens } from './types'

export interface LensFrame {
	buffer: BufferId
	window: LensWindow
	nearest: MatchSpan
	lenses: readonly PlacedLens[]
}

export interface ClearOptions {
	highlight?: boolean
	buffer?: BufferId
	overlay?: boolean
}

/**
 * Pushes a frame to the sinks. Every frame replaces the buffer's lenses
 * wholesale; only the floating overlay is kept when it would be identical.
 */
export class LensRenderer {
	private readonly overlay: OverlayTracker

	constructor(private readonly sinks: LensSinks) {
		this.overlay = new OverlayTracker(sinks.overlay)
	}

	get hasOverlay(): boolean {
		return this.overlay.isOpen
	}

	render(frame: LensFrame): void {
		const { inline, highlighter } = this.sinks
		highlighter.setNearestHighlight(
			frame.window.id,
			frame.nearest.start,
			frame.nearest.end
		)
		inline.clearBufferAnnotations(frame.buffer)

		let nearestFloats = false
		for (const { placement } of frame.lenses) {
			if (placement.mode === 'floating') {
				nearestFloats = true
				this.overlay.update(
					frame.window.id,
					placement.anchor,
					placement.chunks,
					placement.text
				)
				continue
			}
			inline.setInlineAnnotation(
				frame.buffer,
				placement.anchor.line,
				placement.anchor.column,
				placement.chunks
			)
		}

		if (!nearestFloats) this.overlay.close()
	}

	clear({ highlight, buffer, overlay }: ClearOptions): void {
		if (highlight) this.sinks.highlighter.clearAllHighlights()
		if (buffer !== undefined) this.sinks.inline.clearBufferAnnotations(buffer)
		if (overlay) this.overlay.close()
	}

	clearAll(): void {
		this.overlay.close()
		this.sinks.inline.clearAllAnnotations()
		this.sinks.highlighter.clearAllHighlights()
	}
}
