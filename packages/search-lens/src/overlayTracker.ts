import { labelWidth } from './planLens'
import { positionEquals } from './position'
import type { FloatingOverlaySink, OverlayHandle } from './host'
import type { LensChunk, MatchPosition, WindowId } from './types'

interface OpenOverlay {
	handle: OverlayHandle
	window: WindowId
	anchor: MatchPosition
	chunks: LensChunk[]
	text: string
}

const sameChunks = (a: readonly LensChunk[], b: readonly LensChunk[]) =>
	a.length === b.length &&
	a.every((chunk, i) => chunk.text === b[i]?.text && chunk.style === b[i]?.style)

/**
 * Keeps at most one floating overlay open and only re-opens it when its
 * window, anchor or styled chunks change.
 */
export class OverlayTracker {
	private current: OpenOverlay | null = null

	constructor(private readonly sink: FloatingOverlaySink) {}

	get isOpen(): boolean {
		return this.current !== null
	}

	/** Returns true when a new overlay was opened */
	update(
		window: WindowId,
		anchor: MatchPosition,
		chunks: LensChunk[],
		text: string
	): boolean {
		const current = this.current
		if (
			current &&
			current.window === window &&
			current.text === text &&
			sameChunks(current.chunks, chunks) &&
			positionEquals(current.anchor, anchor)
		) {
			return false
		}

		this.close()
		const handle = this.sink.openFloatingOverlay(
			window,
			anchor,
			chunks,
			labelWidth(text)
		)
		this.current = {
			handle,
			window,
			anchor: { ...anchor },
			chunks: chunks.map((chunk) => ({ ...chunk })),
			text,
		}
		return true
	}

	close(): void {
		const current = this.current
		if (!current) return
		this.current = null
		this.sink.closeFloatingOverlay(current.handle)
	}
}
