import { describe, expect, it } from 'vitest'
import { OverlayTracker } from './overlayTracker'
import { MemoryOverlaySink } from './testing/memorySinks'
import type { LensChunk } from './types'

const chunks: LensChunk[] = [{ text: '[1/3]', style: 'lensNear' }]

describe('OverlayTracker', () => {
	it('opens an overlay sized to its text', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)

		expect(tracker.update('win', { line: 3, column: 2 }, chunks, '[1/3]')).toBe(true)
		expect([...sink.open.values()]).toEqual([
			{
				handle: 1,
				window: 'win',
				anchor: { line: 3, column: 2 },
				chunks,
				width: 5,
			},
		])
	})

	it('keeps an identical overlay open', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)

		tracker.update('win', { line: 3, column: 2 }, chunks, '[1/3]')
		expect(tracker.update('win', { line: 3, column: 2 }, chunks, '[1/3]')).toBe(false)
		expect(sink.opened).toBe(1)
		expect(sink.closed).toBe(0)
	})

	it('replaces the overlay when the anchor or text changes', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)

		tracker.update('win', { line: 3, column: 2 }, chunks, '[1/3]')
		tracker.update('win', { line: 4, column: 2 }, chunks, '[1/3]')
		tracker.update('win', { line: 4, column: 2 }, chunks, '[2/3]')

		expect(sink.opened).toBe(3)
		expect(sink.closed).toBe(2)
		expect([...sink.open.keys()]).toEqual([3])
	})

	it('replaces the overlay when only the styling changes', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)
		const plain: LensChunk[] = [{ text: '[1/3]', style: 'lens' }]

		tracker.update('win', { line: 3, column: 2 }, plain, '[1/3]')
		expect(tracker.update('win', { line: 3, column: 2 }, chunks, '[1/3]')).toBe(true)

		expect(sink.opened).toBe(2)
		expect(sink.closed).toBe(1)
		expect([...sink.open.values()].map((overlay) => overlay.chunks)).toEqual([chunks])
	})

	it('sizes the overlay in code points', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)
		const text = '[\u{1F50D} 2]'

		tracker.update('win', { line: 1, column: 1 }, [{ text, style: 'lensNear' }], text)

		expect([...sink.open.values()][0]?.width).toBe(5)
	})

	it('closes idempotently', () => {
		const sink = new MemoryOverlaySink()
		const tracker = new OverlayTracker(sink)

		tracker.update('win', { line: 1, column: 1 }, chunks, '[1/3]')
		tracker.close()
		tracker.close()

		expect(tracker.isOpen).toBe(false)
		expect(sink.closed).toBe(1)
	})
})
