import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fc from 'fast-check'
import { RefreshScheduler } from './refreshScheduler'

const createScheduler = (delayMs = 150) => {
	const state = { searchActive: true }
	const run = vi.fn<(force: boolean) => void>()
	const onSearchCleared = vi.fn<() => void>()
	const scheduler = new RefreshScheduler({
		delayMs,
		run,
		isSearchActive: () => state.searchActive,
		onSearchCleared,
	})
	return { scheduler, run, onSearchCleared, state }
}

describe('RefreshScheduler', () => {
	beforeEach(() => {
		vi.useFakeTimers()
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it('runs once after the quiet period following the last request', () => {
		const { scheduler, run } = createScheduler()

		for (let i = 0; i < 5; i++) {
			scheduler.request()
			vi.advanceTimersByTime(50)
		}
		expect(run).not.toHaveBeenCalled()
		expect(scheduler.currentState).toBe('pending')

		vi.advanceTimersByTime(99)
		expect(run).not.toHaveBeenCalled()

		vi.advanceTimersByTime(1)
		expect(run).toHaveBeenCalledTimes(1)
		expect(run).toHaveBeenCalledWith(false)
		expect(scheduler.currentState).toBe('idle')
	})

	it('runs forced requests synchronously and drops the pending timer', () => {
		const { scheduler, run } = createScheduler()

		scheduler.request()
		scheduler.request(true)
		expect(run).toHaveBeenCalledTimes(1)
		expect(run).toHaveBeenCalledWith(true)
		expect(scheduler.isPending).toBe(false)

		vi.advanceTimersByTime(500)
		expect(run).toHaveBeenCalledTimes(1)
	})

	it('ignores requests once cancelled until re-armed', () => {
		const { scheduler, run } = createScheduler()

		scheduler.request()
		scheduler.cancel()
		scheduler.cancel()
		expect(scheduler.currentState).toBe('cancelled')

		vi.advanceTimersByTime(500)
		scheduler.request()
		scheduler.request(true)
		vi.advanceTimersByTime(500)
		expect(run).not.toHaveBeenCalled()

		scheduler.arm()
		scheduler.request()
		vi.advanceTimersByTime(150)
		expect(run).toHaveBeenCalledTimes(1)
	})

	it('defers a stop when requested while search highlighting is off', () => {
		const { scheduler, run, onSearchCleared, state } = createScheduler()
		state.searchActive = false

		scheduler.request()
		expect(onSearchCleared).not.toHaveBeenCalled()

		vi.runOnlyPendingTimers()
		expect(onSearchCleared).toHaveBeenCalledTimes(1)
		expect(run).not.toHaveBeenCalled()
	})

	it('skips the deferred stop when highlighting came back in the meantime', () => {
		const { scheduler, onSearchCleared, state } = createScheduler()
		state.searchActive = false
		scheduler.request()
		state.searchActive = true

		vi.runOnlyPendingTimers()
		expect(onSearchCleared).not.toHaveBeenCalled()
	})

	it('stops when highlighting goes off, on and off again within one tick', () => {
		const { scheduler, run, onSearchCleared, state } = createScheduler()

		state.searchActive = false
		scheduler.request()
		state.searchActive = true
		scheduler.request()
		state.searchActive = false
		scheduler.request()

		vi.advanceTimersByTime(1000)
		expect(onSearchCleared).toHaveBeenCalledTimes(1)
		expect(run).not.toHaveBeenCalled()
	})

	it('keeps a single stop check for repeated requests while highlighting is off', () => {
		const { scheduler, onSearchCleared, state } = createScheduler()
		state.searchActive = false

		scheduler.request()
		scheduler.request()
		vi.runOnlyPendingTimers()

		expect(onSearchCleared).toHaveBeenCalledTimes(1)
	})

	it('stops instead of refreshing when highlighting is turned off before the timer fires', () => {
		const { scheduler, run, onSearchCleared, state } = createScheduler()

		scheduler.request()
		state.searchActive = false
		vi.advanceTimersByTime(150)

		expect(run).not.toHaveBeenCalled()
		expect(onSearchCleared).toHaveBeenCalledTimes(1)
	})

	it('can be cancelled from inside the task', () => {
		const { scheduler, run } = createScheduler()
		run.mockImplementation(() => scheduler.cancel())

		scheduler.request()
		vi.advanceTimersByTime(150)

		expect(run).toHaveBeenCalledTimes(1)
		expect(scheduler.currentState).toBe('cancelled')
	})

	it('coalesces any burst inside the quiet period into one run', () => {
		fc.assert(
			fc.property(
				fc.array(fc.integer({ min: 0, max: 149 }), { minLength: 1, maxLength: 30 }),
				(gaps) => {
					const { scheduler, run } = createScheduler()
					for (const gap of gaps) {
						scheduler.request()
						vi.advanceTimersByTime(gap)
					}
					vi.advanceTimersByTime(150)
					expect(run).toHaveBeenCalledTimes(1)
					expect(run).toHaveBeenCalledWith(false)
					scheduler.cancel()
				}
			)
		)
	})
})
