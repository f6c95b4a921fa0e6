import { loggers } from '@lensline/logger'

const log = loggers.lens.withTag('scheduler')

export type RefreshSchedulerState = 'idle' | 'pending' | 'cancelled'

export interface RefreshSchedulerOptions {
	/** Quiet period after the last request before the task runs */
	delayMs: number
	/** The refresh itself; `force` is true only for forced requests */
	run: (force: boolean) => void
	isSearchActive: () => boolean
	/** Called instead of `run` once search highlighting has been turned off */
	onSearchCleared: () => void
}

type Timer = ReturnType<typeof setTimeout>

/**
 * Trailing-edge debounce for refresh requests.
 *
 * Every request inside the quiet period restarts the timer, so a burst runs
 * the task once. A forced request drops the pending timer and runs the task
 * synchronously. Timers carry the generation they were armed in; `cancel`
 * bumps the generation so a timer that already fired into the queue is
 * ignored.
 */
export class RefreshScheduler {
	private readonly options: RefreshSchedulerOptions
	private state: RefreshSchedulerState = 'idle'
	private timer: Timer | null = null
	private stopCheck: { timer: Timer; generation: number } | null = null
	private generation = 0

	constructor(options: RefreshSchedulerOptions) {
		this.options = options
	}

	get currentState(): RefreshSchedulerState {
		return this.state
	}

	get isPending(): boolean {
		return this.state === 'pending'
	}

	request(force = false): void {
		if (this.state === 'cancelled') {
			log.debug('request ignored, scheduler cancelled')
			return
		}

		if (force) {
			this.clearTimer()
			this.execute(true)
			return
		}

		if (!this.options.isSearchActive()) {
			this.clearTimer()
			this.state = 'idle'
			this.deferStopCheck()
			return
		}

		this.clearTimer()
		this.state = 'pending'
		const generation = ++this.generation
		this.timer = setTimeout(() => this.fire(generation), this.options.delayMs)
	}

	/**
	 * On the next tick, stops if search highlighting is still off by then.
	 */
	deferStopCheck(): void {
		if (this.state === 'cancelled') return
		const generation = this.generation
		if (this.stopCheck) {
			if (this.stopCheck.generation === generation) return
			// armed before a later request, which would make it a no-op
			clearTimeout(this.stopCheck.timer)
		}
		const timer = setTimeout(() => {
			this.stopCheck = null
			if (this.state === 'cancelled' || generation !== this.generation) return
			if (!this.options.isSearchActive()) {
				this.options.onSearchCleared()
			}
		}, 0)
		this.stopCheck = { timer, generation }
	}

	/** Leaves the cancelled state so requests are accepted again */
	arm(): void {
		if (this.state === 'cancelled') {
			this.state = 'idle'
		}
	}

	cancel(): void {
		this.clearTimer()
		if (this.stopCheck) {
			clearTimeout(this.stopCheck.timer)
			this.stopCheck = null
		}
		this.generation++
		this.state = 'cancelled'
	}

	private fire(generation: number): void {
		this.timer = null
		if (generation !== this.generation || this.state !== 'pending') {
			log.debug('stale refresh timer ignored', { generation })
			return
		}

		if (!this.options.isSearchActive()) {
			this.state = 'idle'
			this.options.onSearchCleared()
			return
		}

		this.execute(false)
	}

	private execute(force: boolean): void {
		this.state = 'idle'
		this.options.run(force)
	}

	private clearTimer(): void {
		if (this.timer) {
			clearTimeout(this.timer)
			this.timer = null
		}
	}
}
