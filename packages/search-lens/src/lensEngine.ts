import { loggers } from '@lensline/logger'
import {
	parseLensSettings,
	type LensSettings,
	type LensSettingsInput,
} from '@lensline/settings'
import { LensRenderer } from './lensRenderer'
import { MatchIndex } from './matchIndex'
import { defaultLensFormatter, planLenses } from './planLens'
import { RefreshScheduler } from './refreshScheduler'
import { resolveNearest, type NearestMatch } from './resolveNearest'
import { walkLensRange } from './walkLensRange'
import type { LensEventSource, LensHost, LensSinks } from './host'
import type { BufferId, LensFormatter, MatchList } from './types'

const log = loggers.lens.withTag('engine')

export type LensEngineStatus = 'stopped' | 'started'

export interface LensEngineOptions {
	host: LensHost
	events: LensEventSource
	sinks: LensSinks
	settings?: LensSettingsInput
	/** Replaces the built-in `[2n 3]` style labels */
	formatter?: LensFormatter
}

type Disposer = () => void

/** What the last rendered cycle looked like; an identical cycle is skipped */
interface CycleKey {
	buffer: BufferId
	matches: MatchList
	index: number
	rawOffset: number
	topLine: number
	botLine: number
	foldStart: number
	foldEnd: number
}

const sameCycle = (a: CycleKey | null, b: CycleKey): boolean =>
	a !== null &&
	a.buffer === b.buffer &&
	a.matches === b.matches &&
	a.index === b.index &&
	a.rawOffset === b.rawOffset &&
	a.topLine === b.topLine &&
	a.botLine === b.botLine &&
	a.foldStart === b.foldStart &&
	a.foldEnd === b.foldEnd

const toCycleKey = (buffer: BufferId, matches: MatchList, nearest: NearestMatch): CycleKey => ({
	buffer,
	matches,
	index: nearest.index,
	rawOffset: nearest.rawOffset,
	topLine: nearest.topLine,
	botLine: nearest.botLine,
	foldStart: nearest.fold?.startLine ?? -1,
	foldEnd: nearest.fold?.endLine ?? -1,
})

/**
 * Draws search lenses for one editing session.
 *
 * `start` subscribes to editor events and renders; cursor movement is
 * debounced through a RefreshScheduler, region changes refresh immediately.
 * `stop` is the only teardown path and can be called any number of times.
 */
export class LensEngine {
	readonly settings: LensSettings
	private readonly host: LensHost
	private readonly events: LensEventSource
	private readonly renderer: LensRenderer
	private readonly formatter: LensFormatter
	private readonly scheduler: RefreshScheduler
	private status: LensEngineStatus = 'stopped'
	private stopDisposers: Disposer[] = []
	private lastCycle: CycleKey | null = null
	private calmDownTimer: ReturnType<typeof setTimeout> | null = null
	private disposed = false

	constructor(options: LensEngineOptions) {
		this.host = options.host
		this.events = options.events
		this.renderer = new LensRenderer(options.sinks)
		this.settings = parseLensSettings(options.settings)
		this.formatter = options.formatter ?? defaultLensFormatter
		this.scheduler = new RefreshScheduler({
			delayMs: this.settings.refreshDelayMs,
			run: (force) => this.refreshCurrentBuffer(force),
			isSearchActive: () => this.host.isSearchActive(),
			onSearchCleared: () => this.stop(),
		})
	}

	isStarted(): boolean {
		return this.status === 'started'
	}

	/**
	 * Starts drawing lenses if search highlighting is on. Calling it again
	 * while started only refreshes.
	 */
	start(force = false): void {
		if (this.disposed) {
			log.warn('start() called on a disposed lens engine')
			return
		}
		if (!this.host.isSearchActive()) return

		if (this.status !== 'started') {
			this.status = 'started'
			log.debug('start')
			this.stopDisposers.push(this.subscribe())
			this.stopDisposers.push(() => {
				this.status = 'stopped'
				this.lastCycle = null
				this.clearCalmDownTimer()
				this.scheduler.cancel()
				this.renderer.clearAll()
				log.debug('stop')
			})
			this.scheduler.arm()
		}

		this.refresh(force)
	}

	refresh(force = false): void {
		if (this.status !== 'started') return
		this.scheduler.request(force)
	}

	stop(): void {
		const disposers = this.stopDisposers
		this.stopDisposers = []
		for (const dispose of disposers) {
			dispose()
		}
	}

	dispose(): void {
		this.stop()
		this.scheduler.cancel()
		this.disposed = true
	}

	private subscribe(): Disposer {
		const unsubscribers = [
			this.events.on('CursorMoved', () => this.refresh()),
			this.events.on('TermEnter', () =>
				this.renderer.clear({
					highlight: true,
					buffer: this.host.currentBuffer(),
					overlay: true,
				})
			),
			this.events.on('RegionChanged', () => this.refresh(true)),
		]

		if (this.settings.calmDown) {
			const onTextChange = () => this.clearSearchAndStop(true)
			unsubscribers.push(
				this.events.on('TextChanged', onTextChange),
				this.events.on('TextChangedInsert', onTextChange)
			)
		}

		return () => {
			for (const unsubscribe of unsubscribers) unsubscribe()
		}
	}

	/**
	 * Turns search highlighting off and stops. Deferred to the next tick when
	 * triggered from a text change so the edit in progress is not disturbed.
	 */
	private clearSearchAndStop(defer: boolean): void {
		const run = () => {
			if (this.status !== 'started') return
			this.host.clearSearchHighlight()
			this.stop()
		}

		if (!defer) {
			run()
			return
		}
		if (this.calmDownTimer) return
		this.calmDownTimer = setTimeout(() => {
			this.calmDownTimer = null
			run()
		}, 0)
	}

	private clearCalmDownTimer(): void {
		if (this.calmDownTimer) {
			clearTimeout(this.calmDownTimer)
			this.calmDownTimer = null
		}
	}

	private refreshCurrentBuffer(force: boolean): void {
		if (this.status !== 'started') return
		if (!this.host.isSearchActive()) {
			this.scheduler.deferStopCheck()
			return
		}

		const buffer = this.host.currentBuffer()
		const snapshot = this.host.findMatches(buffer)
		if (!snapshot) {
			this.stop()
			return
		}
		if (snapshot.matches.length === 0) {
			this.lastCycle = null
			this.renderer.clear({ highlight: true, buffer, overlay: true })
			return
		}

		const index = new MatchIndex(snapshot.matches)
		const cursor = this.host.getCursor()
		const nearest = resolveNearest(
			index,
			cursor,
			this.host.getViewport(),
			this.host.getFold(cursor.line)
		)
		if (!nearest) return

		const cycle = toCycleKey(buffer, snapshot.matches, nearest)
		if (this.settings.calmDown) {
			if (nearest.rawOffset !== 0) {
				this.clearSearchAndStop(false)
				return
			}
		} else if (!force && sameCycle(this.lastCycle, cycle)) {
			log.debug('refresh skipped, nothing moved')
			return
		}

		const window = this.host.getWindow(buffer)
		if (!window) {
			this.lastCycle = null
			this.renderer.clear({ highlight: true, buffer, overlay: true })
			return
		}

		const nearestOnly = this.settings.nearestOnly || snapshot.offsetPattern === true
		const lenses = planLenses({
			index,
			nearest: {
				matchIndex: nearest.index,
				relativeIndex: nearest.rawOffset,
				nearest: true,
			},
			others: nearestOnly ? [] : walkLensRange(index, nearest),
			searchForward: cursor.searchForward,
			formatter: this.formatter,
			placement: {
				window,
				policy: this.settings.nearestFloatWhen,
				lineRenderWidth: (line) => this.host.getLineRenderWidth(window.id, line),
			},
		})

		this.renderer.render({
			buffer,
			window,
			nearest: index.spanOf(nearest.index),
			lenses,
		})
		this.lastCycle = cycle
	}
}
