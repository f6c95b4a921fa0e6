import { loggers } from '@lensline/logger'
import type { LensEventHandler, LensEventName, LensEventSource } from './host'

const log = loggers.lens.withTag('events')

/**
 * Minimal event source for embedders that do not already have one.
 */
export class LensEventBus implements LensEventSource {
	private readonly handlers = new Map<LensEventName, Set<LensEventHandler>>()

	on(event: LensEventName, handler: LensEventHandler): () => void {
		const handlers = this.handlers.get(event) ?? new Set<LensEventHandler>()
		this.handlers.set(event, handlers)
		handlers.add(handler)

		return () => {
			handlers.delete(handler)
			if (handlers.size === 0 && this.handlers.get(event) === handlers) {
				this.handlers.delete(event)
			}
		}
	}

	emit(event: LensEventName): void {
		const handlers = this.handlers.get(event)
		if (!handlers) return
		log.trace('emit', event, handlers.size)
		for (const handler of [...handlers]) {
			handler()
		}
	}

	listenerCount(event?: LensEventName): number {
		if (event) return this.handlers.get(event)?.size ?? 0
		let count = 0
		for (const handlers of this.handlers.values()) count += handlers.size
		return count
	}
}
