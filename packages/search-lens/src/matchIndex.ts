import { loggers } from '@lensline/logger'
import { LensInvariantError } from './errors'
import { comparePosition } from './position'
import type { MatchList, MatchPosition, MatchSpan } from './types'

const log = loggers.lens.withTag('match-index')

const fail = (message: string, details: Record<string, unknown>): never => {
	log.error(message, details)
	throw new LensInvariantError(message, details)
}

/**
 * Read-only view over one cycle's match list. Construction checks that the
 * spans are in strictly ascending start order and that no span ends before it
 * starts.
 */
export class MatchIndex {
	private readonly matches: MatchList

	constructor(matches: MatchList) {
		matches.forEach((span, i) => {
			if (comparePosition(span.start, span.end) > 0) {
				fail('Match ends before it starts', { index: i, span })
			}
			const next = matches[i + 1]
			if (next && comparePosition(span.start, next.start) >= 0) {
				fail('Matches are not in document order', {
					index: i,
					start: span.start,
					nextStart: next.start,
				})
			}
		})
		this.matches = matches
	}

	get length(): number {
		return this.matches.length
	}

	get list(): MatchList {
		return this.matches
	}

	spanOf(i: number): MatchSpan {
		const span = this.matches[i]
		if (!span || !Number.isInteger(i)) {
			return fail('Match index out of range', { index: i, length: this.length })
		}
		return span
	}

	lineOf(i: number): number {
		return this.spanOf(i).start.line
	}

	startOf(i: number): MatchPosition {
		return this.spanOf(i).start
	}

	endOf(i: number): MatchPosition {
		return this.spanOf(i).end
	}
}
