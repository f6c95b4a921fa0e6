/**
 * Raised when the engine is fed data that breaks its own contracts, such as
 * an out-of-range match index or a match list out of document order. These
 * are programming errors and are never caught by the engine.
 */
export class LensInvariantError extends Error {
	readonly details: Record<string, unknown>

	constructor(message: string, details: Record<string, unknown> = {}) {
		super(message)
		this.name = 'LensInvariantError'
		this.details = details
	}
}
