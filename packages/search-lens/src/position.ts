import type { MatchPosition } from './types'

/** Document-order comparison: negative when `a` comes first */
export const comparePosition = (a: MatchPosition, b: MatchPosition): number =>
	a.line === b.line ? a.column - b.column : a.line - b.line

export const positionEquals = (a: MatchPosition, b: MatchPosition): boolean =>
	a.line === b.line && a.column === b.column
