export { LensEngine } from './lensEngine'
export type { LensEngineOptions, LensEngineStatus } from './lensEngine'

export { MatchIndex } from './matchIndex'
export { resolveNearest } from './resolveNearest'
export type { NearestMatch, NearestOffset } from './resolveNearest'
export { walkLensRange } from './walkLensRange'
export {
	formatIndicator,
	defaultLensFormatter,
	chunksToText,
	labelWidth,
	remainingWidth,
	decidePlacement,
	planLenses,
} from './planLens'
export type { PlacementContext, LensPlanInput } from './planLens'
export { RefreshScheduler } from './refreshScheduler'
export type {
	RefreshSchedulerOptions,
	RefreshSchedulerState,
} from './refreshScheduler'
export { LensRenderer } from './lensRenderer'
export type { LensFrame, ClearOptions } from './lensRenderer'
export { OverlayTracker } from './overlayTracker'
export { LensEventBus } from './events'
export { LensInvariantError } from './errors'
export { comparePosition, positionEquals } from './position'

export type {
	LensHost,
	LensEventName,
	LensEventHandler,
	LensEventSource,
	OverlayHandle,
	InlineAnnotator,
	FloatingOverlaySink,
	RegionHighlighter,
	LensSinks,
} from './host'

export type {
	BufferId,
	WindowId,
	MatchPosition,
	MatchSpan,
	MatchList,
	MatchSnapshot,
	CursorState,
	VisibleRange,
	FoldRange,
	LensWindow,
	LensEntry,
	LensStyle,
	LensChunk,
	PlacementMode,
	PlacementDecision,
	PlacedLens,
	LensFormatInput,
	LensFormatter,
} from './types'
