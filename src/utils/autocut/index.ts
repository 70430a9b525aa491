// Autocut module exports

// Re-export types
export type {
  AutocutOptions,
  PreparedShape,
  Occluder,
  OccluderSnapshot,
  SampleEdge,
  AutocutResult,
} from './types'

// Re-export sampling
export {
  segmentSteps,
  segmentPointAt,
  sampleEdges,
  sampleRing,
} from './sampling'

// Re-export occluder snapshot
export {
  buildOccluderSnapshot,
  isCovered,
} from './occluders'

// Re-export occlusion pass
export type { CutSettings } from './autocut'
export {
  cutPath,
  autocut,
} from './autocut'
