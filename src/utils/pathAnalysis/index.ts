// Path Analysis module exports

// Re-export types
export type {
  Subpath,
  DrawSegment,
  PathDiagnostics,
  PathIssue,
} from './types'

// Re-export subpath parsing utilities
export {
  splitSubpaths,
  joinSubpaths,
  subpathSegments,
} from './subpathParsing'

// Re-export geometry calculations
export {
  segmentLength,
  pathLength,
  pathBoundingBox,
} from './geometryCalc'

// Re-export diagnostics
export {
  analyzePath,
} from './diagnostics'
