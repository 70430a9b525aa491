// Geometry module - re-exports all geometry utilities

// Types
export type {
  Point,
  Rect,
  CubicBezier,
  EllipseArc,
  Ring,
} from './types'

// Math utilities
export {
  distance,
  lerp,
  pointsEqual,
  ringArea,
  getBoundingBox,
  rectsOverlap,
  viewBoxDiagonal,
} from './math'

// Bezier curves
export {
  cubicPointAt,
  splitCubic,
  subCubic,
  quadToCubic,
  cubicLengthEstimate,
  cubicFlatteningSteps,
} from './bezier'

// Arcs
export type { ArcParams } from './arc'
export {
  arcApproximationError,
  arcSegmentCount,
  ellipseArcToCubics,
  endpointToCenterArc,
  arcToCubics,
} from './arc'

// Winding
export {
  windingNumber,
  isPointInsideRings,
} from './winding'
