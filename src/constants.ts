/**
 * Library-wide constants
 * Centralizes tolerances and default options for the generate and render pipelines
 */

// ============================================================================
// Flattening
// ============================================================================

export const FLATTEN = {
  /** Maximum deviation between an arc and its cubic approximation (viewbox units) */
  ARC_TOLERANCE: 0.01,
  /** Arcs are always split at least every quarter turn */
  MAX_ARC_SWEEP: Math.PI / 2,
  /** Upper bound on cubics generated for a single arc */
  MAX_ARC_SEGMENTS: 64,
} as const

// ============================================================================
// Autocut
// ============================================================================

export const AUTOCUT = {
  /** Maximum chord deviation when sampling cubic segments */
  SAMPLE_TOLERANCE: 0.01,
  /** Default sample spacing as a fraction of the viewbox diagonal */
  SAMPLE_SPACING_RATIO: 0.002,
  /** Upper bound on samples taken from a single segment */
  MAX_SEGMENT_SAMPLES: 4096,
  /** Bisection steps used to locate a cut between two samples */
  CUT_REFINE_ITERATIONS: 24,
  /** Occluder ring simplification tolerance relative to SAMPLE_TOLERANCE */
  SIMPLIFY_RATIO: 0.25,
  /** Fill rule used when an occluder does not carry its own */
  DEFAULT_FILL_RULE: 'nonzero',
} as const

// ============================================================================
// Polishing
// ============================================================================

export const POLISH = {
  /** Default minimum sub-path length as a fraction of the viewbox diagonal */
  MIN_LENGTH_RATIO: 0.001,
} as const

// ============================================================================
// Render Defaults
// ============================================================================

export const RENDER_DEFAULTS = {
  STROKE: '#000000',
  STROKE_WIDTH: 1,
} as const

// ============================================================================
// File Format
// ============================================================================

export const SVGCOM = {
  /** Largest value a header field may hold */
  MAX_UINT32: 4294967295,
  /** Coordinates consumed by each command tag */
  COORDINATES_PER_COMMAND: { M: 2, L: 2, C: 6, Z: 0 },
} as const
