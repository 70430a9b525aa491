// Autocut (occlusion culling) types

import type { CanonicalPath, Point } from '../../types/path'
import type { Fill, FillRule } from '../../types/shape'
import type { Rect, Ring } from '../geometry'

export interface AutocutOptions {
  arcTolerance?: number       // used when flattening occluder fills
  sampleTolerance?: number    // max chord deviation of cubic samples
  sampleSpacing?: number      // max distance between samples, defaults from the viewbox diagonal
  refineCuts?: boolean        // bisect transitions to the exact cut parameter
  defaultFillRule?: FillRule
  simplifyTolerance?: number  // occluder ring vertex reduction, 0 disables it
  verbose?: boolean
}

/**
 * Shape after flattening, as consumed by the occlusion pass
 */
export interface PreparedShape {
  index: number          // position in the source document
  z: number
  stroke: boolean
  path: CanonicalPath
  fill?: Fill
}

/**
 * Read-only fill geometry of one shape
 */
export interface Occluder {
  shapeIndex: number
  z: number
  rule: FillRule
  rings: Ring[]
  bounds: Rect
}

// Immutable for the whole pass; built once per document
export type OccluderSnapshot = readonly Readonly<Occluder>[]

/**
 * Polyline edge between two consecutive samples of one drawable segment
 */
export interface SampleEdge {
  segment: number  // index into the subpath's drawable segments
  t0: number
  t1: number
  from: Point
  to: Point
}

export interface AutocutResult {
  shapeIndex: number
  subpaths: CanonicalPath[]
}
