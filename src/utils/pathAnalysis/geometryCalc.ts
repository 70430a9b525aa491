// Geometry calculations for canonical paths

import type { CanonicalPath, Point } from '../../types/path'
import { cubicLengthEstimate, distance, getBoundingBox } from '../geometry'
import type { Rect } from '../geometry'
import type { DrawSegment } from './types'
import { splitSubpaths, subpathSegments } from './subpathParsing'

/**
 * Length of one drawable segment; cubics use the chord/control-net estimate
 */
export function segmentLength(segment: DrawSegment): number {
  return segment.kind === 'line'
    ? distance(segment.from, segment.to)
    : cubicLengthEstimate(segment.curve)
}

/**
 * Total drawn length of a path, closing segments included
 */
export function pathLength(path: CanonicalPath): number {
  let total = 0
  for (const subpath of splitSubpaths(path)) {
    for (const segment of subpathSegments(subpath)) {
      total += segmentLength(segment)
    }
  }
  return total
}

/**
 * Bounding box of every point of a path, control points included.
 * Cubics lie inside their control hull, so this always contains the drawing.
 */
export function pathBoundingBox(path: CanonicalPath): Rect {
  const points: Point[] = []
  for (const cmd of path) {
    if (cmd.type === 'C') points.push(cmd.c1, cmd.c2, cmd.to)
    else if (cmd.type !== 'Z') points.push(cmd.to)
  }
  return getBoundingBox(points)
}
