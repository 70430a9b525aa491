// Segment sampling for coverage tests

import type { Point } from '../../types/path'
import { cubicFlatteningSteps, cubicLengthEstimate, cubicPointAt, distance, lerp } from '../geometry'
import type { DrawSegment } from '../pathAnalysis'
import { AUTOCUT } from '../../constants'
import type { SampleEdge } from './types'

/**
 * Uniform parameter steps for a segment: enough to stay within `tolerance`
 * of a curve and to keep consecutive samples no further apart than `spacing`
 */
export function segmentSteps(segment: DrawSegment, tolerance: number, spacing: number): number {
  let steps: number
  if (segment.kind === 'line') {
    steps = Math.ceil(distance(segment.from, segment.to) / spacing)
  } else {
    steps = Math.max(
      cubicFlatteningSteps(segment.curve, tolerance),
      Math.ceil(cubicLengthEstimate(segment.curve) / spacing)
    )
  }
  if (!Number.isFinite(steps)) return 1
  return Math.min(Math.max(steps, 1), AUTOCUT.MAX_SEGMENT_SAMPLES)
}

export function segmentPointAt(segment: DrawSegment, t: number): Point {
  if (t === 0) return segment.kind === 'line' ? segment.from : segment.curve.start
  if (t === 1) return segment.kind === 'line' ? segment.to : segment.curve.end
  return segment.kind === 'line'
    ? lerp(segment.from, segment.to, t)
    : cubicPointAt(segment.curve, t)
}

/**
 * Polyline edges of a subpath's segments, in drawing order
 */
export function sampleEdges(segments: DrawSegment[], tolerance: number, spacing: number): SampleEdge[] {
  const edges: SampleEdge[] = []
  segments.forEach((segment, index) => {
    const steps = segmentSteps(segment, tolerance, spacing)
    let t0 = 0
    let from = segmentPointAt(segment, 0)
    for (let i = 1; i <= steps; i++) {
      const t1 = i === steps ? 1 : i / steps
      const to = segmentPointAt(segment, t1)
      edges.push({ segment: index, t0, t1, from, to })
      t0 = t1
      from = to
    }
  })
  return edges
}

/**
 * Closed ring through the samples of a subpath (no repeated closing point)
 */
export function sampleRing(segments: DrawSegment[], tolerance: number): Point[] {
  const edges = sampleEdges(segments, tolerance, Infinity)
  if (edges.length === 0) return []
  const ring = [edges[0].from, ...edges.map(edge => edge.to)]
  const first = ring[0]
  const last = ring[ring.length - 1]
  if (ring.length > 1 && first.x === last.x && first.y === last.y) ring.pop()
  return ring
}
