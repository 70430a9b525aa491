// Bezier curve evaluation, subdivision and length estimates

import type { Point, CubicBezier } from './types'
import { distance, lerp } from './math'

/**
 * Evaluate a cubic at parameter t
 */
export function cubicPointAt(curve: CubicBezier, t: number): Point {
  const mt = 1 - t
  const a = mt * mt * mt
  const b = 3 * mt * mt * t
  const c = 3 * mt * t * t
  const d = t * t * t
  return {
    x: a * curve.start.x + b * curve.c1.x + c * curve.c2.x + d * curve.end.x,
    y: a * curve.start.y + b * curve.c1.y + c * curve.c2.y + d * curve.end.y,
  }
}

/**
 * Split a cubic at t using de Casteljau's construction
 */
export function splitCubic(curve: CubicBezier, t: number): [CubicBezier, CubicBezier] {
  const p01 = lerp(curve.start, curve.c1, t)
  const p12 = lerp(curve.c1, curve.c2, t)
  const p23 = lerp(curve.c2, curve.end, t)
  const p012 = lerp(p01, p12, t)
  const p123 = lerp(p12, p23, t)
  const mid = lerp(p012, p123, t)

  return [
    { start: curve.start, c1: p01, c2: p012, end: mid },
    { start: mid, c1: p123, c2: p23, end: curve.end },
  ]
}

/**
 * Portion of a cubic between parameters t0 and t1 (t0 < t1)
 */
export function subCubic(curve: CubicBezier, t0: number, t1: number): CubicBezier {
  let piece = curve
  if (t0 > 0) {
    piece = splitCubic(piece, t0)[1]
  }
  if (t1 < 1) {
    // t1 re-expressed in the parameter space of the remaining piece
    const local = t0 > 0 ? (t1 - t0) / (1 - t0) : t1
    piece = splitCubic(piece, local)[0]
  }
  return piece
}

/**
 * Exact degree elevation of a quadratic curve
 */
export function quadToCubic(start: Point, control: Point, end: Point): CubicBezier {
  return {
    start,
    c1: {
      x: start.x + (2 / 3) * (control.x - start.x),
      y: start.y + (2 / 3) * (control.y - start.y),
    },
    c2: {
      x: end.x + (2 / 3) * (control.x - end.x),
      y: end.y + (2 / 3) * (control.y - end.y),
    },
    end,
  }
}

/**
 * Arc length estimate: mean of the chord and the control polygon length
 */
export function cubicLengthEstimate(curve: CubicBezier): number {
  const chord = distance(curve.start, curve.end)
  const net = distance(curve.start, curve.c1) + distance(curve.c1, curve.c2) + distance(curve.c2, curve.end)
  return (chord + net) / 2
}

/**
 * Wang's formula: uniform parameter steps needed so that the polyline through
 * the samples stays within `tolerance` of the curve
 */
export function cubicFlatteningSteps(curve: CubicBezier, tolerance: number): number {
  const ddx1 = curve.start.x - 2 * curve.c1.x + curve.c2.x
  const ddy1 = curve.start.y - 2 * curve.c1.y + curve.c2.y
  const ddx2 = curve.c1.x - 2 * curve.c2.x + curve.end.x
  const ddy2 = curve.c1.y - 2 * curve.c2.y + curve.end.y
  const m = Math.max(Math.sqrt(ddx1 * ddx1 + ddy1 * ddy1), Math.sqrt(ddx2 * ddx2 + ddy2 * ddy2))
  if (m === 0) return 1
  return Math.max(1, Math.ceil(Math.sqrt((0.75 * m) / tolerance)))
}
