// Elliptical arc to cubic Bezier conversion

import type { Point, CubicBezier, EllipseArc } from './types'
import { FLATTEN } from '../../constants'

export interface ArcParams {
  rx: number
  ry: number
  rotation: number  // degrees
  largeArc: boolean
  sweep: boolean
}

/**
 * Maximum radial error of a single cubic approximating a circular arc
 * of the given sweep: r * 2/27 * sin^6(a/4) / cos^2(a/4)
 */
export function arcApproximationError(radius: number, sweep: number): number {
  const quarter = Math.abs(sweep) / 4
  const s = Math.sin(quarter)
  const c = Math.cos(quarter)
  return radius * (2 / 27) * Math.pow(s, 6) / (c * c)
}

/**
 * Number of cubics needed to keep an arc within tolerance. Never fewer than
 * one per quarter turn.
 */
export function arcSegmentCount(radius: number, sweep: number, tolerance: number): number {
  const total = Math.abs(sweep)
  let count = Math.max(1, Math.ceil(total / FLATTEN.MAX_ARC_SWEEP - 1e-9))
  while (count < FLATTEN.MAX_ARC_SEGMENTS && arcApproximationError(radius, total / count) > tolerance) {
    count++
  }
  return count
}

function ellipsePoint(arc: EllipseArc, angle: number): Point {
  const cosPhi = Math.cos(arc.phi)
  const sinPhi = Math.sin(arc.phi)
  const cos = Math.cos(angle)
  const sin = Math.sin(angle)
  return {
    x: arc.cx + arc.rx * cos * cosPhi - arc.ry * sin * sinPhi,
    y: arc.cy + arc.rx * cos * sinPhi + arc.ry * sin * cosPhi,
  }
}

function ellipseDerivative(arc: EllipseArc, angle: number): Point {
  const cosPhi = Math.cos(arc.phi)
  const sinPhi = Math.sin(arc.phi)
  const cos = Math.cos(angle)
  const sin = Math.sin(angle)
  return {
    x: -arc.rx * sin * cosPhi - arc.ry * cos * sinPhi,
    y: -arc.rx * sin * sinPhi + arc.ry * cos * cosPhi,
  }
}

/**
 * Approximate a center-parameterized elliptical arc with cubics
 */
export function ellipseArcToCubics(arc: EllipseArc, tolerance: number = FLATTEN.ARC_TOLERANCE): CubicBezier[] {
  const count = arcSegmentCount(Math.max(arc.rx, arc.ry), arc.sweepAngle, tolerance)
  const step = arc.sweepAngle / count
  const k = (4 / 3) * Math.tan(step / 4)

  const curves: CubicBezier[] = []
  let angle = arc.startAngle
  let start = ellipsePoint(arc, angle)

  for (let i = 0; i < count; i++) {
    const next = angle + step
    const end = ellipsePoint(arc, next)
    const d0 = ellipseDerivative(arc, angle)
    const d1 = ellipseDerivative(arc, next)
    curves.push({
      start,
      c1: { x: start.x + k * d0.x, y: start.y + k * d0.y },
      c2: { x: end.x - k * d1.x, y: end.y - k * d1.y },
      end,
    })
    angle = next
    start = end
  }

  return curves
}

/**
 * Convert SVG endpoint arc parameters to center parameterization.
 * Returns null when a radius is not a positive finite number or the rotation
 * is not finite; the caller decides how to degrade.
 * Radii that are too small to reach the endpoint are scaled up as SVG requires.
 */
export function endpointToCenterArc(from: Point, to: Point, params: ArcParams): EllipseArc | null {
  const validRadius = (r: number) => r > 0 && Number.isFinite(r)
  if (!validRadius(params.rx) || !validRadius(params.ry) || !Number.isFinite(params.rotation)) return null

  const phi = (params.rotation * Math.PI) / 180
  const cosPhi = Math.cos(phi)
  const sinPhi = Math.sin(phi)

  const dx2 = (from.x - to.x) / 2
  const dy2 = (from.y - to.y) / 2
  const x1p = cosPhi * dx2 + sinPhi * dy2
  const y1p = -sinPhi * dx2 + cosPhi * dy2

  let rx = params.rx
  let ry = params.ry
  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
  if (lambda > 1) {
    const scale = Math.sqrt(lambda)
    rx *= scale
    ry *= scale
  }

  const rx2 = rx * rx
  const ry2 = ry * ry
  const num = rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p
  const den = rx2 * y1p * y1p + ry2 * x1p * x1p
  const sign = params.largeArc === params.sweep ? -1 : 1
  const coef = den === 0 ? 0 : sign * Math.sqrt(Math.max(0, num / den))

  const cxp = (coef * rx * y1p) / ry
  const cyp = (-coef * ry * x1p) / rx

  const cx = cosPhi * cxp - sinPhi * cyp + (from.x + to.x) / 2
  const cy = sinPhi * cxp + cosPhi * cyp + (from.y + to.y) / 2

  const ux = (x1p - cxp) / rx
  const uy = (y1p - cyp) / ry
  const vx = (-x1p - cxp) / rx
  const vy = (-y1p - cyp) / ry

  const startAngle = Math.atan2(uy, ux)
  let sweepAngle = Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy)
  if (!params.sweep && sweepAngle > 0) sweepAngle -= 2 * Math.PI
  else if (params.sweep && sweepAngle < 0) sweepAngle += 2 * Math.PI

  return { cx, cy, rx, ry, phi, startAngle, sweepAngle }
}

/**
 * Endpoint arc to cubics. The last cubic ends exactly on `to`.
 * Returns null for degenerate radii.
 */
export function arcToCubics(
  from: Point,
  to: Point,
  params: ArcParams,
  tolerance: number = FLATTEN.ARC_TOLERANCE
): CubicBezier[] | null {
  const arc = endpointToCenterArc(from, to, params)
  if (!arc) return null

  const curves = ellipseArcToCubics(arc, tolerance)
  if (curves.length > 0) {
    curves[0] = { ...curves[0], start: from }
    const last = curves.length - 1
    curves[last] = { ...curves[last], end: to }
  }
  return curves
}
