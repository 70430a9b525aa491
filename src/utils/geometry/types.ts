// Geometry type definitions

import type { Point } from '../../types/path'

export type { Point }

export interface Rect {
  x: number
  y: number
  width: number
  height: number
}

/**
 * Cubic Bezier as four absolute points
 */
export interface CubicBezier {
  start: Point
  c1: Point
  c2: Point
  end: Point
}

/**
 * Ellipse (or circle) in center parameterization, rotation in radians
 */
export interface EllipseArc {
  cx: number
  cy: number
  rx: number
  ry: number
  phi: number
  startAngle: number
  sweepAngle: number  // signed, positive = increasing angle
}

// Closed polygon rings - last point connects back to the first
export type Ring = Point[]
