// Point and ring math

import type { Point, Rect, Ring } from './types'

export function distance(p1: Point, p2: Point): number {
  return Math.hypot(p2.x - p1.x, p2.y - p1.y)
}

export function lerp(p1: Point, p2: Point, t: number): Point {
  return { x: p1.x + (p2.x - p1.x) * t, y: p1.y + (p2.y - p1.y) * t }
}

export function pointsEqual(p1: Point, p2: Point): boolean {
  return p1.x === p2.x && p1.y === p2.y
}

/**
 * Signed shoelace area of a closed ring (positive = clockwise in y-down space)
 */
export function ringArea(ring: Ring): number {
  if (ring.length < 3) return 0
  let twice = 0
  let prev = ring[ring.length - 1]
  for (const p of ring) {
    twice += prev.x * p.y - p.x * prev.y
    prev = p
  }
  return twice / 2
}

/**
 * Axis-aligned bounds of a point set; empty input gives a zero rect at the origin
 */
export function getBoundingBox(points: Point[]): Rect {
  if (points.length === 0) return { x: 0, y: 0, width: 0, height: 0 }

  let minX = points[0].x
  let minY = points[0].y
  let maxX = minX
  let maxY = minY
  for (const p of points) {
    if (p.x < minX) minX = p.x
    else if (p.x > maxX) maxX = p.x
    if (p.y < minY) minY = p.y
    else if (p.y > maxY) maxY = p.y
  }
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY }
}

/**
 * Closed-interval overlap test, so rects that only touch still count
 */
export function rectsOverlap(a: Rect, b: Rect): boolean {
  return a.x <= b.x + b.width &&
    b.x <= a.x + a.width &&
    a.y <= b.y + b.height &&
    b.y <= a.y + a.height
}

export function viewBoxDiagonal(width: number, height: number): number {
  return Math.hypot(width, height)
}
