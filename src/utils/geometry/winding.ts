// Point-in-fill tests against closed rings

import type { Point, Ring } from './types'
import type { FillRule } from '../../types/shape'

// > 0 when p is left of the directed edge a->b
function isLeft(a: Point, b: Point, p: Point): number {
  return (b.x - a.x) * (p.y - a.y) - (p.x - a.x) * (b.y - a.y)
}

/**
 * Winding number of a closed ring around a point (crossing-direction count)
 */
export function windingNumber(point: Point, ring: Ring): number {
  let winding = 0
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[j]
    const b = ring[i]
    if (a.y <= point.y) {
      if (b.y > point.y && isLeft(a, b, point) > 0) winding++
    } else if (b.y <= point.y && isLeft(a, b, point) < 0) {
      winding--
    }
  }
  return winding
}

/**
 * Combined winding test over all rings of one fill
 */
export function isPointInsideRings(point: Point, rings: Ring[], rule: FillRule): boolean {
  let winding = 0
  for (const ring of rings) {
    winding += windingNumber(point, ring)
  }
  return rule === 'evenodd' ? winding % 2 !== 0 : winding !== 0
}
