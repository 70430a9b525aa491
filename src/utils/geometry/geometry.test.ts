import { describe, expect, it } from 'vitest'

import {
  arcApproximationError,
  arcSegmentCount,
  arcToCubics,
  ringArea,
  cubicFlatteningSteps,
  cubicLengthEstimate,
  cubicPointAt,
  distance,
  endpointToCenterArc,
  isPointInsideRings,
  quadToCubic,
  rectsOverlap,
  splitCubic,
  subCubic,
  viewBoxDiagonal,
  windingNumber,
} from '.'
import type { CubicBezier, Ring } from '.'

const hump: CubicBezier = {
  start: { x: 0, y: 0 },
  c1: { x: 0, y: 10 },
  c2: { x: 10, y: 10 },
  end: { x: 10, y: 0 },
}

const square: Ring = [
  { x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }, { x: 0, y: 10 },
]

describe('math', () => {
  it('computes signed polygon area', () => {
    expect(ringArea(square)).toBe(100)
    expect(ringArea([...square].reverse())).toBe(-100)
  })

  it('treats touching rects as overlapping', () => {
    const a = { x: 0, y: 0, width: 10, height: 10 }
    expect(rectsOverlap(a, { x: 10, y: 0, width: 5, height: 5 })).toBe(true)
    expect(rectsOverlap(a, { x: 11, y: 0, width: 5, height: 5 })).toBe(false)
  })

  it('measures the viewbox diagonal', () => {
    expect(viewBoxDiagonal(3, 4)).toBe(5)
  })
})

describe('bezier', () => {
  it('raises a quadratic to an equivalent cubic', () => {
    const cubic = quadToCubic({ x: 0, y: 0 }, { x: 3, y: 3 }, { x: 6, y: 0 })
    expect(cubic.c1.x).toBeCloseTo(2, 12)
    expect(cubic.c1.y).toBeCloseTo(2, 12)
    expect(cubic.c2.x).toBeCloseTo(4, 12)
    expect(cubic.c2.y).toBeCloseTo(2, 12)

    // Quadratic midpoint: 0.25 * P0 + 0.5 * C + 0.25 * P2
    const mid = cubicPointAt(cubic, 0.5)
    expect(mid.x).toBeCloseTo(3, 12)
    expect(mid.y).toBeCloseTo(1.5, 12)
  })

  it('splits with de Casteljau', () => {
    const [left, right] = splitCubic(hump, 0.5)
    expect(left).toEqual({
      start: { x: 0, y: 0 },
      c1: { x: 0, y: 5 },
      c2: { x: 2.5, y: 7.5 },
      end: { x: 5, y: 7.5 },
    })
    expect(right.start).toEqual(cubicPointAt(hump, 0.5))
    expect(right.end).toBe(hump.end)
  })

  it('extracts a sub-curve between two parameters', () => {
    const piece = subCubic(hump, 0.25, 0.75)
    const a = cubicPointAt(hump, 0.25)
    const b = cubicPointAt(hump, 0.75)
    expect(piece.start.x).toBeCloseTo(a.x, 12)
    expect(piece.start.y).toBeCloseTo(a.y, 12)
    expect(piece.end.x).toBeCloseTo(b.x, 12)
    expect(piece.end.y).toBeCloseTo(b.y, 12)
    expect(subCubic(hump, 0, 1)).toBe(hump)
  })

  it('estimates length from chord and control net', () => {
    const straight: CubicBezier = {
      start: { x: 0, y: 0 }, c1: { x: 1, y: 0 }, c2: { x: 2, y: 0 }, end: { x: 3, y: 0 },
    }
    expect(cubicLengthEstimate(straight)).toBe(3)
  })

  it('uses Wang\'s formula for flattening steps', () => {
    // Second differences are (10, -10) and (-10, -10): M = sqrt(200)
    expect(cubicFlatteningSteps(hump, 0.01)).toBe(33)
    expect(cubicFlatteningSteps({
      start: { x: 0, y: 0 }, c1: { x: 1, y: 1 }, c2: { x: 2, y: 2 }, end: { x: 3, y: 3 },
    }, 0.01)).toBe(1)
  })
})

describe('arc', () => {
  it('bounds the error of a quarter circle', () => {
    expect(arcApproximationError(1, Math.PI / 2)).toBeCloseTo(0.0002726, 6)
  })

  it('picks enough cubics for the tolerance', () => {
    expect(arcSegmentCount(1, Math.PI / 2, 0.01)).toBe(1)
    expect(arcSegmentCount(1, 2 * Math.PI, 0.01)).toBe(4)
    expect(arcSegmentCount(100, Math.PI / 2, 0.01)).toBe(2)
    expect(arcSegmentCount(1e9, Math.PI / 2, 1e-12)).toBe(64)
  })

  it('rejects non-positive radii', () => {
    const params = { rx: 0, ry: 5, rotation: 0, largeArc: false, sweep: true }
    expect(endpointToCenterArc({ x: 0, y: 0 }, { x: 10, y: 0 }, params)).toBeNull()
    expect(arcToCubics({ x: 0, y: 0 }, { x: 10, y: 0 }, { ...params, rx: -1 })).toBeNull()
  })

  it('rejects infinite radii and non-finite rotation', () => {
    const params = { rx: 5, ry: 5, rotation: 0, largeArc: false, sweep: true }
    expect(endpointToCenterArc({ x: 0, y: 0 }, { x: 10, y: 0 }, { ...params, ry: Infinity })).toBeNull()
    expect(endpointToCenterArc({ x: 0, y: 0 }, { x: 10, y: 0 }, { ...params, rotation: Infinity })).toBeNull()
  })

  it('scales radii that cannot reach the endpoint', () => {
    const arc = endpointToCenterArc(
      { x: 0, y: 0 },
      { x: 20, y: 0 },
      { rx: 5, ry: 5, rotation: 0, largeArc: false, sweep: true }
    )
    expect(arc?.rx).toBeCloseTo(10, 9)
    expect(arc?.cx).toBeCloseTo(10, 9)
    expect(arc?.cy).toBeCloseTo(0, 9)
  })

  it('converts a half circle into two cubics within tolerance', () => {
    const from = { x: 0, y: 0 }
    const to = { x: 20, y: 0 }
    const curves = arcToCubics(from, to, { rx: 10, ry: 10, rotation: 0, largeArc: false, sweep: true }, 0.01)
    if (!curves) throw new Error('expected curves')

    expect(curves).toHaveLength(2)
    expect(curves[0].start).toEqual(from)
    expect(curves[1].end).toEqual(to)
    // Positive sweep turns through the top of the circle in y-down space
    expect(curves[0].end.x).toBeCloseTo(10, 9)
    expect(curves[0].end.y).toBeCloseTo(-10, 9)

    for (const curve of curves) {
      for (const t of [0.25, 0.5, 0.75]) {
        const radius = distance(cubicPointAt(curve, t), { x: 10, y: 0 })
        expect(Math.abs(radius - 10)).toBeLessThan(0.01)
      }
    }
  })
})

describe('winding', () => {
  it('counts the turns of a ring around a point', () => {
    expect(windingNumber({ x: 5, y: 5 }, square)).toBe(1)
    expect(windingNumber({ x: 5, y: 5 }, [...square].reverse())).toBe(-1)
    expect(windingNumber({ x: 15, y: 5 }, square)).toBe(0)
  })

  it('applies the nonzero and evenodd rules', () => {
    const inner: Ring = [
      { x: 2, y: 2 }, { x: 8, y: 2 }, { x: 8, y: 8 }, { x: 2, y: 8 },
    ]
    const rings = [square, inner]

    expect(isPointInsideRings({ x: 5, y: 5 }, rings, 'nonzero')).toBe(true)
    expect(isPointInsideRings({ x: 5, y: 5 }, rings, 'evenodd')).toBe(false)
    expect(isPointInsideRings({ x: 1, y: 1 }, rings, 'nonzero')).toBe(true)
    expect(isPointInsideRings({ x: 1, y: 1 }, rings, 'evenodd')).toBe(true)
    expect(isPointInsideRings({ x: 20, y: 1 }, rings, 'nonzero')).toBe(false)
  })
})
