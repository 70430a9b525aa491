// Occluder snapshot - fill geometry of every filled shape, built once per document

import simplify from 'simplify-js'
import type { Point } from '../../types/path'
import { AUTOCUT } from '../../constants'
import { ringArea, getBoundingBox, isPointInsideRings } from '../geometry'
import type { Ring } from '../geometry'
import { flattenOutline } from '../flatten'
import { splitSubpaths, subpathSegments } from '../pathAnalysis'
import { GeometryError } from '../errors'
import type { PipelineIssue } from '../errors'
import type { AutocutOptions, Occluder, OccluderSnapshot, PreparedShape } from './types'
import { sampleRing } from './sampling'

/**
 * Reduce ring vertices with Ramer-Douglas-Peucker (simplify-js)
 */
function simplifyRing(ring: Ring, tolerance: number): Ring {
  if (tolerance <= 0 || ring.length < 4) return ring
  return simplify(ring.map(p => ({ x: p.x, y: p.y })), tolerance, true)
    .map((p): Point => ({ x: p.x, y: p.y }))
}

/**
 * Build the occluder list for a document. Fills that collapse to nothing are
 * reported as GeometryError and left out.
 */
export function buildOccluderSnapshot(
  shapes: PreparedShape[],
  options: AutocutOptions = {},
  issues: PipelineIssue[] = []
): OccluderSnapshot {
  const sampleTolerance = options.sampleTolerance ?? AUTOCUT.SAMPLE_TOLERANCE
  const simplifyTolerance = options.simplifyTolerance ?? sampleTolerance * AUTOCUT.SIMPLIFY_RATIO
  const occluders: Occluder[] = []

  for (const shape of shapes) {
    if (!shape.fill) continue

    const fillPath = flattenOutline(
      shape.fill.outline,
      { arcTolerance: options.arcTolerance },
      { issues, shapeIndex: shape.index }
    )

    const rings: Ring[] = []
    for (const subpath of splitSubpaths(fillPath)) {
      const ring = simplifyRing(sampleRing(subpathSegments(subpath), sampleTolerance), simplifyTolerance)
      if (ring.length >= 3) rings.push(ring)
    }

    const area = rings.reduce((sum, ring) => sum + Math.abs(ringArea(ring)), 0)
    if (area === 0) {
      const error = new GeometryError('fill has zero area, it hides nothing', shape.index)
      console.warn(`[autocut] ${error.message}`)
      issues.push(error)
      continue
    }

    occluders.push({
      shapeIndex: shape.index,
      z: shape.z,
      rule: shape.fill.rule ?? options.defaultFillRule ?? AUTOCUT.DEFAULT_FILL_RULE,
      rings,
      bounds: getBoundingBox(rings.flat()),
    })
  }

  occluders.sort((a, b) => a.z - b.z)
  return Object.freeze(occluders.map(occluder => Object.freeze(occluder)))
}

/**
 * True when the point lies inside at least one occluder's fill
 */
export function isCovered(point: Point, occluders: OccluderSnapshot): boolean {
  for (const occluder of occluders) {
    const b = occluder.bounds
    if (point.x < b.x || point.x > b.x + b.width || point.y < b.y || point.y > b.y + b.height) continue
    if (isPointInsideRings(point, occluder.rings, occluder.rule)) return true
  }
  return false
}
