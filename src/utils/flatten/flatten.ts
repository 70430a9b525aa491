// Curve flattener - reduces any outline to the canonical M/L/C/Z vocabulary

import type { CanonicalPath, PathCommand, Point } from '../../types/path'
import type { Shape, ShapeOutline, SourceSegment } from '../../types/shape'
import { FLATTEN } from '../../constants'
import { arcToCubics, pointsEqual, quadToCubic } from '../geometry'
import { ParseError } from '../errors'
import type { FlattenContext, FlattenOptions } from './types'
import { primitiveToSegments } from './shapes'

function report(context: FlattenContext, message: string): void {
  const error = new ParseError(message, context.shapeIndex)
  console.warn(`[flatten] ${error.message}`)
  context.issues.push(error)
}

/**
 * Convert source segments to canonical commands.
 * Open subpaths stay open; a Z is only written where the source closes.
 * Canonical input comes back unchanged.
 */
export function flattenSegments(
  segments: SourceSegment[],
  options: FlattenOptions = {},
  context: FlattenContext = { issues: [] }
): CanonicalPath {
  const tolerance = options.arcTolerance ?? FLATTEN.ARC_TOLERANCE
  const path: PathCommand[] = []

  let current: Point | null = null
  let subpathStart: Point | null = null
  let closed = false
  let reportedMissingMove = false

  for (const segment of segments) {
    if (segment.type === 'move') {
      path.push({ type: 'M', to: segment.to })
      current = segment.to
      subpathStart = segment.to
      closed = false
      continue
    }

    if (current === null || subpathStart === null) {
      if (!reportedMissingMove) {
        report(context, `path must begin with a move, dropped leading "${segment.type}"`)
        reportedMissingMove = true
      }
      continue
    }

    if (segment.type === 'close') {
      if (!closed) {
        path.push({ type: 'Z' })
        current = subpathStart
        closed = true
      }
      continue
    }

    // Drawing after a close carries on from the subpath start without a new M
    closed = false

    switch (segment.type) {
      case 'line':
        path.push({ type: 'L', to: segment.to })
        break
      case 'cubic':
        path.push({ type: 'C', c1: segment.c1, c2: segment.c2, to: segment.to })
        break
      case 'quad': {
        const cubic = quadToCubic(current, segment.control, segment.to)
        path.push({ type: 'C', c1: cubic.c1, c2: cubic.c2, to: cubic.end })
        break
      }
      case 'arc': {
        // Zero-length arcs draw nothing
        if (pointsEqual(current, segment.to)) break
        const cubics = arcToCubics(current, segment.to, segment, tolerance)
        if (cubics === null) {
          report(context, `arc needs positive finite radii and a finite rotation (rx=${segment.rx}, ry=${segment.ry}, rotation=${segment.rotation}), drawing a line instead`)
          path.push({ type: 'L', to: segment.to })
          break
        }
        for (const cubic of cubics) {
          path.push({ type: 'C', c1: cubic.c1, c2: cubic.c2, to: cubic.end })
        }
        break
      }
    }
    current = segment.to
  }

  return path
}

/**
 * Flatten any outline kind. Primitives are expanded into their equivalent
 * path segments first.
 */
export function flattenOutline(
  outline: ShapeOutline,
  options: FlattenOptions = {},
  context: FlattenContext = { issues: [] }
): CanonicalPath {
  const segments = outline.kind === 'path'
    ? outline.segments
    : primitiveToSegments(outline, context)
  return flattenSegments(segments, options, context)
}

/**
 * Flatten one document shape, tagging recovered problems with its index
 */
export function flattenShape(
  shape: Shape,
  shapeIndex: number,
  options: FlattenOptions = {},
  issues: FlattenContext['issues'] = []
): CanonicalPath {
  return flattenOutline(shape.outline, options, { issues, shapeIndex })
}
