// Closed-primitive expansion into equivalent path segments

import type { Point } from '../../types/path'
import type { ShapeOutline, SourceSegment } from '../../types/shape'
import { ParseError } from '../errors'
import type { FlattenContext } from './types'

type Primitive = Exclude<ShapeOutline, { kind: 'path' }>

function reportDegenerate(context: FlattenContext, message: string): SourceSegment[] {
  const error = new ParseError(message, context.shapeIndex)
  console.warn(`[flatten] ${error.message}`)
  context.issues.push(error)
  return []
}

function positiveFinite(value: number): boolean {
  return value > 0 && Number.isFinite(value)
}

function pointsToSegments(points: Point[], closed: boolean): SourceSegment[] {
  if (points.length === 0) return []
  const segments: SourceSegment[] = [{ type: 'move', to: points[0] }]
  for (let i = 1; i < points.length; i++) {
    segments.push({ type: 'line', to: points[i] })
  }
  if (closed) segments.push({ type: 'close' })
  return segments
}

/**
 * Ellipse as four quarter arcs, starting at angle 0 and turning with
 * increasing angle (clockwise on screen)
 */
function ellipseToSegments(cx: number, cy: number, rx: number, ry: number, rotation: number): SourceSegment[] {
  const phi = (rotation * Math.PI) / 180
  const cosPhi = Math.cos(phi)
  const sinPhi = Math.sin(phi)
  const at = (angle: number): Point => {
    const cos = Math.cos(angle)
    const sin = Math.sin(angle)
    return {
      x: cx + rx * cos * cosPhi - ry * sin * sinPhi,
      y: cy + rx * cos * sinPhi + ry * sin * cosPhi,
    }
  }

  const quarters = [0, Math.PI / 2, Math.PI, (3 * Math.PI) / 2]
  const start = at(0)
  const segments: SourceSegment[] = [{ type: 'move', to: start }]
  for (let i = 1; i <= quarters.length; i++) {
    segments.push({
      type: 'arc',
      rx,
      ry,
      rotation,
      largeArc: false,
      sweep: true,
      to: i === quarters.length ? start : at(quarters[i]),
    })
  }
  segments.push({ type: 'close' })
  return segments
}

function rectToSegments(shape: Extract<ShapeOutline, { kind: 'rect' }>): SourceSegment[] {
  const { x, y, width: w, height: h } = shape

  // A missing corner radius takes the other one's value, both clamp to half the side
  let rx = shape.rx ?? shape.ry ?? 0
  let ry = shape.ry ?? shape.rx ?? 0
  rx = Math.min(Math.max(rx, 0), w / 2)
  ry = Math.min(Math.max(ry, 0), h / 2)

  if (rx === 0 || ry === 0) {
    return pointsToSegments(
      [{ x, y }, { x: x + w, y }, { x: x + w, y: y + h }, { x, y: y + h }],
      true
    )
  }

  const corner = (to: Point): SourceSegment => ({
    type: 'arc', rx, ry, rotation: 0, largeArc: false, sweep: true, to,
  })
  const segments: SourceSegment[] = [{ type: 'move', to: { x: x + rx, y } }]
  const edges: Array<[Point, Point]> = [
    [{ x: x + w - rx, y }, { x: x + w, y: y + ry }],
    [{ x: x + w, y: y + h - ry }, { x: x + w - rx, y: y + h }],
    [{ x: x + rx, y: y + h }, { x, y: y + h - ry }],
    [{ x, y: y + ry }, { x: x + rx, y }],
  ]
  let current: Point = { x: x + rx, y }
  for (const [lineEnd, arcEnd] of edges) {
    // Fully rounded sides collapse to nothing
    if (lineEnd.x !== current.x || lineEnd.y !== current.y) {
      segments.push({ type: 'line', to: lineEnd })
    }
    segments.push(corner(arcEnd))
    current = arcEnd
  }
  segments.push({ type: 'close' })
  return segments
}

/**
 * Expand a primitive shape into the path segments it is equivalent to
 */
export function primitiveToSegments(shape: Primitive, context: FlattenContext): SourceSegment[] {
  switch (shape.kind) {
    case 'rect':
      if (!positiveFinite(shape.width) || !positiveFinite(shape.height)) {
        return reportDegenerate(context, `rect size must be positive and finite (width=${shape.width}, height=${shape.height})`)
      }
      return rectToSegments(shape)
    case 'circle':
      if (!positiveFinite(shape.r)) {
        return reportDegenerate(context, `circle radius must be positive and finite (r=${shape.r})`)
      }
      return ellipseToSegments(shape.cx, shape.cy, shape.r, shape.r, 0)
    case 'ellipse':
      if (!positiveFinite(shape.rx) || !positiveFinite(shape.ry) || !Number.isFinite(shape.rotation ?? 0)) {
        return reportDegenerate(context, `ellipse needs positive finite radii and a finite rotation (rx=${shape.rx}, ry=${shape.ry}, rotation=${shape.rotation ?? 0})`)
      }
      return ellipseToSegments(shape.cx, shape.cy, shape.rx, shape.ry, shape.rotation ?? 0)
    case 'line':
      return pointsToSegments([shape.from, shape.to], false)
    case 'polyline':
      return pointsToSegments(shape.points, false)
    case 'polygon':
      return pointsToSegments(shape.points, true)
  }
}
