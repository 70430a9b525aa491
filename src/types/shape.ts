// Source shape types handed over by the SVG front end (already transformed into viewbox space)

import type { Point, ViewBox } from './path'

export type SourceSegment =
  | { type: 'move'; to: Point }
  | { type: 'line'; to: Point }
  | { type: 'quad'; control: Point; to: Point }
  | { type: 'cubic'; c1: Point; c2: Point; to: Point }
  | {
      type: 'arc'
      rx: number
      ry: number
      rotation: number   // x-axis rotation in degrees
      largeArc: boolean
      sweep: boolean
      to: Point
    }
  | { type: 'close' }

export type ShapeOutline =
  | { kind: 'path'; segments: SourceSegment[] }
  | { kind: 'rect'; x: number; y: number; width: number; height: number; rx?: number; ry?: number }
  | { kind: 'circle'; cx: number; cy: number; r: number }
  | { kind: 'ellipse'; cx: number; cy: number; rx: number; ry: number; rotation?: number }
  | { kind: 'line'; from: Point; to: Point }
  | { kind: 'polyline'; points: Point[] }
  | { kind: 'polygon'; points: Point[] }

export type ShapeKind = ShapeOutline['kind']

export type FillRule = 'nonzero' | 'evenodd'

export interface Fill {
  outline: ShapeOutline  // every subpath is treated as closed
  rule?: FillRule
}

export interface Shape {
  id?: string
  outline: ShapeOutline
  stroke: boolean        // participates in stroke output
  fill?: Fill            // present only when the fill resolves to something paintable
  z: number              // paint order, higher paints on top
}

export interface SourceDocument {
  viewBox: ViewBox
  shapes: Shape[]
}
