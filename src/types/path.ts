// Canonical path types - the closed M/L/C/Z vocabulary shared by every stage

export interface Point {
  x: number
  y: number
}

export type PathCommand =
  | { type: 'M'; to: Point }
  | { type: 'L'; to: Point }
  | { type: 'C'; c1: Point; c2: Point; to: Point }  // two control points + endpoint
  | { type: 'Z' }                                   // closes back to the most recent M

export type CommandTag = PathCommand['type']

/**
 * Ordered command list. The first command is always an M.
 */
export type CanonicalPath = PathCommand[]

export interface ViewBox {
  width: number
  height: number
}

/**
 * In-memory form of a .svgcom file. Command and coordinate counts are derived
 * from `commands` when the stream is written.
 */
export interface CanonicalStream {
  viewBox: ViewBox
  commands: PathCommand[]
}
