// Path analysis types

import type { PathCommand, Point } from '../../types/path'
import type { CubicBezier } from '../geometry'

/**
 * One M-started run of a canonical path
 */
export interface Subpath {
  commands: PathCommand[]  // commands[0] is always the M
  closed: boolean          // ends with Z
  continued: boolean       // drawing carried on after a Z; the M was added by the split
}

// Drawable piece of a subpath; a Z contributes a line back to the start
export type DrawSegment =
  | { kind: 'line'; from: Point; to: Point; commandIndex: number }
  | { kind: 'cubic'; curve: CubicBezier; commandIndex: number }

export interface PathDiagnostics {
  subpathCount: number
  commandCount: number
  length: number
  hasCompoundPath: boolean
  hasUnclosedPaths: boolean
  issues: PathIssue[]
}

export interface PathIssue {
  type: 'compound' | 'unclosed' | 'zero-length' | 'degenerate'
  message: string
  subpathIndex?: number
  severity: 'info' | 'warning' | 'error'
}
