// Subpath splitting for canonical paths

import type { CanonicalPath, PathCommand, Point } from '../../types/path'
import type { DrawSegment, Subpath } from './types'

/**
 * Split a canonical path at every M. Drawing commands that follow a Z
 * without a new M continue from the closed subpath's start, as in SVG.
 */
export function splitSubpaths(path: CanonicalPath): Subpath[] {
  const subpaths: Subpath[] = []
  let current: Subpath | null = null
  let start: Point | null = null

  for (const cmd of path) {
    if (cmd.type === 'M') {
      current = { commands: [cmd], closed: false, continued: false }
      subpaths.push(current)
      start = cmd.to
      continue
    }
    if (current === null || start === null) continue

    if (current.closed) {
      current = { commands: [{ type: 'M', to: start }], closed: false, continued: true }
      subpaths.push(current)
    }
    current.commands.push(cmd)
    if (cmd.type === 'Z') current.closed = true
  }

  return subpaths
}

/**
 * Reassemble split subpaths, keeping those `keep` accepts. A continued
 * subpath drops its added M when the subpath before it is kept too.
 */
export function joinSubpaths(
  subpaths: Subpath[],
  keep: (subpath: Subpath) => boolean = () => true
): CanonicalPath {
  const path: PathCommand[] = []
  let previousKept = false

  for (const subpath of subpaths) {
    if (!keep(subpath)) {
      previousKept = false
      continue
    }
    path.push(...(subpath.continued && previousKept ? subpath.commands.slice(1) : subpath.commands))
    previousKept = true
  }

  return path
}

/**
 * Drawable segments of a subpath, in drawing order
 */
export function subpathSegments(subpath: Subpath): DrawSegment[] {
  const segments: DrawSegment[] = []
  const first = subpath.commands[0]
  if (!first || first.type !== 'M') return segments

  const start = first.to
  let current = start

  subpath.commands.forEach((cmd, commandIndex) => {
    switch (cmd.type) {
      case 'M':
        break
      case 'L':
        segments.push({ kind: 'line', from: current, to: cmd.to, commandIndex })
        current = cmd.to
        break
      case 'C':
        segments.push({
          kind: 'cubic',
          curve: { start: current, c1: cmd.c1, c2: cmd.c2, end: cmd.to },
          commandIndex,
        })
        current = cmd.to
        break
      case 'Z':
        segments.push({ kind: 'line', from: current, to: start, commandIndex })
        current = start
        break
    }
  })

  return segments
}
