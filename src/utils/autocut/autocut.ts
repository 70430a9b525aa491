// Autocut - removes stroke stretches hidden behind later-painted fills

import type { CanonicalPath, PathCommand, ViewBox } from '../../types/path'
import { AUTOCUT } from '../../constants'
import { rectsOverlap, subCubic, viewBoxDiagonal } from '../geometry'
import { pathBoundingBox, splitSubpaths, subpathSegments } from '../pathAnalysis'
import type { DrawSegment, Subpath } from '../pathAnalysis'
import type { PipelineIssue } from '../errors'
import type {
  AutocutOptions,
  AutocutResult,
  OccluderSnapshot,
  PreparedShape,
  SampleEdge,
} from './types'
import { buildOccluderSnapshot, isCovered } from './occluders'
import { sampleEdges, segmentPointAt } from './sampling'

export interface CutSettings {
  tolerance: number
  spacing: number
  refine: boolean
}

// Part of one drawable segment between two parameters
interface Piece {
  segment: number
  t0: number
  t1: number
}

/**
 * Bisect the parameter interval of an edge whose ends disagree on coverage.
 * Returns the parameter on the visible side of the boundary.
 */
function refineBoundary(
  segment: DrawSegment,
  edge: SampleEdge,
  visibleAtStart: boolean,
  occluders: OccluderSnapshot
): number {
  let visible = visibleAtStart ? edge.t0 : edge.t1
  let hidden = visibleAtStart ? edge.t1 : edge.t0
  for (let i = 0; i < AUTOCUT.CUT_REFINE_ITERATIONS; i++) {
    const mid = (visible + hidden) / 2
    if (isCovered(segmentPointAt(segment, mid), occluders)) hidden = mid
    else visible = mid
  }
  return visible
}

/**
 * Group a run's edges into per-segment pieces, in drawing order
 */
function runPieces(run: SampleEdge[]): Piece[] {
  const pieces: Piece[] = []
  for (const edge of run) {
    const last = pieces[pieces.length - 1]
    if (last && last.segment === edge.segment && last.t1 === edge.t0) {
      last.t1 = edge.t1
    } else {
      pieces.push({ segment: edge.segment, t0: edge.t0, t1: edge.t1 })
    }
  }
  return pieces
}

/**
 * Re-express pieces as commands. Whole segments keep their original command;
 * partial ones are split exactly (lines by interpolation, cubics by de Casteljau).
 */
function piecesToPath(pieces: Piece[], segments: DrawSegment[], subpath: Subpath): CanonicalPath {
  const first = pieces[0]
  const path: PathCommand[] = [{ type: 'M', to: segmentPointAt(segments[first.segment], first.t0) }]

  for (const piece of pieces) {
    if (piece.t1 <= piece.t0) continue
    const segment = segments[piece.segment]
    const whole = piece.t0 === 0 && piece.t1 === 1
    const original = subpath.commands[segment.commandIndex]

    if (segment.kind === 'line') {
      // A close inside a run becomes a line: the run has its own M
      const to = whole ? segment.to : segmentPointAt(segment, piece.t1)
      path.push(whole && original.type === 'L' ? original : { type: 'L', to })
    } else if (whole && original.type === 'C') {
      path.push(original)
    } else {
      const curve = subCubic(segment.curve, piece.t0, piece.t1)
      path.push({ type: 'C', c1: curve.c1, c2: curve.c2, to: curve.end })
    }
  }

  return path
}

/**
 * Cut one subpath into its visible runs
 */
function cutSubpath(subpath: Subpath, occluders: OccluderSnapshot, settings: CutSettings): CanonicalPath[] {
  const segments = subpathSegments(subpath)
  const edges = sampleEdges(segments, settings.tolerance, settings.spacing)
  if (edges.length === 0) return [subpath.commands]

  // Coverage per sample point: covered[i] is the start of edge i, covered[i + 1] its end
  const covered: boolean[] = [isCovered(edges[0].from, occluders)]
  for (const edge of edges) {
    covered.push(isCovered(edge.to, occluders))
  }

  // An edge is hidden only when both of its ends are covered
  const hidden = edges.map((_, i) => covered[i] && covered[i + 1])
  if (!hidden.some(Boolean)) return [subpath.commands]
  if (hidden.every(Boolean)) return []

  // Maximal runs of visible edge indices
  const runs: number[][] = []
  let current: number[] = []
  hidden.forEach((isHidden, i) => {
    if (isHidden) {
      if (current.length > 0) runs.push(current)
      current = []
    } else {
      current.push(i)
    }
  })
  if (current.length > 0) runs.push(current)

  // A closed subpath is a loop: the run reaching its end continues into the run at its start
  if (subpath.closed && runs.length > 1 && !hidden[0] && !hidden[hidden.length - 1]) {
    const head = runs.shift()
    const tail = runs.pop()
    if (head && tail) runs.push([...tail, ...head])
  }

  // Hidden state of a neighbouring edge; closed subpaths wrap around
  const isHiddenAt = (i: number): boolean => {
    if (i >= 0 && i < hidden.length) return hidden[i]
    if (!subpath.closed) return false
    return hidden[(i + hidden.length) % hidden.length]
  }

  return runs.map(run => {
    const pieces = runPieces(run.map(i => edges[i]))
    const firstEdge = edges[run[0]]
    const lastEdge = edges[run[run.length - 1]]

    // Cut ends sit on covered samples; refining moves them to the boundary
    if (settings.refine) {
      if (isHiddenAt(run[0] - 1)) {
        pieces[0].t0 = refineBoundary(segments[firstEdge.segment], firstEdge, false, occluders)
      }
      if (isHiddenAt(run[run.length - 1] + 1)) {
        pieces[pieces.length - 1].t1 = refineBoundary(segments[lastEdge.segment], lastEdge, true, occluders)
      }
    }

    return piecesToPath(pieces, segments, subpath)
  })
}

/**
 * Visible sub-paths of one path against the occluders painted above it
 */
export function cutPath(
  path: CanonicalPath,
  occluders: OccluderSnapshot,
  settings: CutSettings
): CanonicalPath[] {
  if (occluders.length === 0) return [path]

  const result: CanonicalPath[] = []
  let untouched = true
  for (const subpath of splitSubpaths(path)) {
    const runs = cutSubpath(subpath, occluders, settings)
    if (runs.length !== 1 || runs[0] !== subpath.commands) untouched = false
    result.push(...runs)
  }
  // Nothing hidden: hand back the path as given, without split-added moves
  return untouched ? [path] : result
}

/**
 * Occlusion pass over a whole document. Every stroke shape is cut against the
 * fills strictly above it; results keep document order.
 */
export function autocut(
  shapes: PreparedShape[],
  viewBox: ViewBox,
  options: AutocutOptions = {},
  issues: PipelineIssue[] = []
): AutocutResult[] {
  const occluders = buildOccluderSnapshot(shapes, options, issues)
  const settings: CutSettings = {
    tolerance: options.sampleTolerance ?? AUTOCUT.SAMPLE_TOLERANCE,
    spacing: options.sampleSpacing
      ?? viewBoxDiagonal(viewBox.width, viewBox.height) * AUTOCUT.SAMPLE_SPACING_RATIO,
    refine: options.refineCuts ?? true,
  }

  const results: AutocutResult[] = []
  for (const shape of shapes) {
    if (!shape.stroke) continue

    const bounds = pathBoundingBox(shape.path)
    const above = occluders.filter(o => o.z > shape.z && rectsOverlap(o.bounds, bounds))

    // Untouched shapes pass through whole
    const subpaths = above.length === 0
      ? [shape.path]
      : cutPath(shape.path, above, settings)

    if (options.verbose) {
      console.log(`[autocut] shape ${shape.index}: ${above.length} occluder(s) above, ${subpaths.length} visible sub-path(s)`)
    }
    results.push({ shapeIndex: shape.index, subpaths })
  }

  return results
}
