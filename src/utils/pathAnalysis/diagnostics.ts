// Path diagnostics and analysis

import type { CanonicalPath } from '../../types/path'
import type { PathDiagnostics, PathIssue } from './types'
import { splitSubpaths, subpathSegments } from './subpathParsing'
import { segmentLength } from './geometryCalc'

/**
 * Full path diagnostics
 */
export function analyzePath(path: CanonicalPath): PathDiagnostics {
  const subpaths = splitSubpaths(path)
  const issues: PathIssue[] = []

  let length = 0
  let hasUnclosedPaths = false

  subpaths.forEach((subpath, index) => {
    const segments = subpathSegments(subpath)
    const subpathLength = segments.reduce((sum, segment) => sum + segmentLength(segment), 0)
    length += subpathLength

    if (!subpath.closed) hasUnclosedPaths = true

    if (segments.length === 0) {
      issues.push({
        type: 'degenerate',
        message: `Subpath ${index + 1} has a move and nothing to draw`,
        subpathIndex: index,
        severity: 'warning'
      })
    } else if (subpathLength === 0) {
      issues.push({
        type: 'zero-length',
        message: `Subpath ${index + 1} has zero length`,
        subpathIndex: index,
        severity: 'warning'
      })
    }
  })

  const hasCompoundPath = subpaths.length > 1

  if (hasCompoundPath) {
    issues.unshift({
      type: 'compound',
      message: `Path contains ${subpaths.length} subpaths`,
      severity: 'info'
    })
  }

  if (hasUnclosedPaths) {
    issues.push({
      type: 'unclosed',
      message: 'Path contains open subpaths',
      severity: 'info'
    })
  }

  return {
    subpathCount: subpaths.length,
    commandCount: path.length,
    length,
    hasCompoundPath,
    hasUnclosedPaths,
    issues
  }
}
