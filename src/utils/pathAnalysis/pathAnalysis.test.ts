import { describe, expect, it } from 'vitest'

import type { CanonicalPath } from '../../types/path'
import {
  analyzePath,
  joinSubpaths,
  pathBoundingBox,
  pathLength,
  splitSubpaths,
  subpathSegments,
} from '.'

const closedSquare: CanonicalPath = [
  { type: 'M', to: { x: 0, y: 0 } },
  { type: 'L', to: { x: 10, y: 0 } },
  { type: 'L', to: { x: 10, y: 10 } },
  { type: 'L', to: { x: 0, y: 10 } },
  { type: 'Z' },
]

describe('splitSubpaths', () => {
  it('splits at every move', () => {
    const path: CanonicalPath = [
      ...closedSquare,
      { type: 'M', to: { x: 20, y: 0 } },
      { type: 'L', to: { x: 30, y: 0 } },
    ]
    const subpaths = splitSubpaths(path)
    expect(subpaths).toHaveLength(2)
    expect(subpaths[0]).toEqual({ commands: closedSquare, closed: true, continued: false })
    expect(subpaths[1].closed).toBe(false)
  })

  it('starts a new subpath at the closing point when drawing follows a close', () => {
    const subpaths = splitSubpaths([...closedSquare, { type: 'L', to: { x: 5, y: 5 } }])
    expect(subpaths[1]).toEqual({
      commands: [
        { type: 'M', to: { x: 0, y: 0 } },
        { type: 'L', to: { x: 5, y: 5 } },
      ],
      closed: false,
      continued: true,
    })
  })
})

describe('joinSubpaths', () => {
  const path: CanonicalPath = [
    ...closedSquare,
    { type: 'L', to: { x: 5, y: 5 } },
    { type: 'M', to: { x: 20, y: 0 } },
    { type: 'L', to: { x: 30, y: 0 } },
  ]

  it('gives back the original commands when everything is kept', () => {
    expect(joinSubpaths(splitSubpaths(path))).toEqual(path)
  })

  it('keeps the added move when the closed subpath before it is dropped', () => {
    const joined = joinSubpaths(splitSubpaths(path), subpath => !subpath.closed)
    expect(joined).toEqual([
      { type: 'M', to: { x: 0, y: 0 } },
      { type: 'L', to: { x: 5, y: 5 } },
      { type: 'M', to: { x: 20, y: 0 } },
      { type: 'L', to: { x: 30, y: 0 } },
    ])
  })
})

describe('subpathSegments', () => {
  it('turns a close into a line back to the start', () => {
    const [subpath] = splitSubpaths(closedSquare)
    const segments = subpathSegments(subpath)
    expect(segments).toHaveLength(4)
    expect(segments[3]).toEqual({
      kind: 'line',
      from: { x: 0, y: 10 },
      to: { x: 0, y: 0 },
      commandIndex: 4,
    })
  })
})

describe('geometry', () => {
  it('measures length including the closing side', () => {
    expect(pathLength(closedSquare)).toBe(40)
  })

  it('bounds control points', () => {
    const path: CanonicalPath = [
      { type: 'M', to: { x: 0, y: 0 } },
      { type: 'C', c1: { x: 0, y: -5 }, c2: { x: 10, y: 5 }, to: { x: 10, y: 0 } },
    ]
    expect(pathBoundingBox(path)).toEqual({ x: 0, y: -5, width: 10, height: 10 })
  })
})

describe('analyzePath', () => {
  it('flags compound, open and zero-length subpaths', () => {
    const diagnostics = analyzePath([
      ...closedSquare,
      { type: 'M', to: { x: 50, y: 50 } },
      { type: 'L', to: { x: 50, y: 50 } },
    ])
    expect(diagnostics.subpathCount).toBe(2)
    expect(diagnostics.length).toBe(40)
    expect(diagnostics.hasCompoundPath).toBe(true)
    expect(diagnostics.hasUnclosedPaths).toBe(true)
    expect(diagnostics.issues.map(issue => issue.type)).toEqual(['compound', 'zero-length', 'unclosed'])
  })
})
