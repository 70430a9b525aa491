import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { SourceDocument, Shape } from './types/shape'
import { generate, generateSvgcom } from './pipeline'
import { ParseError } from './utils/errors'
import { decodeSvgcom } from './utils/svgcom'
import { parsePathData } from './utils/flatten'

function pathShape(d: string, z: number, extra: Partial<Shape> = {}): Shape {
  return { outline: { kind: 'path', segments: parsePathData(d).segments }, stroke: true, z, ...extra }
}

describe('generate', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('writes the canonical form of a closed four-point path', () => {
    const document: SourceDocument = {
      viewBox: { width: 720, height: 480 },
      shapes: [pathShape('M0 0 L100 0 L100 70 L0 70 Z', 0)],
    }
    expect(generateSvgcom(document)).toBe('720 480 5 8\nMLLLZ\n0 0 100 0 100 70 0 70\n')
  })

  it('gives a rect primitive the same canonical form', () => {
    const document: SourceDocument = {
      viewBox: { width: 720, height: 480 },
      shapes: [{ outline: { kind: 'rect', x: 0, y: 0, width: 100, height: 70 }, stroke: true, z: 0 }],
    }
    expect(generateSvgcom(document)).toBe('720 480 5 8\nMLLLZ\n0 0 100 0 100 70 0 70\n')
  })

  it('keeps the coordinate count in step with the commands', () => {
    const document: SourceDocument = {
      viewBox: { width: 200, height: 200 },
      shapes: [
        pathShape('M10 10 Q50 0 90 10 A20 20 0 0 1 90 50 C80 60 70 60 60 50 Z', 0),
        { outline: { kind: 'circle', cx: 100, cy: 100, r: 30 }, stroke: true, z: 1 },
        { outline: { kind: 'polyline', points: [{ x: 0, y: 0 }, { x: 5, y: 5 }] }, stroke: true, z: 2 },
      ],
    }
    const { stream } = generate(document)
    const count = (tag: string) => stream.commands.filter(cmd => cmd.type === tag).length
    const decoded = decodeSvgcom(generateSvgcom(document))

    expect(decoded).toEqual(stream)
    const header = generateSvgcom(document).split('\n')[0].split(' ').map(Number)
    expect(header[3]).toBe(2 * (count('M') + count('L')) + 6 * count('C'))
  })

  it('outputs stroked shapes only, in document order', () => {
    const document: SourceDocument = {
      viewBox: { width: 100, height: 100 },
      shapes: [
        pathShape('M1 1 L2 2', 0),
        pathShape('M3 3 L4 4', 1, { stroke: false }),
        pathShape('M5 5 L6 6', 2),
      ],
    }
    expect(generate(document).stream.commands).toEqual([
      { type: 'M', to: { x: 1, y: 1 } },
      { type: 'L', to: { x: 2, y: 2 } },
      { type: 'M', to: { x: 5, y: 5 } },
      { type: 'L', to: { x: 6, y: 6 } },
    ])
  })

  it('collects recovered problems next to the result', () => {
    const document: SourceDocument = {
      viewBox: { width: 100, height: 100 },
      shapes: [
        { outline: { kind: 'circle', cx: 0, cy: 0, r: -1 }, stroke: true, z: 0 },
        pathShape('M0 0 A0 0 0 0 1 10 0', 1),
      ],
    }
    const { stream, issues } = generate(document)
    expect(stream.commands).toEqual([
      { type: 'M', to: { x: 0, y: 0 } },
      { type: 'L', to: { x: 10, y: 0 } },
    ])
    expect(issues).toHaveLength(2)
    expect(issues.every(issue => issue instanceof ParseError)).toBe(true)
    expect(issues.map(issue => issue.shapeIndex)).toEqual([0, 1])
  })

  it('runs autocut only when asked', () => {
    const document: SourceDocument = {
      viewBox: { width: 100, height: 100 },
      shapes: [
        pathShape('M20 50 L80 50', 0),
        {
          outline: { kind: 'rect', x: 0, y: 0, width: 100, height: 100 },
          stroke: false,
          fill: { outline: { kind: 'rect', x: 0, y: 0, width: 100, height: 100 } },
          z: 1,
        },
      ],
    }
    expect(generateSvgcom(document)).toBe('100 100 2 4\nML\n20 50 80 50\n')
    expect(generateSvgcom(document, { autocut: true })).toBe('100 100 0 0\n\n\n')
  })

  it('polishes away short sub-paths', () => {
    const document: SourceDocument = {
      viewBox: { width: 720, height: 480 },
      shapes: [pathShape('M0 0 L0.1 0 M10 10 L20 10', 0)],
    }
    const plain = generate(document).stream
    expect(generate(document, { polish: true, minLength: 0 }).stream).toEqual(plain)
    expect(generate(document, { polish: true }).stream.commands).toEqual([
      { type: 'M', to: { x: 10, y: 10 } },
      { type: 'L', to: { x: 20, y: 10 } },
    ])
    expect(generate(document, { polish: true, minLength: 1e9 }).stream.commands).toEqual([])
  })

  it('polishes paths that keep drawing after a close', () => {
    const document: SourceDocument = {
      viewBox: { width: 720, height: 480 },
      shapes: [pathShape('M0 0 L1 0 Z L30 40', 0)],
    }
    const plain = generate(document).stream
    expect(generateSvgcom(document)).toBe('720 480 4 6\nMLZL\n0 0 1 0 30 40\n')
    expect(generate(document, { polish: true, minLength: 0 }).stream).toEqual(plain)
    expect(generate(document, { polish: true, minLength: 10 }).stream.commands).toEqual([
      { type: 'M', to: { x: 0, y: 0 } },
      { type: 'L', to: { x: 30, y: 40 } },
    ])
  })

  it('logs progress when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    generate({ viewBox: { width: 10, height: 10 }, shapes: [pathShape('M0 0 L3 4', 0)] }, { verbose: true })
    expect(log).toHaveBeenCalledWith('[pipeline] path 0: 1 sub-path(s), 2 command(s), length 5.000')
    expect(log).toHaveBeenCalledWith('[pipeline] 1 shape(s) -> 2 command(s), 0 issue(s)')
  })

  it('logs path warnings when verbose', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    generate({ viewBox: { width: 10, height: 10 }, shapes: [pathShape('M1 1 L1 1', 0)] }, { verbose: true })
    expect(log).toHaveBeenCalledWith('[pipeline] path 0: Subpath 1 has zero length')
    expect(log).not.toHaveBeenCalledWith('[pipeline] path 0: Path contains open subpaths')
  })
})
