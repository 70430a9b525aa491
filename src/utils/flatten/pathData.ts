// SVG path data (d attribute) reader - produces absolute source segments

import type { Point } from '../../types/path'
import type { SourceSegment } from '../../types/shape'
import { ParseError } from '../errors'
import type { PathDataResult } from './types'

const COMMAND_PATTERN = /[MmLlHhVvCcSsQqTtAaZz]/
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/
const SEPARATOR_PATTERN = /^[\s,]+/

// Arguments consumed per repetition of each command
const ARG_COUNTS: Record<string, number> = {
  m: 2, l: 2, h: 1, v: 1, c: 6, s: 4, q: 4, t: 2, a: 7, z: 0,
}

class PathDataScanner {
  private pos = 0

  constructor(private readonly d: string) {}

  skipSeparators(): void {
    const match = SEPARATOR_PATTERN.exec(this.d.slice(this.pos))
    if (match) this.pos += match[0].length
  }

  atEnd(): boolean {
    this.skipSeparators()
    return this.pos >= this.d.length
  }

  peekCommand(): string | null {
    this.skipSeparators()
    const char = this.d.charAt(this.pos)
    return COMMAND_PATTERN.test(char) ? char : null
  }

  readCommand(): string | null {
    const command = this.peekCommand()
    if (command) this.pos++
    return command
  }

  readNumber(): number | null {
    this.skipSeparators()
    const match = NUMBER_PATTERN.exec(this.d.slice(this.pos))
    if (!match) return null
    this.pos += match[0].length
    return parseFloat(match[0])
  }

  // Arc flags may be written without separators ("a1 1 0 011 1")
  readFlag(): number | null {
    this.skipSeparators()
    const char = this.d.charAt(this.pos)
    if (char !== '0' && char !== '1') return null
    this.pos++
    return char === '1' ? 1 : 0
  }

  get position(): number {
    return this.pos
  }
}

function readArguments(scanner: PathDataScanner, command: string): number[] | null {
  const lower = command.toLowerCase()
  const count = ARG_COUNTS[lower]
  const args: number[] = []
  for (let i = 0; i < count; i++) {
    const isFlag = lower === 'a' && (i === 3 || i === 4)
    const value = isFlag ? scanner.readFlag() : scanner.readNumber()
    if (value === null) return null
    args.push(value)
  }
  return args
}

function reflect(point: Point, around: Point): Point {
  return { x: 2 * around.x - point.x, y: 2 * around.y - point.y }
}

/**
 * Read an SVG path data string into absolute segments.
 * Stops at the first malformed command and reports it; segments read up to
 * that point are kept, as SVG renderers do.
 */
export function parsePathData(d: string): PathDataResult {
  const scanner = new PathDataScanner(d)
  const segments: SourceSegment[] = []

  let current: Point = { x: 0, y: 0 }
  let subpathStart: Point = { x: 0, y: 0 }
  let lastCubicControl: Point | null = null
  let lastQuadControl: Point | null = null
  let command: string | null = null

  const fail = (message: string): PathDataResult => ({
    segments,
    error: new ParseError(`${message} at offset ${scanner.position} in path data`),
  })

  while (!scanner.atEnd()) {
    const explicit = scanner.readCommand()
    if (explicit) command = explicit
    if (command === null) {
      return fail('Path data must start with a command')
    }
    if (!explicit && (command === 'z' || command === 'Z')) {
      return fail('Unexpected number after close')
    }

    if (segments.length === 0 && command !== 'M' && command !== 'm') {
      return fail('Path data must start with a move')
    }

    const args = readArguments(scanner, command)
    if (args === null) {
      return fail(`Missing or malformed arguments for "${command}"`)
    }

    const relative: boolean = command === command.toLowerCase()
    const ox = relative ? current.x : 0
    const oy = relative ? current.y : 0
    let nextCubicControl: Point | null = null
    let nextQuadControl: Point | null = null

    switch (command.toLowerCase()) {
      case 'm': {
        current = { x: ox + args[0], y: oy + args[1] }
        subpathStart = current
        segments.push({ type: 'move', to: current })
        // Further coordinate pairs after a move are implicit lines
        command = relative ? 'l' : 'L'
        break
      }
      case 'l':
        current = { x: ox + args[0], y: oy + args[1] }
        segments.push({ type: 'line', to: current })
        break
      case 'h':
        current = { x: ox + args[0], y: current.y }
        segments.push({ type: 'line', to: current })
        break
      case 'v':
        current = { x: current.x, y: oy + args[0] }
        segments.push({ type: 'line', to: current })
        break
      case 'c': {
        const c1 = { x: ox + args[0], y: oy + args[1] }
        const c2 = { x: ox + args[2], y: oy + args[3] }
        current = { x: ox + args[4], y: oy + args[5] }
        segments.push({ type: 'cubic', c1, c2, to: current })
        nextCubicControl = c2
        break
      }
      case 's': {
        const c1 = lastCubicControl ? reflect(lastCubicControl, current) : current
        const c2 = { x: ox + args[0], y: oy + args[1] }
        current = { x: ox + args[2], y: oy + args[3] }
        segments.push({ type: 'cubic', c1, c2, to: current })
        nextCubicControl = c2
        break
      }
      case 'q': {
        const control = { x: ox + args[0], y: oy + args[1] }
        current = { x: ox + args[2], y: oy + args[3] }
        segments.push({ type: 'quad', control, to: current })
        nextQuadControl = control
        break
      }
      case 't': {
        const control: Point = lastQuadControl ? reflect(lastQuadControl, current) : current
        current = { x: ox + args[0], y: oy + args[1] }
        segments.push({ type: 'quad', control, to: current })
        nextQuadControl = control
        break
      }
      case 'a':
        current = { x: ox + args[5], y: oy + args[6] }
        segments.push({
          type: 'arc',
          rx: args[0],
          ry: args[1],
          rotation: args[2],
          largeArc: args[3] === 1,
          sweep: args[4] === 1,
          to: current,
        })
        break
      case 'z':
        segments.push({ type: 'close' })
        current = subpathStart
        break
    }

    lastCubicControl = nextCubicControl
    lastQuadControl = nextQuadControl
  }

  return { segments, error: null }
}
