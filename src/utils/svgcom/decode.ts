// .svgcom reader

import type { CanonicalStream, CommandTag, PathCommand, Point } from '../../types/path'
import { SVGCOM } from '../../constants'
import { FormatError } from '../errors'
import { countCoordinates, isCommandTag } from './counts'
import type { DecodeOptions, SvgcomHeader } from './types'

const UINT_PATTERN = /^\d+$/
const FLOAT_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

function tokens(line: string): string[] {
  return line.split(/\s+/).filter(token => token.length > 0)
}

/**
 * Read the first line: exactly four unsigned 32-bit integers
 */
export function parseHeader(line: string): SvgcomHeader {
  const fields = tokens(line)
  if (fields.length !== 4) {
    throw new FormatError('header', `expected 4 fields, found ${fields.length}`)
  }

  const values = fields.map((field, i) => {
    const value = UINT_PATTERN.test(field) ? Number(field) : NaN
    if (!(value <= SVGCOM.MAX_UINT32)) {
      throw new FormatError('header', `field ${i + 1} "${field}" is not an unsigned 32-bit integer`)
    }
    return value
  })

  const [width, height, commandCount, coordinateCount] = values
  if (coordinateCount % 2 !== 0) {
    throw new FormatError('coordinates', `declared coordinate count ${coordinateCount} is odd`)
  }
  return { width, height, commandCount, coordinateCount }
}

function parseTags(line: string, header: SvgcomHeader): CommandTag[] {
  const chars = line.trim().split('')
  if (chars.length !== header.commandCount) {
    throw new FormatError('commands', `declared ${header.commandCount} commands, found ${chars.length}`)
  }

  const tags: CommandTag[] = []
  chars.forEach((char, i) => {
    if (!isCommandTag(char)) {
      throw new FormatError('commands', `unknown command "${char}" at position ${i}`)
    }
    tags.push(char)
  })

  if (tags.length > 0 && tags[0] !== 'M') {
    throw new FormatError('commands', `stream must start with M, found "${tags[0]}"`)
  }
  return tags
}

function parseCoordinates(line: string, header: SvgcomHeader): number[] {
  const fields = tokens(line)
  if (fields.length !== header.coordinateCount) {
    throw new FormatError('coordinates', `declared ${header.coordinateCount} coordinates, found ${fields.length}`)
  }

  return fields.map((field, i) => {
    const value = FLOAT_PATTERN.test(field) ? Number(field) : NaN
    if (!Number.isFinite(value)) {
      throw new FormatError('coordinates', `coordinate ${i} "${field}" is not a finite number`)
    }
    return value
  })
}

function buildCommands(tags: CommandTag[], coords: number[]): PathCommand[] {
  let cursor = 0
  const next = (): Point => {
    const point = { x: coords[cursor], y: coords[cursor + 1] }
    cursor += 2
    return point
  }

  return tags.map((tag): PathCommand => {
    switch (tag) {
      case 'M':
        return { type: 'M', to: next() }
      case 'L':
        return { type: 'L', to: next() }
      case 'C': {
        const c1 = next()
        const c2 = next()
        return { type: 'C', c1, c2, to: next() }
      }
      case 'Z':
        return { type: 'Z' }
    }
  })
}

/**
 * Parse .svgcom text. Lines after the coordinate line are ignored.
 * Any violation throws FormatError naming the offending field.
 */
export function decodeSvgcom(text: string, options: DecodeOptions = {}): CanonicalStream {
  const [headerLine = '', tagLine = '', coordLine = ''] = text.split('\n')

  const header = parseHeader(headerLine)
  const tags = parseTags(tagLine, header)

  const required = countCoordinates(tags)
  if (required !== header.coordinateCount) {
    throw new FormatError(
      'coordinates',
      `commands require ${required} coordinates, header declares ${header.coordinateCount}`
    )
  }

  const coords = parseCoordinates(coordLine, header)

  if (options.verbose) {
    console.log(`[svgcom] read ${header.commandCount} commands, ${header.coordinateCount} coordinates`)
  }

  return {
    viewBox: { width: header.width, height: header.height },
    commands: buildCommands(tags, coords),
  }
}
