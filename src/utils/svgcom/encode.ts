// .svgcom writer

import type { CanonicalStream, ViewBox } from '../../types/path'
import { SVGCOM } from '../../constants'
import { FormatError } from '../errors'
import { commandCoordinates } from './counts'
import type { SvgcomHeader } from './types'

/**
 * Shortest decimal that reads back to the same double; keeps the sign of -0
 */
export function formatCoordinate(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value)
}

function viewBoxField(name: string, value: number): number {
  const rounded = Math.ceil(value)
  if (!Number.isFinite(rounded) || rounded < 0 || rounded > SVGCOM.MAX_UINT32) {
    throw new FormatError('header', `viewbox ${name} ${value} does not fit an unsigned 32-bit integer`)
  }
  return rounded
}

export function streamHeader(viewBox: ViewBox, commandCount: number, coordinateCount: number): SvgcomHeader {
  return {
    width: viewBoxField('width', viewBox.width),
    height: viewBoxField('height', viewBox.height),
    commandCount,
    coordinateCount,
  }
}

/**
 * Serialize a canonical stream: header line, tag line, coordinate line
 */
export function encodeSvgcom(stream: CanonicalStream): string {
  const first = stream.commands[0]
  if (first !== undefined && first.type !== 'M') {
    throw new FormatError('commands', `stream must start with M, found "${first.type}"`)
  }

  const coords = commandCoordinates(stream.commands)
  const bad = coords.findIndex(value => !Number.isFinite(value))
  if (bad !== -1) {
    throw new FormatError('coordinates', `coordinate ${bad} is not a finite number (${coords[bad]})`)
  }

  const header = streamHeader(stream.viewBox, stream.commands.length, coords.length)
  const tags = stream.commands.map(cmd => cmd.type).join('')

  return [
    `${header.width} ${header.height} ${header.commandCount} ${header.coordinateCount}`,
    tags,
    coords.map(formatCoordinate).join(' '),
  ].join('\n') + '\n'
}
