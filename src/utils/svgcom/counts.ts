// Coordinate bookkeeping shared by the encoder and decoder

import type { CommandTag, PathCommand } from '../../types/path'
import { SVGCOM } from '../../constants'

export function isCommandTag(char: string): char is CommandTag {
  return char === 'M' || char === 'L' || char === 'C' || char === 'Z'
}

/**
 * Coordinates a tag sequence consumes: 2 per M and L, 6 per C, none for Z
 */
export function countCoordinates(tags: Iterable<CommandTag>): number {
  let total = 0
  for (const tag of tags) {
    total += SVGCOM.COORDINATES_PER_COMMAND[tag]
  }
  return total
}

/**
 * Flat (x, y)-interleaved coordinates of a command list, in emission order
 */
export function commandCoordinates(commands: PathCommand[]): number[] {
  const coords: number[] = []
  for (const cmd of commands) {
    switch (cmd.type) {
      case 'M':
      case 'L':
        coords.push(cmd.to.x, cmd.to.y)
        break
      case 'C':
        coords.push(cmd.c1.x, cmd.c1.y, cmd.c2.x, cmd.c2.y, cmd.to.x, cmd.to.y)
        break
      case 'Z':
        break
    }
  }
  return coords
}
