// Svgcom codec exports

export type {
  SvgcomHeader,
  DecodeOptions,
} from './types'

export {
  isCommandTag,
  countCoordinates,
  commandCoordinates,
} from './counts'

export {
  formatCoordinate,
  streamHeader,
  encodeSvgcom,
} from './encode'

export {
  parseHeader,
  decodeSvgcom,
} from './decode'
