// Canonical file format types

/**
 * The four integers on the first line of a .svgcom file
 */
export interface SvgcomHeader {
  width: number
  height: number
  commandCount: number
  coordinateCount: number  // always even: coordinates come in (x, y) pairs
}

export interface DecodeOptions {
  verbose?: boolean
}
