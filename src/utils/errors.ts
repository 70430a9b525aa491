// Error taxonomy shared by the generate and render pipelines

export type FormatField = 'header' | 'commands' | 'coordinates'

export class SvgcomError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Malformed source shape parameters. Recovered locally: the shape degrades
 * instead of aborting the document.
 */
export class ParseError extends SvgcomError {
  constructor(message: string, readonly shapeIndex?: number) {
    super(shapeIndex === undefined ? message : `Shape ${shapeIndex}: ${message}`)
  }
}

/**
 * Degenerate occluder fill. The occluder contributes no coverage.
 */
export class GeometryError extends SvgcomError {
  constructor(message: string, readonly shapeIndex: number) {
    super(`Shape ${shapeIndex}: ${message}`)
  }
}

/**
 * Malformed .svgcom data. Fatal for the whole read.
 */
export class FormatError extends SvgcomError {
  constructor(readonly field: FormatField, message: string) {
    super(`Invalid ${field}: ${message}`)
  }
}

// Problems that were recovered from and reported alongside a result
export type PipelineIssue = ParseError | GeometryError
