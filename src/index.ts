// Public entry point

export type {
  Point,
  PathCommand,
  CommandTag,
  CanonicalPath,
  ViewBox,
  CanonicalStream,
} from './types/path'

export type {
  SourceSegment,
  ShapeOutline,
  ShapeKind,
  FillRule,
  Fill,
  Shape,
  SourceDocument,
} from './types/shape'

export {
  SvgcomError,
  ParseError,
  GeometryError,
  FormatError,
} from './utils/errors'
export type { FormatField, PipelineIssue } from './utils/errors'

export {
  FLATTEN,
  AUTOCUT,
  POLISH,
  RENDER_DEFAULTS,
  SVGCOM,
} from './constants'

export { generate, generateSvgcom } from './pipeline'
export type { GenerateOptions, GenerateResult } from './pipeline'

export {
  flattenSegments,
  flattenOutline,
  flattenShape,
  parsePathData,
} from './utils/flatten'
export type { FlattenOptions, PathDataResult } from './utils/flatten'

export {
  autocut,
  cutPath,
  buildOccluderSnapshot,
  isCovered,
} from './utils/autocut'
export type { AutocutOptions, AutocutResult, Occluder, OccluderSnapshot, PreparedShape } from './utils/autocut'

export { polishPaths, defaultMinLength } from './utils/polish'
export type { PolishOptions, PolishResult } from './utils/polish'

export {
  encodeSvgcom,
  decodeSvgcom,
  countCoordinates,
} from './utils/svgcom'
export type { SvgcomHeader } from './utils/svgcom'

export { renderSvg, renderSvgcom, toPathData } from './utils/render'
export type { RenderOptions } from './utils/render'

export { analyzePath, pathLength } from './utils/pathAnalysis'
export type { PathDiagnostics } from './utils/pathAnalysis'
