// Flatten module exports

// Re-export types
export type {
  FlattenOptions,
  FlattenContext,
  PathDataResult,
} from './types'

// Re-export flattening
export {
  flattenSegments,
  flattenOutline,
  flattenShape,
} from './flatten'

// Re-export primitive expansion
export {
  primitiveToSegments,
} from './shapes'

// Re-export path data reading
export {
  parsePathData,
} from './pathData'
