// Flattener types

import type { SourceSegment } from '../../types/shape'
import type { ParseError, PipelineIssue } from '../errors'

export interface FlattenOptions {
  arcTolerance?: number  // max deviation of an arc's cubic approximation (viewbox units)
}

/**
 * Where recovered problems are collected while a shape is flattened
 */
export interface FlattenContext {
  issues: PipelineIssue[]
  shapeIndex?: number
}

export interface PathDataResult {
  segments: SourceSegment[]
  error: ParseError | null  // set when reading stopped early
}
