// Generate pipeline: flatten, optionally cut and polish, then assemble the canonical stream

import type { CanonicalPath, CanonicalStream } from './types/path'
import type { SourceDocument } from './types/shape'
import type { PipelineIssue } from './utils/errors'
import { flattenShape } from './utils/flatten'
import type { FlattenOptions } from './utils/flatten'
import { autocut } from './utils/autocut'
import type { AutocutOptions, PreparedShape } from './utils/autocut'
import { polishPaths } from './utils/polish'
import { analyzePath, joinSubpaths, splitSubpaths } from './utils/pathAnalysis'
import { encodeSvgcom } from './utils/svgcom'

export interface GenerateOptions extends FlattenOptions, AutocutOptions {
  autocut?: boolean    // remove stroke stretches hidden behind fills painted above
  polish?: boolean     // drop sub-paths shorter than minLength
  minLength?: number   // defaults to a fraction of the viewbox diagonal
  verbose?: boolean
}

export interface GenerateResult {
  stream: CanonicalStream
  issues: PipelineIssue[]  // recovered problems, also logged as they happen
}

function prepareShapes(
  document: SourceDocument,
  options: GenerateOptions,
  issues: PipelineIssue[]
): PreparedShape[] {
  return document.shapes.map((shape, index) => ({
    index,
    z: shape.z,
    stroke: shape.stroke,
    // Only stroked outlines are drawn; fills are flattened by the occlusion pass
    path: shape.stroke ? flattenShape(shape, index, { arcTolerance: options.arcTolerance }, issues) : [],
    fill: shape.fill,
  }))
}

/**
 * Run the generate direction over a document. Stroke output keeps document
 * order; recovered ParseError and GeometryError values come back in `issues`.
 */
export function generate(document: SourceDocument, options: GenerateOptions = {}): GenerateResult {
  const issues: PipelineIssue[] = []
  const shapes = prepareShapes(document, options, issues)

  let paths: CanonicalPath[]
  if (options.autocut) {
    paths = autocut(shapes, document.viewBox, options, issues).flatMap(result => result.subpaths)
  } else {
    paths = shapes.filter(shape => shape.stroke).map(shape => shape.path)
  }
  paths = paths.filter(path => path.length > 0)

  if (options.verbose) {
    paths.forEach((path, i) => {
      const diagnostics = analyzePath(path)
      console.log(`[pipeline] path ${i}: ${diagnostics.subpathCount} sub-path(s), ${diagnostics.commandCount} command(s), length ${diagnostics.length.toFixed(3)}`)
      for (const issue of diagnostics.issues) {
        if (issue.severity !== 'info') console.log(`[pipeline] path ${i}: ${issue.message}`)
      }
    })
  }

  if (options.polish) {
    const subpaths = paths.flatMap(path => splitSubpaths(path))
    const kept = new Set(polishPaths(subpaths.map(subpath => subpath.commands), document.viewBox, {
      minLength: options.minLength,
      verbose: options.verbose,
    }).subpaths)
    paths = [joinSubpaths(subpaths, subpath => kept.has(subpath.commands))]
  }

  const commands = paths.flat()
  if (options.verbose) {
    console.log(`[pipeline] ${document.shapes.length} shape(s) -> ${commands.length} command(s), ${issues.length} issue(s)`)
  }

  return {
    stream: { viewBox: document.viewBox, commands },
    issues,
  }
}

/**
 * Generate and serialize in one step
 */
export function generateSvgcom(document: SourceDocument, options: GenerateOptions = {}): string {
  return encodeSvgcom(generate(document, options).stream)
}
