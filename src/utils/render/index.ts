// Render module exports

export type { RenderOptions } from './types'

export {
  splitRuns,
  toPathData,
  renderSvg,
  renderSvgcom,
} from './render'
