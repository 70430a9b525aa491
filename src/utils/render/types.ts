// Renderer types

export interface RenderOptions {
  stroke?: string       // any SVG paint value
  strokeWidth?: number
  verbose?: boolean
}
