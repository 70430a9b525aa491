// Polisher types

import type { CanonicalPath } from '../../types/path'

export interface PolishOptions {
  minLength?: number  // sub-paths shorter than this are dropped, 0 keeps everything
  verbose?: boolean
}

export interface PolishResult {
  subpaths: CanonicalPath[]
  removed: number
}
