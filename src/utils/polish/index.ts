// Polish module exports

export type {
  PolishOptions,
  PolishResult,
} from './types'

export {
  defaultMinLength,
  polishPaths,
} from './polish'
