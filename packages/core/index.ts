export * from './src/env'
export * from './src/logger'
// Safe types for error handling
export {
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@bfstream/types'
export * from './src/zod'
