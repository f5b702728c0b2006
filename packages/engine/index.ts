/**
 * Engine Package Exports
 *
 * Streaming execution engine for the eight-instruction tape language
 */

// Logger
export { logger } from '@bfstream/core'
// Re-export types from centralized types package
export * from '@bfstream/types'
// Configuration constants
export {
  cellWidthSchema,
  ENGINE_DEFAULTS,
  engineEnvSchema,
  engineOptionsSchema,
  loadEngineOptions,
  OPCODES,
  PROTECTED_OPCODES,
  type ResolvedEngineOptions,
  resolveEngineOptions,
} from './src/config'
export { StreamingEngine } from './src/engine'
export { InstructionCache } from './src/instruction-cache'
// Instruction system
export { BaseInstruction, toOpcode } from './src/instructions/base'
export {
  LOOP_ENDInstruction,
  LOOP_STARTInstruction,
} from './src/instructions/control-flow'
export { INPUTInstruction, OUTPUTInstruction } from './src/instructions/io'
export {
  DECREMENTInstruction,
  INCREMENTInstruction,
  MOVE_LEFTInstruction,
  MOVE_RIGHTInstruction,
} from './src/instructions/memory'
export { InstructionRegistry } from './src/instructions/registry'
export { EngineLoopStack } from './src/loop-stack'
export { CellTape } from './src/tape'
