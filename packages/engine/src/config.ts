/**
 * Engine Configuration Constants
 *
 * Baseline opcodes, defaults, and the schemas validating engine options
 * passed in code or through the environment.
 */

import { createEnvSchema, loadEnvVariables, z, zEnvInt } from '@bfstream/core'
import type { CellWidth, EngineOptions } from '@bfstream/types'

// Baseline instruction set, one byte each
export const OPCODES = {
  MOVE_RIGHT: 0x3e, // '>'
  MOVE_LEFT: 0x3c, // '<'
  INCREMENT: 0x2b, // '+'
  DECREMENT: 0x2d, // '-'
  OUTPUT: 0x2e, // '.'
  INPUT: 0x2c, // ','
  LOOP_START: 0x5b, // '['
  LOOP_END: 0x5d, // ']'
} as const

// Loop markers drive the loop stack and the cache, handlers may not replace them
export const PROTECTED_OPCODES: ReadonlySet<number> = new Set([
  OPCODES.LOOP_START,
  OPCODES.LOOP_END,
])

export const ENGINE_DEFAULTS = {
  MEMORY_SIZE: 4096,
  CELL_WIDTH: 32,
  STEP_LIMIT: null,
  TRACE: false,
} as const

export const cellWidthSchema = z.union([
  z.literal(8),
  z.literal(16),
  z.literal(32),
])

export const engineOptionsSchema = z.object({
  memorySize: z
    .number()
    .int()
    .nonnegative()
    .default(ENGINE_DEFAULTS.MEMORY_SIZE)
    .transform((size) => (size === 0 ? ENGINE_DEFAULTS.MEMORY_SIZE : size)),
  cellWidth: cellWidthSchema.default(ENGINE_DEFAULTS.CELL_WIDTH),
  stepLimit: z
    .number()
    .int()
    .positive()
    .nullable()
    .default(ENGINE_DEFAULTS.STEP_LIMIT),
  trace: z.boolean().default(ENGINE_DEFAULTS.TRACE),
})

export type ResolvedEngineOptions = z.output<typeof engineOptionsSchema>

/**
 * Validate options and fill in defaults
 * @throws ZodError on invalid values
 */
export function resolveEngineOptions(
  options: EngineOptions = {},
): ResolvedEngineOptions {
  return engineOptionsSchema.parse(options)
}

export const engineEnvSchema = createEnvSchema({
  BF_MEMORY_SIZE: zEnvInt(ENGINE_DEFAULTS.MEMORY_SIZE),
  BF_CELL_WIDTH: zEnvInt(ENGINE_DEFAULTS.CELL_WIDTH).pipe(cellWidthSchema),
  BF_STEP_LIMIT: zEnvInt(0),
  BF_TRACE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
})

/**
 * Engine options from `BF_*` environment variables (and a .env file)
 * @param source - Variables to read instead of `process.env`
 */
export function loadEngineOptions(
  envPath?: string,
  source?: Record<string, string | undefined>,
): ResolvedEngineOptions {
  const env = loadEnvVariables(engineEnvSchema, envPath, source)
  const cellWidth: CellWidth = env.BF_CELL_WIDTH

  return resolveEngineOptions({
    memorySize: env.BF_MEMORY_SIZE,
    cellWidth,
    stepLimit: env.BF_STEP_LIMIT > 0 ? env.BF_STEP_LIMIT : null,
    trace: env.BF_TRACE,
  })
}
