import { z } from 'zod'

export { z }

/**
 * Integer environment variable, unset or blank falls back to the default
 */
export const zEnvInt = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value.trim() === '') return defaultValue
      const parsed = Number(value)
      if (!Number.isInteger(parsed)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `expected an integer, got "${value}"`,
        })
        return z.NEVER
      }
      return parsed
    })
