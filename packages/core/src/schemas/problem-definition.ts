/**
 * Problem Definition Schema
 *
 * Zod schema for validating problem JSON files:
 *
 * {
 *   "ios": [{ "input": [1, "A"], "output": [1, "A"] }],
 *   "memory": { "full": [null, 5] },
 *   "commands": ["INBOX", "OUTBOX"]
 * }
 */

import {
  COMMAND_KEYWORDS,
  charValue,
  intValue,
  isSingleChar,
  PROBLEM_LIMITS,
  type Safe,
  safeError,
  safeResult,
  VALUE_LIMITS,
} from '@hrm/types'
import { z } from 'zod'

// ============================================================================
// Values
// ============================================================================

/** Integer within 32 bits */
const intSchema = z
  .number()
  .int('Integer values must be whole numbers')
  .min(VALUE_LIMITS.MIN_INT)
  .max(VALUE_LIMITS.MAX_INT)
  .transform((val) => intValue(val))

/** Single character */
const charSchema = z
  .string()
  .refine(isSingleChar, 'Character values must be exactly one character')
  .transform((val) => charValue(val))

export const valueSchema = z.union([intSchema, charSchema])

// ============================================================================
// IO cases
// ============================================================================

export const problemIoSchema = z.object({
  input: z.array(valueSchema),
  output: z.array(valueSchema),
})

// ============================================================================
// Memory
// ============================================================================

/** Every cell listed, `null` for an empty one */
const fullMemorySchema = z.object({
  full: z
    .array(valueSchema.nullable())
    .max(PROBLEM_LIMITS.MAX_MEMORY_SIZE, 'Memory is too large'),
})

/** Memory size plus the seeded cells only */
const partialMemorySchema = z.object({
  partial: z.object({
    dim: z
      .number()
      .int()
      .min(0)
      .max(PROBLEM_LIMITS.MAX_MEMORY_SIZE, 'Memory is too large'),
    values: z.record(
      z.string().regex(/^\d+$/, 'Memory slots must be unsigned integers'),
      valueSchema,
    ),
  }),
})

export const memoryDefinitionSchema = z.union([
  fullMemorySchema,
  partialMemorySchema,
])

// ============================================================================
// Problem
// ============================================================================

export const problemDefinitionSchema = z.object({
  ios: z.array(problemIoSchema).min(1, 'At least one IO case is required'),
  memory: memoryDefinitionSchema.optional(),
  commands: z.array(z.enum(COMMAND_KEYWORDS)),
})

export type ProblemDefinition = z.infer<typeof problemDefinitionSchema>
export type MemoryDefinition = z.infer<typeof memoryDefinitionSchema>
export type ProblemIoDefinition = z.infer<typeof problemIoSchema>

/**
 * Validate an already parsed problem definition
 */
export function validateProblemDefinition(
  data: unknown,
): Safe<ProblemDefinition> {
  const result = problemDefinitionSchema.safeParse(data)

  if (result.success) {
    return safeResult(result.data)
  }

  return safeError(new Error(result.error.message))
}

/**
 * Parse and validate a problem definition from JSON string
 */
export function parseProblemDefinition(
  jsonString: string,
): Safe<ProblemDefinition> {
  try {
    const parsed: unknown = JSON.parse(jsonString)
    return validateProblemDefinition(parsed)
  } catch (error) {
    return safeError(
      new Error(
        `Failed to parse JSON: ${error instanceof Error ? error.message : 'Unknown error'}`,
      ),
    )
  }
}
