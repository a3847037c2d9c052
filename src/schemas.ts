/**
 * Zod schemas for validating print options and action inputs.
 */

import { z } from 'zod'
import { ChildrenGetter } from './children'
import { KeyPolicy } from './keys'

/**
 * Branch glyphs. Every glyph must be a non-empty string.
 */
export const charsetSchema = z.object({
  mid: z.string().min(1),
  terminator: z.string().min(1),
  skip: z.string().min(1),
  dash: z.string().min(1),
  trunc: z.string().min(1),
  pair: z.string().min(1)
})

/**
 * Options accepted by the tree printer. Every field is optional; defaults are
 * filled in by `resolvePrintOptions`.
 */
export const printOptionsSchema = z.object({
  maxDepth: z.number().int().nonnegative().optional(),
  indicateTruncation: z.boolean().optional(),
  charset: charsetSchema.optional(),
  printKeys: z.boolean().optional(),
  keyPolicy: z.instanceof(KeyPolicy).optional(),
  children: z
    .custom<ChildrenGetter>(
      value => typeof value === 'function',
      'Expected a function'
    )
    .optional()
})

/**
 * Action inputs, as read from the workflow. All values arrive as strings.
 */
export const configSchema = z.object({
  tree: z.string().min(1, 'Input tree is required'),
  maxDepth: z
    .string()
    .regex(/^\d+$/, 'Input max-depth must be a non-negative integer')
    .transform(Number),
  indicateTruncation: z
    .enum(
      ['true', 'false'],
      'Input indicate-truncation must be true or false'
    )
    .transform(value => value === 'true'),
  charset: z.enum(['unicode', 'ascii'], 'Invalid character set preset'),
  printKeys: z
    .enum(
      ['auto', 'true', 'false'],
      'Input print-keys must be auto, true or false'
    )
    .transform(value => (value === 'auto' ? undefined : value === 'true'))
})

export type Config = z.output<typeof configSchema>

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ')
}
