import * as core from '@actions/core'
import { Config, configSchema, formatIssues } from './schemas'

export type { Config } from './schemas'

/**
 * Reads and validates the action inputs.
 *
 * @returns The action configuration.
 */
export function getConfig(): Config {
  const result = configSchema.safeParse({
    tree: core.getInput('tree', { required: true }),
    maxDepth: core.getInput('max-depth') || '5',
    indicateTruncation: core.getInput('indicate-truncation') || 'true',
    charset: core.getInput('charset') || 'unicode',
    printKeys: core.getInput('print-keys') || 'auto'
  })

  if (!result.success) {
    throw new Error(`Invalid configuration: ${formatIssues(result.error)}`)
  }

  const config = result.data
  core.debug(
    `Configuration: max-depth=${config.maxDepth}, indicate-truncation=${config.indicateTruncation}, charset=${config.charset}, print-keys=${config.printKeys ?? 'auto'}`
  )

  return config
}
