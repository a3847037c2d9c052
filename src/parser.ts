import * as core from '@actions/core'

/**
 * Parses the JSON document to render.
 *
 * @param jsonString - The document text.
 * @returns The parsed value; arrays and objects become inner nodes.
 */
export function parseTree(jsonString: string): unknown {
  // Input validation
  if (typeof jsonString !== 'string') {
    throw new Error('Invalid JSON data')
  }

  // Parse JSON
  let parsed: unknown
  try {
    parsed = JSON.parse(jsonString)
  } catch (error) {
    core.info(
      `JSON parse error: ${error instanceof Error ? error.message : 'Unknown error'}`
    )
    core.info(`Input: ${jsonString}`)
    throw new Error('Invalid JSON data')
  }

  return parsed
}
