import * as core from '@actions/core'
import { presetCharset } from './charset'
import { getConfig } from './config'
import { parseTree } from './parser'
import { treeToString } from './tree'

export function run(): void {
  try {
    // Get action configuration.
    const config = getConfig()

    // Parse the document to render.
    const tree = parseTree(config.tree)

    const text = treeToString(tree, {
      maxDepth: config.maxDepth,
      indicateTruncation: config.indicateTruncation,
      charset: presetCharset(config.charset),
      printKeys: config.printKeys
    })

    core.startGroup('Render tree.')
    for (const line of text.replace(/\n$/, '').split('\n')) {
      core.info(line)
    }
    core.endGroup()

    core.setOutput('tree', text)
  } catch (error) {
    // Fail the workflow run if an error occurs.
    core.setFailed(error instanceof Error ? error.message : String(error))
  }
}
