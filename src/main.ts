import * as core from '@actions/core'
import { dirname, join } from 'node:path'

import { Collector } from './collector/collector.js'
import { MANIFEST_FILE } from './config/constants.js'
import { parseInputs, validateConfig } from './config/inputs.js'
import type { RunConfig } from './config/types.js'
import { GitHubAPI } from './github/api.js'
import type { GitHubClient } from './github/api.js'
import { formatReference, parseReference } from './github/reference.js'
import { PublishExecutor, hasBlockingFailure } from './publish/executor.js'
import { IdempotencyGuard } from './publish/guard.js'
import { loadIntent, writeResults } from './publish/intent.js'
import { CollectionError } from './utils/errors.js'
import { logger } from './utils/logger.js'

export type ClientFactory = (config: RunConfig) => GitHubClient

const createGitHubAPI: ClientFactory = (config) =>
  new GitHubAPI({
    token: config.github.token,
    timeoutMs: config.github.timeoutMs
  })

export async function run(
  createClient: ClientFactory = createGitHubAPI
): Promise<void> {
  try {
    logger.info('Starting threadline...')

    const config = parseInputs()
    validateConfig(config)

    logger.info(`Command: ${config.command}`)
    const client = createClient(config)

    if (config.command === 'collect') {
      await collect(config, client)
    } else {
      await publish(config, client)
    }
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error)
      core.setFailed(error.message)
    } else {
      const errorMessage = 'An unknown error occurred'
      logger.error(errorMessage)
      core.setFailed(errorMessage)
    }
  }
}

async function collect(config: RunConfig, client: GitHubClient): Promise<void> {
  const { ref: input, ...options } = config.collect
  const target = parseReference(input, config.github.repoHint)
  logger.info(`Collecting context for ${formatReference(target)}`)

  core.setOutput('context_dir', options.contextDir)

  try {
    const result = await new Collector(client).collect(target, options)

    core.setOutput('manifest_path', result.manifestPath)
    core.setOutput('success', String(result.manifest.success))
    core.setOutput('kind', result.ref.kind)

    if (result.verificationError) {
      core.setFailed(result.verificationError)
    }
  } catch (error) {
    if (error instanceof CollectionError) {
      core.setOutput('manifest_path', join(options.contextDir, MANIFEST_FILE))
      core.setOutput('success', 'false')
    }
    throw error
  }
}

async function publish(config: RunConfig, client: GitHubClient): Promise<void> {
  const { intentFile, outputDir, fromIndex, dryRun } = config.publish
  const intent = await loadIntent(intentFile)
  logger.info(
    `Loaded ${intent.actions.length} publish actions for ${intent.prRef}${dryRun ? ' (dry run)' : ''}`
  )

  const guard = new IdempotencyGuard(client, config.identity)
  const executor = new PublishExecutor(client, guard, config.identity, {
    dryRun,
    fromIndex,
    baseDir: dirname(intentFile)
  })

  const result = await executor.execute(intent)
  const resultsPath = await writeResults(outputDir, result)
  logger.info(`Results written to ${resultsPath}`)

  core.setOutput('results_path', resultsPath)
  core.setOutput('overall_status', result.overallStatus)
  core.setOutput('completed', String(result.summary.completed))
  core.setOutput('failed', String(result.summary.failed))

  if (hasBlockingFailure(intent, result)) {
    core.setFailed(
      `${result.summary.failed} of ${result.summary.total} publish actions failed`
    )
  } else if (result.summary.failed > 0) {
    logger.warning(`${result.summary.failed} optional publish actions failed`)
  }
}
