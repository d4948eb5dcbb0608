import * as core from '@actions/core'
import * as github from '@actions/github'

import { ConfigurationError } from '../utils/errors.js'
import {
  DEFAULT_BOT_LOGIN,
  DEFAULT_INTENT_FILE,
  DEFAULT_MAX_CHECK_RUNS,
  DEFAULT_MAX_FILES,
  DEFAULT_PROVIDER,
  DEFAULT_TIMEOUT_SECONDS,
  REVIEW_MARKER,
  SUMMARY_MARKER
} from './constants.js'
import type { Command, RunConfig } from './types.js'

const COMMANDS: readonly Command[] = ['collect', 'publish']

export function parseInputs(): RunConfig {
  const command = core.getInput('command', { required: false }) || 'collect'
  if (!isCommand(command)) {
    throw new ConfigurationError(
      `Unknown command '${command}'. Supported commands: ${COMMANDS.join(', ')}`
    )
  }

  const token =
    core.getInput('github_token', { required: false }) ||
    process.env.GITHUB_TOKEN ||
    process.env.GH_TOKEN ||
    ''
  if (token) {
    core.setSecret(token)
  }

  const repoHint =
    core.getInput('repo', { required: false }) ||
    process.env.GITHUB_REPOSITORY ||
    undefined

  const timeoutSeconds = parseNumericInput(
    'timeout_seconds',
    DEFAULT_TIMEOUT_SECONDS,
    1,
    600,
    'Timeout must be between 1 and 600 seconds'
  )

  const contextDir =
    core.getInput('context_dir', { required: false }) || 'context'

  return {
    command,
    github: {
      token,
      ...(repoHint ? { repoHint } : {}),
      timeoutMs: timeoutSeconds * 1000
    },
    identity: {
      login: core.getInput('bot_login', { required: false }) || DEFAULT_BOT_LOGIN,
      summaryMarker:
        core.getInput('summary_marker', { required: false }) || SUMMARY_MARKER,
      reviewMarker: REVIEW_MARKER
    },
    collect: {
      ref: core.getInput('ref', { required: false }) || refFromEvent(repoHint),
      contextDir,
      ...optionalTriggerCommentId(),
      includeDiff: parseBooleanInput('include_diff', true),
      includeChecks: parseBooleanInput('include_checks', true),
      includeThreads: parseBooleanInput('include_threads', true),
      includeFiles: parseBooleanInput('include_files', true),
      includeCommits: parseBooleanInput('include_commits', true),
      maxFiles: parseNumericInput(
        'max_files',
        DEFAULT_MAX_FILES,
        1,
        3000,
        'Max files must be between 1 and 3000'
      ),
      maxCheckRuns: parseNumericInput(
        'max_check_runs',
        DEFAULT_MAX_CHECK_RUNS,
        1,
        1000,
        'Max check runs must be between 1 and 1000'
      ),
      provider: core.getInput('provider', { required: false }) || DEFAULT_PROVIDER
    },
    publish: {
      intentFile:
        core.getInput('intent_file', { required: false }) ||
        `${contextDir}/${DEFAULT_INTENT_FILE}`,
      outputDir: core.getInput('output_dir', { required: false }) || contextDir,
      fromIndex: parseNumericInput(
        'from_index',
        0,
        0,
        Number.MAX_SAFE_INTEGER,
        'From index cannot be negative'
      ),
      dryRun: parseBooleanInput('dry_run', false)
    }
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value)
}

/** The issue or pull request that triggered the workflow, as owner/repo#N. */
function refFromEvent(repoHint: string | undefined): string {
  const payload = github.context.payload
  const number = payload.pull_request?.number ?? payload.issue?.number
  if (!repoHint || !number) {
    return ''
  }
  return `${repoHint}#${number}`
}

function optionalTriggerCommentId(): { triggerCommentId?: number } {
  const input = core.getInput('trigger_comment_id', { required: false })
  if (input) {
    const id = parseInt(input, 10)
    if (Number.isNaN(id) || id < 1) {
      throw new ConfigurationError(
        `trigger_comment_id must be a positive number. Received: ${input}`
      )
    }
    return { triggerCommentId: id }
  }

  const eventCommentId: unknown = github.context.payload.comment?.id
  return typeof eventCommentId === 'number'
    ? { triggerCommentId: eventCommentId }
    : {}
}

function parseBooleanInput(name: string, defaultValue: boolean): boolean {
  const input = core.getInput(name, { required: false }).trim().toLowerCase()
  if (!input) {
    return defaultValue
  }
  if (input === 'true') {
    return true
  }
  if (input === 'false') {
    return false
  }
  throw new ConfigurationError(
    `${name} must be 'true' or 'false'. Received: ${input}`
  )
}

function parseNumericInput(
  name: string,
  defaultValue: number,
  min: number,
  max: number,
  errorMessage: string
): number {
  const input = core.getInput(name, { required: false })
  const value = input ? parseInt(input, 10) : defaultValue

  if (Number.isNaN(value)) {
    throw new ConfigurationError(
      `${name} must be a valid number. Received: ${input}`
    )
  }

  if (value < min || value > max) {
    throw new ConfigurationError(errorMessage)
  }

  return value
}

export function validateConfig(config: RunConfig): void {
  if (!config.github.token) {
    throw new ConfigurationError(
      'GitHub token is required (github_token input, GITHUB_TOKEN or GH_TOKEN)'
    )
  }

  if (!isCommand(config.command)) {
    throw new ConfigurationError(`Unknown command '${config.command}'`)
  }

  if (config.github.timeoutMs < 1000) {
    throw new ConfigurationError('Timeout must be at least 1 second')
  }

  if (config.command === 'collect') {
    if (!config.collect.ref.trim()) {
      throw new ConfigurationError(
        'A ref is required for collect (input ref, or an issue or pull request event)'
      )
    }
    if (!config.collect.contextDir) {
      throw new ConfigurationError('Context directory is required')
    }
    if (config.collect.maxFiles < 1 || config.collect.maxCheckRuns < 1) {
      throw new ConfigurationError('Collection limits must be at least 1')
    }
  }

  if (config.command === 'publish') {
    if (!config.publish.intentFile) {
      throw new ConfigurationError('An intent file is required for publish')
    }
    if (config.publish.fromIndex < 0) {
      throw new ConfigurationError('From index cannot be negative')
    }
  }
}
