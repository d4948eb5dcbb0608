import type { BotIdentity } from '../publish/types.js'

export type Command = 'collect' | 'publish'

export type CollectConfig = {
  ref: string
  contextDir: string
  triggerCommentId?: number
  includeDiff: boolean
  includeChecks: boolean
  includeThreads: boolean
  includeFiles: boolean
  includeCommits: boolean
  maxFiles: number
  maxCheckRuns: number
  provider: string
}

export type PublishConfig = {
  intentFile: string
  outputDir: string
  fromIndex: number
  dryRun: boolean
}

export type RunConfig = {
  command: Command
  github: {
    token: string
    /** owner/repo used to complete bare issue or pull request numbers. */
    repoHint?: string
    timeoutMs: number
  }
  identity: BotIdentity
  collect: CollectConfig
  publish: PublishConfig
}
