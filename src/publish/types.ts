export const PUBLISH_ACTION_TYPES = [
  'create_pr',
  'update_pr',
  'post_comment',
  'reply_review',
  'post_review'
] as const

export type PublishActionType = (typeof PUBLISH_ACTION_TYPES)[number]

export type PublishAction = {
  type: PublishActionType
  /** Raw parameters, validated per type when the action runs. */
  params: Record<string, unknown>
  description?: string
  optional: boolean
}

export type PublishIntent = {
  version: string
  prRef: string
  actions: PublishAction[]
}

export type ActionStatus = 'completed' | 'failed' | 'dry-run'

export type ActionOutcome = 'created' | 'updated' | 'posted' | 'skipped'

export type ReplyOutcome = {
  commentId: number
  status: 'posted' | 'skipped' | 'failed'
  replyId?: number
  error?: string
}

export type ActionDetails = {
  pullRequestNumber?: number
  commentId?: number
  reviewId?: number
  inlineComments?: number
  replies?: ReplyOutcome[]
  reason?: string
}

export type ActionResult = {
  index: number
  type: PublishActionType
  status: ActionStatus
  outcome?: ActionOutcome
  error?: string
  details?: ActionDetails
}

export type PublishSummary = {
  total: number
  completed: number
  failed: number
}

export type PublishResult = {
  version: string
  prRef: string
  executedAt: string
  dryRun: boolean
  actions: ActionResult[]
  summary: PublishSummary
  overallStatus: 'success' | 'failed'
}

/** Who the bot is, for recognising its own earlier writes. */
export type BotIdentity = {
  login: string
  summaryMarker: string
  reviewMarker: string
}

export type ExecutorOptions = {
  dryRun: boolean
  fromIndex: number
  /** Directory that relative `*_file` parameters resolve against. */
  baseDir: string
}
