import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'

import type { GitHubClient } from '../github/api.js'
import { formatReference, parseReference } from '../github/reference.js'
import type {
  NumberedRef,
  PullRequestPatch,
  RepoRef,
  ReviewDraftComment
} from '../github/types.js'
import { PublishError, errorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { formatReviewReply, withMarker } from './format.js'
import type { IdempotencyGuard } from './guard.js'
import { parseWith, readJsonFile } from './intent.js'
import {
  commentsFileSchema,
  createPrParamsSchema,
  postCommentParamsSchema,
  postReviewParamsSchema,
  repliesFileSchema,
  replyReviewParamsSchema,
  updatePrParamsSchema
} from './schemas.js'
import type { InlineComment, ReviewReply } from './schemas.js'
import type {
  ActionDetails,
  ActionOutcome,
  ActionResult,
  BotIdentity,
  ExecutorOptions,
  PublishAction,
  PublishIntent,
  PublishResult,
  ReplyOutcome
} from './types.js'

/** Where actions land; `number` is filled in once a pull request exists. */
type PublishTarget = RepoRef & {
  number?: number
}

type HandlerResult = {
  outcome?: ActionOutcome
  details?: ActionDetails
  /** Set when the action ran but did not fully succeed. */
  error?: string
}

const REPO_ONLY_PATTERN = /^([^/\s#]+)\/([^/\s#]+)$/

/**
 * Applies a publish batch one action at a time. A failed action is recorded
 * and the batch moves on; nothing is retried.
 */
export class PublishExecutor {
  constructor(
    private client: GitHubClient,
    private guard: IdempotencyGuard,
    private identity: BotIdentity,
    private options: ExecutorOptions
  ) {}

  async execute(intent: PublishIntent): Promise<PublishResult> {
    const { dryRun, fromIndex } = this.options

    if (
      !Number.isInteger(fromIndex) ||
      fromIndex < 0 ||
      fromIndex > intent.actions.length
    ) {
      throw new PublishError(
        `Resume index ${fromIndex} is outside the batch of ${intent.actions.length} actions`
      )
    }

    const target = parsePublishTarget(intent.prRef)
    const results: ActionResult[] = []
    let completed = 0
    let failed = 0

    if (fromIndex > 0) {
      logger.info(`Resuming from action ${fromIndex}`)
    }

    for (let index = fromIndex; index < intent.actions.length; index++) {
      const action = intent.actions[index]

      if (dryRun) {
        logger.info(`[dry-run] Would execute action ${index}: ${action.type}`)
        results.push({ index, type: action.type, status: 'dry-run' })
        continue
      }

      const result = await logger.group(
        `Action ${index}: ${action.description ?? action.type}`,
        async () => this.runAction(index, action, target)
      )
      if (result.status === 'failed') {
        failed++
      } else {
        completed++
      }
      results.push(result)
    }

    const summary = { total: results.length, completed, failed }
    logger.info(
      `Publish summary: ${summary.total} total, ${completed} completed, ${failed} failed`
    )

    return {
      version: intent.version,
      prRef: intent.prRef,
      executedAt: new Date().toISOString(),
      dryRun,
      actions: results,
      summary,
      overallStatus: failed > 0 ? 'failed' : 'success'
    }
  }

  private async runAction(
    index: number,
    action: PublishAction,
    target: PublishTarget
  ): Promise<ActionResult> {
    try {
      const { outcome, details, error } = await this.dispatch(action, target)
      const result: ActionResult = {
        index,
        type: action.type,
        status: error === undefined ? 'completed' : 'failed',
        ...(outcome !== undefined ? { outcome } : {}),
        ...(error !== undefined ? { error } : {}),
        ...(details !== undefined ? { details } : {})
      }
      if (error === undefined) {
        logger.info(`Action ${index} ${action.type}: ${outcome ?? 'completed'}`)
      } else {
        logger.error(`Action ${index} ${action.type} failed: ${error}`)
      }
      return result
    } catch (error) {
      const message = errorMessage(error)
      logger.error(`Action ${index} ${action.type} failed: ${message}`)
      return { index, type: action.type, status: 'failed', error: message }
    }
  }

  private async dispatch(
    action: PublishAction,
    target: PublishTarget
  ): Promise<HandlerResult> {
    switch (action.type) {
      case 'create_pr':
        return await this.createPullRequest(action.params, target)
      case 'update_pr':
        return await this.updatePullRequest(action.params, target)
      case 'post_comment':
        return await this.postComment(action.params, target)
      case 'reply_review':
        return await this.replyToReviews(action.params, target)
      case 'post_review':
        return await this.postReview(action.params, target)
    }
  }

  private async createPullRequest(
    raw: Record<string, unknown>,
    target: PublishTarget
  ): Promise<HandlerResult> {
    const params = parseWith(createPrParamsSchema, raw, 'create_pr parameters')
    const body = await this.resolveBody(params)

    const existing = await this.guard.findOpenPullRequest(target, params.head)
    if (existing) {
      logger.info(
        `Open pull request #${existing.number} already exists for ${params.head}, updating it`
      )
      const pr = await this.client.updatePullRequest(
        { owner: target.owner, repo: target.repo, number: existing.number },
        { title: params.title, body }
      )
      target.number = pr.number
      return { outcome: 'updated', details: { pullRequestNumber: pr.number } }
    }

    const pr = await this.client.createPullRequest(target, {
      title: params.title,
      body,
      head: params.head,
      base: params.base,
      draft: params.draft
    })
    target.number = pr.number
    return { outcome: 'created', details: { pullRequestNumber: pr.number } }
  }

  private async updatePullRequest(
    raw: Record<string, unknown>,
    target: PublishTarget
  ): Promise<HandlerResult> {
    const params = parseWith(updatePrParamsSchema, raw, 'update_pr parameters')
    const number = params.pr_number ?? target.number
    if (number === undefined) {
      throw new PublishError(
        'update_pr needs pr_number or a pr_ref naming a pull request'
      )
    }

    const patch: PullRequestPatch = {}
    if (params.title !== undefined) {
      patch.title = params.title
    }
    if (params.body !== undefined || params.body_file !== undefined) {
      patch.body = await this.resolveBody(params)
    }
    if (params.state !== undefined) {
      patch.state = params.state
    }
    if (params.base !== undefined) {
      patch.base = params.base
    }
    if (Object.keys(patch).length === 0) {
      throw new PublishError('update_pr has nothing to change')
    }

    const pr = await this.client.updatePullRequest(
      { owner: target.owner, repo: target.repo, number },
      patch
    )
    return { outcome: 'updated', details: { pullRequestNumber: pr.number } }
  }

  private async postComment(
    raw: Record<string, unknown>,
    target: PublishTarget
  ): Promise<HandlerResult> {
    const params = parseWith(
      postCommentParamsSchema,
      raw,
      'post_comment parameters'
    )
    const pr = requireNumber(target, 'post_comment')
    const marker = params.marker || this.identity.summaryMarker
    const body = withMarker(await this.resolveBody(params), marker)

    const existing = await this.guard.findSummaryComment(pr, marker)
    if (existing) {
      await this.client.updateIssueComment(target, existing.id, body)
      return { outcome: 'updated', details: { commentId: existing.id } }
    }

    const comment = await this.client.createIssueComment(pr, body)
    return { outcome: 'created', details: { commentId: comment.id } }
  }

  private async replyToReviews(
    raw: Record<string, unknown>,
    target: PublishTarget
  ): Promise<HandlerResult> {
    const params = parseWith(
      replyReviewParamsSchema,
      raw,
      'reply_review parameters'
    )
    const pr = requireNumber(target, 'reply_review')
    const replies = params.replies ?? (await this.loadReplies(params.replies_file))

    const outcomes: ReplyOutcome[] = []
    for (const reply of replies) {
      outcomes.push(await this.replyOnce(pr, reply))
    }

    const posted = outcomes.filter((o) => o.status === 'posted').length
    const skipped = outcomes.filter((o) => o.status === 'skipped').length
    const failures = outcomes.filter((o) => o.status === 'failed').length
    logger.info(
      `Review replies: ${posted} posted, ${skipped} skipped, ${failures} failed`
    )

    return {
      outcome: posted > 0 ? 'posted' : 'skipped',
      details: { replies: outcomes },
      ...(failures > 0
        ? { error: `${failures} of ${outcomes.length} review replies failed` }
        : {})
    }
  }

  private async replyOnce(
    pr: NumberedRef,
    reply: ReviewReply
  ): Promise<ReplyOutcome> {
    try {
      if (await this.guard.hasRepliedTo(pr, reply.comment_id)) {
        logger.info(`Already replied to review comment ${reply.comment_id}`)
        return { commentId: reply.comment_id, status: 'skipped' }
      }
      const created = await this.client.createReviewReply(
        pr,
        reply.comment_id,
        formatReviewReply(reply)
      )
      return {
        commentId: reply.comment_id,
        status: 'posted',
        replyId: created.id
      }
    } catch (error) {
      logger.warning(
        `Failed to reply to review comment ${reply.comment_id}: ${errorMessage(error)}`
      )
      return {
        commentId: reply.comment_id,
        status: 'failed',
        error: errorMessage(error)
      }
    }
  }

  private async postReview(
    raw: Record<string, unknown>,
    target: PublishTarget
  ): Promise<HandlerResult> {
    const params = parseWith(
      postReviewParamsSchema,
      raw,
      'post_review parameters'
    )
    const pr = requireNumber(target, 'post_review')
    let body =
      params.body !== undefined || params.body_file !== undefined
        ? await this.resolveBody(params)
        : ''
    const comments =
      params.comments ?? (await this.loadInlineComments(params.comments_file))

    if (!body.trim() && comments.length === 0 && !params.post_empty) {
      logger.info('Review has no body and no inline comments, skipping')
      return { outcome: 'skipped', details: { reason: 'empty review' } }
    }

    const commitId =
      params.commit_id || (await this.client.getPullRequest(pr)).headSha
    if (await this.guard.hasMarkedReview(pr, commitId)) {
      logger.info(`A review for ${commitId} was already posted, skipping`)
      return {
        outcome: 'skipped',
        details: { reason: `review already posted for ${commitId}` }
      }
    }

    const inline = comments.slice(0, params.max_inline)
    const overflow = comments.slice(params.max_inline)
    if (overflow.length > 0) {
      logger.warning(
        `Posting ${inline.length} of ${comments.length} inline comments (max_inline=${params.max_inline})`
      )
      body += `\n\n**Additional findings**\n\n${overflow
        .map((comment) => `- \`${comment.path}:${comment.line}\`: ${comment.body}`)
        .join('\n')}`
    }

    const review = await this.client.createReview(pr, {
      body: withMarker(body, this.identity.reviewMarker),
      event: params.event,
      commitId,
      comments: inline.map(toDraftComment)
    })
    return {
      outcome: 'created',
      details: { reviewId: review.id, inlineComments: inline.length }
    }
  }

  private async resolveBody(params: {
    body?: string
    body_file?: string
  }): Promise<string> {
    if (params.body_file) {
      const path = this.resolvePath(params.body_file)
      try {
        return await readFile(path, 'utf8')
      } catch (error) {
        throw new PublishError(
          `Failed to read body file ${path}: ${errorMessage(error)}`,
          error instanceof Error ? error : undefined
        )
      }
    }
    return params.body ?? ''
  }

  private async loadReplies(file: string | undefined): Promise<ReviewReply[]> {
    if (!file) {
      return []
    }
    const path = this.resolvePath(file)
    const parsed = parseWith(
      repliesFileSchema,
      await readJsonFile(path),
      `replies file ${path}`
    )
    return Array.isArray(parsed) ? parsed : parsed.review_replies
  }

  private async loadInlineComments(
    file: string | undefined
  ): Promise<InlineComment[]> {
    if (!file) {
      return []
    }
    const path = this.resolvePath(file)
    const parsed = parseWith(
      commentsFileSchema,
      await readJsonFile(path),
      `comments file ${path}`
    )
    return Array.isArray(parsed) ? parsed : parsed.comments
  }

  private resolvePath(file: string): string {
    return isAbsolute(file) ? file : resolve(this.options.baseDir, file)
  }
}

/** True when a failed action was not marked optional. */
export function hasBlockingFailure(
  intent: PublishIntent,
  result: PublishResult
): boolean {
  return result.actions.some(
    (action) =>
      action.status === 'failed' && !intent.actions[action.index]?.optional
  )
}

/**
 * `owner/repo#N` (or any reference form) addresses a pull request; a bare
 * `owner/repo` is only enough for `create_pr`.
 */
export function parsePublishTarget(prRef: string): PublishTarget {
  const repoOnly = prRef.trim().match(REPO_ONLY_PATTERN)
  if (repoOnly) {
    return { owner: repoOnly[1], repo: repoOnly[2] }
  }

  try {
    const ref = parseReference(prRef)
    return { owner: ref.owner, repo: ref.repo, number: ref.number }
  } catch (error) {
    throw new PublishError(
      `Invalid pr_ref '${prRef}': ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    )
  }
}

function requireNumber(target: PublishTarget, actionType: string): NumberedRef {
  if (target.number === undefined) {
    throw new PublishError(
      `${actionType} needs a pull request, but pr_ref ${formatReference(target)} names none`
    )
  }
  return { owner: target.owner, repo: target.repo, number: target.number }
}

function toDraftComment(comment: InlineComment): ReviewDraftComment {
  return {
    path: comment.path,
    line: comment.line,
    body: comment.body,
    ...(comment.side !== undefined ? { side: comment.side } : {}),
    ...(comment.start_line !== undefined ? { startLine: comment.start_line } : {}),
    ...(comment.start_side !== undefined ? { startSide: comment.start_side } : {})
  }
}
