import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import type { z } from 'zod'

import { RESULTS_FILE } from '../config/constants.js'
import { PublishError, errorMessage } from '../utils/errors.js'
import { publishIntentSchema } from './schemas.js'
import type { PublishAction, PublishIntent, PublishResult } from './types.js'

export async function loadIntent(path: string): Promise<PublishIntent> {
  return parseIntent(await readJsonFile(path), path)
}

/**
 * Validate a publish batch. An action without `params` takes its own keys,
 * minus `type`, `description` and `optional`, as parameters.
 */
export function parseIntent(raw: unknown, source = 'publish intent'): PublishIntent {
  const document = parseWith(publishIntentSchema, raw, source)

  const actions: PublishAction[] = document.actions.map((action) => {
    const { type, params, description, optional, ...rest } = action
    return {
      type,
      params: params ?? rest,
      ...(description !== undefined ? { description } : {}),
      optional: optional ?? false
    }
  })

  return {
    version: document.version,
    prRef: document.pr_ref,
    actions
  }
}

/** Writes `publish-results.json` into `outputDir` and returns its path. */
export async function writeResults(
  outputDir: string,
  result: PublishResult
): Promise<string> {
  const path = join(outputDir, RESULTS_FILE)
  await mkdir(outputDir, { recursive: true })
  await writeFile(
    path,
    `${JSON.stringify(toResultsDocument(result), null, 2)}\n`,
    'utf8'
  )
  return path
}

export function toResultsDocument(result: PublishResult) {
  return {
    version: result.version,
    pr_ref: result.prRef,
    executed_at: result.executedAt,
    dry_run: result.dryRun,
    actions: result.actions.map((action) => ({
      index: action.index,
      type: action.type,
      status: action.status,
      ...(action.outcome !== undefined ? { outcome: action.outcome } : {}),
      ...(action.error !== undefined ? { error: action.error } : {}),
      ...(action.details !== undefined
        ? {
            details: {
              ...(action.details.pullRequestNumber !== undefined
                ? { pr_number: action.details.pullRequestNumber }
                : {}),
              ...(action.details.commentId !== undefined
                ? { comment_id: action.details.commentId }
                : {}),
              ...(action.details.reviewId !== undefined
                ? { review_id: action.details.reviewId }
                : {}),
              ...(action.details.inlineComments !== undefined
                ? { inline_comments: action.details.inlineComments }
                : {}),
              ...(action.details.replies !== undefined
                ? {
                    replies: action.details.replies.map((reply) => ({
                      comment_id: reply.commentId,
                      status: reply.status,
                      ...(reply.replyId !== undefined
                        ? { reply_id: reply.replyId }
                        : {}),
                      ...(reply.error !== undefined ? { error: reply.error } : {})
                    }))
                  }
                : {}),
              ...(action.details.reason !== undefined
                ? { reason: action.details.reason }
                : {})
            }
          }
        : {})
    })),
    summary: result.summary,
    overall_status: result.overallStatus
  }
}

export async function readJsonFile(path: string): Promise<unknown> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new PublishError(
      `Failed to read ${path}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    )
  }

  try {
    return JSON.parse(content)
  } catch (error) {
    throw new PublishError(
      `Invalid JSON in ${path}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    )
  }
}

export function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  source: string
): T {
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join('.')}: ${issue.message}`
          : issue.message
      )
      .join('; ')
    throw new PublishError(`Invalid ${source}: ${issues}`)
  }
  return parsed.data
}
