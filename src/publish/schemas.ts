import { z } from 'zod'

import {
  DEFAULT_MAX_INLINE_COMMENTS,
  INTENT_SCHEMA_VERSION
} from '../config/constants.js'
import { PUBLISH_ACTION_TYPES } from './types.js'

// Flags arrive as JSON booleans from agents and as strings from shell tools.
const flagSchema = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true')
])

const bodySource = {
  body: z.string().optional().describe('Inline markdown body'),
  body_file: z
    .string()
    .min(1)
    .optional()
    .describe('Markdown file, relative to the intent file')
}

export const publishActionSchema = z
  .object({
    type: z.enum(PUBLISH_ACTION_TYPES),
    params: z.record(z.unknown()).optional(),
    description: z.string().optional(),
    optional: z.boolean().optional()
  })
  .passthrough()

export const publishIntentSchema = z.object({
  version: z.literal(INTENT_SCHEMA_VERSION),
  pr_ref: z.string().min(1).describe('owner/repo#N, or owner/repo for create_pr'),
  actions: z.array(publishActionSchema)
})

export const createPrParamsSchema = z.object({
  title: z.string().min(1),
  ...bodySource,
  head: z.string().min(1).describe('Branch to merge from'),
  base: z.string().min(1).describe('Branch to merge into'),
  draft: flagSchema.default(false)
})

export const updatePrParamsSchema = z.object({
  pr_number: z.coerce.number().int().positive().optional(),
  title: z.string().min(1).optional(),
  ...bodySource,
  state: z.enum(['open', 'closed']).optional(),
  base: z.string().min(1).optional()
})

export const postCommentParamsSchema = z
  .object({
    ...bodySource,
    marker: z.string().optional().describe('Marker identifying the comment')
  })
  .refine((params) => params.body !== undefined || params.body_file, {
    message: 'post_comment requires body or body_file'
  })

export const reviewReplySchema = z.object({
  comment_id: z.coerce.number().int().positive(),
  status: z.string().optional().describe('fixed, wontfix, need-info, ...'),
  message: z.string().min(1),
  action_taken: z.string().optional()
})

export const replyReviewParamsSchema = z
  .object({
    replies: z.array(reviewReplySchema).optional(),
    replies_file: z.string().min(1).optional()
  })
  .refine((params) => params.replies || params.replies_file, {
    message: 'reply_review requires replies or replies_file'
  })

export const repliesFileSchema = z.union([
  z.array(reviewReplySchema),
  z.object({ review_replies: z.array(reviewReplySchema) })
])

export const inlineCommentSchema = z.object({
  path: z.string().min(1),
  line: z.coerce.number().int().positive(),
  body: z.string().min(1),
  side: z.enum(['LEFT', 'RIGHT']).optional(),
  start_line: z.coerce.number().int().positive().optional(),
  start_side: z.enum(['LEFT', 'RIGHT']).optional()
})

export const commentsFileSchema = z.union([
  z.array(inlineCommentSchema),
  z.object({ comments: z.array(inlineCommentSchema) })
])

export const postReviewParamsSchema = z.object({
  ...bodySource,
  comments: z.array(inlineCommentSchema).optional(),
  comments_file: z.string().min(1).optional(),
  max_inline: z.coerce.number().int().min(0).default(DEFAULT_MAX_INLINE_COMMENTS),
  post_empty: flagSchema.default(false),
  commit_id: z.string().optional(),
  event: z.enum(['COMMENT', 'APPROVE', 'REQUEST_CHANGES']).default('COMMENT')
})

export type CreatePrParams = z.infer<typeof createPrParamsSchema>
export type UpdatePrParams = z.infer<typeof updatePrParamsSchema>
export type PostCommentParams = z.infer<typeof postCommentParamsSchema>
export type ReviewReply = z.infer<typeof reviewReplySchema>
export type ReplyReviewParams = z.infer<typeof replyReviewParamsSchema>
export type InlineComment = z.infer<typeof inlineCommentSchema>
export type PostReviewParams = z.infer<typeof postReviewParamsSchema>
