import type { Reply, ReviewComment, ReviewThread } from '../github/types.js'
import { logger } from '../utils/logger.js'
import type { ThreadGrouping, ThreadGroupingOptions } from './types.js'

/**
 * Group a flat list of review comments into threads.
 *
 * Roots keep the order they were listed in. Replies are attached in creation
 * order, following reply-to-reply chains back to their root. A reply whose
 * chain never reaches a root is returned in `orphans`.
 */
export function groupReviewThreads(
  comments: ReviewComment[],
  options: ThreadGroupingOptions = {}
): ThreadGrouping {
  const { triggerCommentId, resolvedRootIds } = options
  const threads: ReviewThread[] = []
  const threadsByRoot = new Map<number, ReviewThread>()
  const rootOf = new Map<number, number>()

  for (const comment of comments) {
    if (comment.inReplyToId || threadsByRoot.has(comment.id)) {
      continue
    }

    const thread: ReviewThread = {
      rootCommentId: comment.id,
      url: comment.url,
      path: comment.path,
      line: comment.line,
      startLine: comment.startLine,
      side: comment.side,
      diffHunk: comment.diffHunk,
      body: comment.body,
      author: comment.author,
      createdAt: comment.createdAt,
      resolved: resolvedRootIds?.has(comment.id) ?? false,
      isTrigger: comment.id === triggerCommentId,
      replies: []
    }
    threads.push(thread)
    threadsByRoot.set(comment.id, thread)
    rootOf.set(comment.id, comment.id)
  }

  // Pages can shift mid-listing and repeat a comment.
  const seenReplies = new Set<number>()
  const replies = comments
    .filter((comment) => {
      if (!comment.inReplyToId || seenReplies.has(comment.id)) {
        return false
      }
      seenReplies.add(comment.id)
      return true
    })
    .sort(byCreation)

  // Chains may list a reply before its parent, so resolve until nothing moves.
  let pending = replies
  let progressed = true
  while (pending.length > 0 && progressed) {
    const unresolved: ReviewComment[] = []
    for (const reply of pending) {
      const root =
        reply.inReplyToId !== undefined
          ? rootOf.get(reply.inReplyToId)
          : undefined
      if (root === undefined) {
        unresolved.push(reply)
      } else {
        rootOf.set(reply.id, root)
      }
    }
    progressed = unresolved.length < pending.length
    pending = unresolved
  }

  const orphans: Reply[] = []
  for (const comment of replies) {
    const reply = toReply(comment, triggerCommentId)
    const root = rootOf.get(comment.id)
    const thread = root === undefined ? undefined : threadsByRoot.get(root)

    if (thread) {
      thread.replies.push(reply)
    } else {
      logger.warning(
        `Review comment ${comment.id} replies to unknown comment ${reply.inReplyToId}`
      )
      orphans.push(reply)
    }
  }

  return { threads, orphans }
}

function toReply(
  comment: ReviewComment,
  triggerCommentId: number | undefined
): Reply {
  return {
    commentId: comment.id,
    url: comment.url,
    body: comment.body,
    author: comment.author,
    createdAt: comment.createdAt,
    inReplyToId: comment.inReplyToId ?? 0,
    isTrigger: comment.id === triggerCommentId
  }
}

function byCreation(a: ReviewComment, b: ReviewComment): number {
  const delta = Date.parse(a.createdAt) - Date.parse(b.createdAt)
  if (delta !== 0 && !Number.isNaN(delta)) {
    return delta
  }
  return a.id - b.id
}
