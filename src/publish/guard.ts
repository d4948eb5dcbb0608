import type { GitHubClient } from '../github/api.js'
import { iteratePages } from '../github/pagination.js'
import type {
  IssueComment,
  NumberedRef,
  PullRequestInfo,
  RepoRef
} from '../github/types.js'
import { logger } from '../utils/logger.js'
import type { BotIdentity } from './types.js'

/**
 * Read-only checks for writes the bot has already made. Nothing here
 * mutates GitHub.
 */
export class IdempotencyGuard {
  constructor(
    private client: GitHubClient,
    private identity: BotIdentity
  ) {}

  async hasRepliedTo(pr: NumberedRef, commentId: number): Promise<boolean> {
    for await (const comments of iteratePages((page) =>
      this.client.listReviewComments(pr, page)
    )) {
      const reply = comments.find(
        (comment) =>
          comment.inReplyToId === commentId &&
          comment.author === this.identity.login
      )
      if (reply) {
        logger.debug(`Found existing reply ${reply.id} to comment ${commentId}`)
        return true
      }
    }
    return false
  }

  /**
   * The bot comment carrying `marker` with the highest id. Older duplicates
   * are ignored.
   */
  async findSummaryComment(
    pr: NumberedRef,
    marker: string = this.identity.summaryMarker
  ): Promise<IssueComment | undefined> {
    let latest: IssueComment | undefined

    for await (const comments of iteratePages((page) =>
      this.client.listIssueComments(pr, page)
    )) {
      for (const comment of comments) {
        if (
          comment.author === this.identity.login &&
          comment.body.includes(marker) &&
          (!latest || comment.id > latest.id)
        ) {
          latest = comment
        }
      }
    }

    return latest
  }

  async findOpenPullRequest(
    repo: RepoRef,
    head: string
  ): Promise<PullRequestInfo | undefined> {
    const branch = head.includes(':') ? head.slice(head.indexOf(':') + 1) : head

    for await (const pulls of iteratePages((page) =>
      this.client.listOpenPullRequests(repo, head, page)
    )) {
      const match = pulls.find((pr) => pr.headRef === branch)
      if (match) {
        return match
      }
    }
    return undefined
  }

  async hasMarkedReview(pr: NumberedRef, commitId: string): Promise<boolean> {
    for await (const reviews of iteratePages((page) =>
      this.client.listReviews(pr, page)
    )) {
      if (
        reviews.some(
          (review) =>
            review.author === this.identity.login &&
            review.commitId === commitId &&
            review.body.includes(this.identity.reviewMarker)
        )
      ) {
        return true
      }
    }
    return false
  }
}
