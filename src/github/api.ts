import { Octokit } from '@octokit/rest'
import type { RestEndpointMethodTypes } from '@octokit/rest'

import { GitHubAPIError, errorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { hasNextLink } from './pagination.js'
import type {
  ChangedFile,
  CheckRun,
  CombinedStatus,
  CommitInfo,
  IssueComment,
  IssueInfo,
  NumberedRef,
  Page,
  PageRequest,
  PullRequestDraft,
  PullRequestInfo,
  PullRequestPatch,
  PullRequestReview,
  RepoRef,
  ReviewComment,
  ReviewDraft
} from './types.js'

type RawIssue = RestEndpointMethodTypes['issues']['get']['response']['data']
type RawPullRequest =
  RestEndpointMethodTypes['pulls']['get']['response']['data']
type RawListedPullRequest =
  RestEndpointMethodTypes['pulls']['list']['response']['data'][0]
type RawIssueComment =
  RestEndpointMethodTypes['issues']['listComments']['response']['data'][0]
type RawReviewComment =
  RestEndpointMethodTypes['pulls']['listReviewComments']['response']['data'][0]
type RawCheckRun =
  RestEndpointMethodTypes['checks']['listForRef']['response']['data']['check_runs'][0]

/**
 * The GitHub operations the collector and the publisher depend on. Listing
 * methods return one page at a time so callers control pagination.
 */
export type GitHubClient = {
  getIssue(ref: NumberedRef): Promise<IssueInfo>
  getPullRequest(ref: NumberedRef): Promise<PullRequestInfo>
  getPullRequestDiff(ref: NumberedRef): Promise<string>
  listPullRequestFiles(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<ChangedFile>>
  listPullRequestCommits(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<CommitInfo>>
  listIssueComments(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<IssueComment>>
  listReviewComments(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<ReviewComment>>
  listResolvedThreadRootIds(ref: NumberedRef): Promise<Set<number>>
  listReviews(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<PullRequestReview>>
  listCheckRuns(
    repo: RepoRef,
    sha: string,
    page: PageRequest
  ): Promise<Page<CheckRun>>
  getJobLogs(repo: RepoRef, jobId: number): Promise<string>
  getCombinedStatus(repo: RepoRef, sha: string): Promise<CombinedStatus>
  listOpenPullRequests(
    repo: RepoRef,
    head: string,
    page: PageRequest
  ): Promise<Page<PullRequestInfo>>
  createIssueComment(ref: NumberedRef, body: string): Promise<IssueComment>
  updateIssueComment(
    repo: RepoRef,
    commentId: number,
    body: string
  ): Promise<IssueComment>
  createReviewReply(
    ref: NumberedRef,
    commentId: number,
    body: string
  ): Promise<ReviewComment>
  createReview(ref: NumberedRef, review: ReviewDraft): Promise<PullRequestReview>
  createPullRequest(
    repo: RepoRef,
    draft: PullRequestDraft
  ): Promise<PullRequestInfo>
  updatePullRequest(
    ref: NumberedRef,
    patch: PullRequestPatch
  ): Promise<PullRequestInfo>
}

export type GitHubAPIConfig = {
  token: string
  timeoutMs: number
  /** Cancels every in-flight and later call when aborted. */
  signal?: AbortSignal
  baseUrl?: string
}

type ResolvedThreadsQuery = {
  repository: {
    pullRequest: {
      reviewThreads: {
        nodes: Array<{
          isResolved: boolean
          comments: {
            nodes: Array<{
              databaseId: number | null
            }>
          }
        }>
        pageInfo: {
          hasNextPage: boolean
          endCursor: string | null
        }
      }
    } | null
  } | null
}

export class GitHubAPI implements GitHubClient {
  private octokit: Octokit

  constructor(private config: GitHubAPIConfig) {
    this.octokit = new Octokit({
      auth: config.token,
      ...(config.baseUrl ? { baseUrl: config.baseUrl } : {})
    })
  }

  async getIssue(ref: NumberedRef): Promise<IssueInfo> {
    return await this.call(`fetch issue ${describe(ref)}`, async () => {
      const response = await this.octokit.issues.get({
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.number,
        request: this.requestOptions()
      })
      return toIssueInfo(response.data)
    })
  }

  async getPullRequest(ref: NumberedRef): Promise<PullRequestInfo> {
    return await this.call(`fetch pull request ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.get({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        request: this.requestOptions()
      })
      return toPullRequestInfo(response.data)
    })
  }

  async getPullRequestDiff(ref: NumberedRef): Promise<string> {
    return await this.call(`fetch diff for ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.get({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        mediaType: { format: 'diff' },
        request: this.requestOptions()
      })

      const diff: unknown = response.data
      if (typeof diff !== 'string') {
        throw new Error('Diff response was not text')
      }
      return diff
    })
  }

  async listPullRequestFiles(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<ChangedFile>> {
    return await this.call(`list files for ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.listFiles({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.map((file) => ({
          filename: file.filename,
          status: file.status,
          additions: file.additions,
          deletions: file.deletions,
          changes: file.changes,
          ...(file.patch !== undefined ? { patch: file.patch } : {})
        })),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async listPullRequestCommits(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<CommitInfo>> {
    return await this.call(`list commits for ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.listCommits({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.map((commit) => ({
          sha: commit.sha,
          message: commit.commit.message,
          author: commit.author?.login ?? commit.commit.author?.name ?? '',
          date: commit.commit.author?.date ?? null
        })),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async listIssueComments(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<IssueComment>> {
    return await this.call(`list comments for ${describe(ref)}`, async () => {
      const response = await this.octokit.issues.listComments({
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.number,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.map(toIssueComment),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async listReviewComments(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<ReviewComment>> {
    return await this.call(
      `list review comments for ${describe(ref)}`,
      async () => {
        const response = await this.octokit.pulls.listReviewComments({
          owner: ref.owner,
          repo: ref.repo,
          pull_number: ref.number,
          page: page.page,
          per_page: page.perPage,
          request: this.requestOptions()
        })
        return {
          items: response.data.map(toReviewComment),
          hasNextPage: hasNextLink(response.headers.link)
        }
      }
    )
  }

  async listResolvedThreadRootIds(ref: NumberedRef): Promise<Set<number>> {
    return await this.call(
      `query review thread resolution for ${describe(ref)}`,
      async () => {
        const resolved = new Set<number>()
        let cursor: string | null = null

        do {
          const result: ResolvedThreadsQuery =
            await this.octokit.graphql<ResolvedThreadsQuery>(
              `query ResolvedThreads($owner: String!, $repo: String!, $number: Int!, $after: String) {
                repository(owner: $owner, name: $repo) {
                  pullRequest(number: $number) {
                    reviewThreads(first: 100, after: $after) {
                      nodes {
                        isResolved
                        comments(first: 1) {
                          nodes {
                            databaseId
                          }
                        }
                      }
                      pageInfo {
                        hasNextPage
                        endCursor
                      }
                    }
                  }
                }
              }`,
              {
                owner: ref.owner,
                repo: ref.repo,
                number: ref.number,
                after: cursor,
                request: this.requestOptions()
              }
            )

          const threads = result.repository?.pullRequest?.reviewThreads
          if (!threads) {
            break
          }

          for (const thread of threads.nodes) {
            const rootId = thread.comments.nodes[0]?.databaseId
            if (thread.isResolved && rootId) {
              resolved.add(rootId)
            }
          }

          cursor = threads.pageInfo.hasNextPage
            ? threads.pageInfo.endCursor
            : null
        } while (cursor)

        return resolved
      }
    )
  }

  async listReviews(
    ref: NumberedRef,
    page: PageRequest
  ): Promise<Page<PullRequestReview>> {
    return await this.call(`list reviews for ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.listReviews({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.map((review) => ({
          id: review.id,
          author: review.user?.login ?? '',
          body: review.body,
          state: review.state,
          commitId: review.commit_id
        })),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async listCheckRuns(
    repo: RepoRef,
    sha: string,
    page: PageRequest
  ): Promise<Page<CheckRun>> {
    return await this.call(`list check runs for ${sha}`, async () => {
      const response = await this.octokit.checks.listForRef({
        owner: repo.owner,
        repo: repo.repo,
        ref: sha,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.check_runs.map(toCheckRun),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async getJobLogs(repo: RepoRef, jobId: number): Promise<string> {
    return await this.call(`download logs for job ${jobId}`, async () => {
      const response = await this.octokit.actions.downloadJobLogsForWorkflowRun(
        {
          owner: repo.owner,
          repo: repo.repo,
          job_id: jobId,
          request: this.requestOptions()
        }
      )

      const logs: unknown = response.data
      if (typeof logs === 'string') {
        return logs
      }
      if (logs instanceof ArrayBuffer) {
        return new TextDecoder().decode(logs)
      }
      return ''
    })
  }

  async getCombinedStatus(repo: RepoRef, sha: string): Promise<CombinedStatus> {
    return await this.call(`fetch combined status for ${sha}`, async () => {
      const response = await this.octokit.repos.getCombinedStatusForRef({
        owner: repo.owner,
        repo: repo.repo,
        ref: sha,
        request: this.requestOptions()
      })
      return {
        sha: response.data.sha,
        state: response.data.state,
        totalCount: response.data.total_count,
        statuses: response.data.statuses.map((status) => ({
          context: status.context,
          state: status.state,
          description: status.description,
          targetUrl: status.target_url
        }))
      }
    })
  }

  async listOpenPullRequests(
    repo: RepoRef,
    head: string,
    page: PageRequest
  ): Promise<Page<PullRequestInfo>> {
    return await this.call(`list open pull requests for ${head}`, async () => {
      const response = await this.octokit.pulls.list({
        owner: repo.owner,
        repo: repo.repo,
        state: 'open',
        head: head.includes(':') ? head : `${repo.owner}:${head}`,
        page: page.page,
        per_page: page.perPage,
        request: this.requestOptions()
      })
      return {
        items: response.data.map(toListedPullRequestInfo),
        hasNextPage: hasNextLink(response.headers.link)
      }
    })
  }

  async createIssueComment(
    ref: NumberedRef,
    body: string
  ): Promise<IssueComment> {
    return await this.call(`create comment on ${describe(ref)}`, async () => {
      const response = await this.octokit.issues.createComment({
        owner: ref.owner,
        repo: ref.repo,
        issue_number: ref.number,
        body,
        request: this.requestOptions()
      })
      logger.info(`Created comment ${response.data.id} on ${describe(ref)}`)
      return toIssueComment(response.data)
    })
  }

  async updateIssueComment(
    repo: RepoRef,
    commentId: number,
    body: string
  ): Promise<IssueComment> {
    return await this.call(`update comment ${commentId}`, async () => {
      const response = await this.octokit.issues.updateComment({
        owner: repo.owner,
        repo: repo.repo,
        comment_id: commentId,
        body,
        request: this.requestOptions()
      })
      logger.info(`Updated comment ${commentId}`)
      return toIssueComment(response.data)
    })
  }

  async createReviewReply(
    ref: NumberedRef,
    commentId: number,
    body: string
  ): Promise<ReviewComment> {
    return await this.call(
      `reply to review comment ${commentId}`,
      async () => {
        const response = await this.octokit.pulls.createReplyForReviewComment({
          owner: ref.owner,
          repo: ref.repo,
          pull_number: ref.number,
          comment_id: commentId,
          body,
          request: this.requestOptions()
        })
        logger.info(`Replied to review comment ${commentId}`)
        return toReviewComment(response.data)
      }
    )
  }

  async createReview(
    ref: NumberedRef,
    review: ReviewDraft
  ): Promise<PullRequestReview> {
    return await this.call(`create review on ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.createReview({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        body: review.body,
        event: review.event,
        ...(review.commitId ? { commit_id: review.commitId } : {}),
        comments: review.comments.map((comment) => ({
          path: comment.path,
          line: comment.line,
          body: comment.body,
          side: comment.side ?? 'RIGHT',
          ...(comment.startLine !== undefined
            ? {
                start_line: comment.startLine,
                start_side: comment.startSide ?? comment.side ?? 'RIGHT'
              }
            : {})
        })),
        request: this.requestOptions()
      })
      logger.info(`Created review ${response.data.id} on ${describe(ref)}`)
      return {
        id: response.data.id,
        author: response.data.user?.login ?? '',
        body: response.data.body,
        state: response.data.state,
        commitId: response.data.commit_id
      }
    })
  }

  async createPullRequest(
    repo: RepoRef,
    draft: PullRequestDraft
  ): Promise<PullRequestInfo> {
    return await this.call(
      `create pull request ${draft.head} -> ${draft.base}`,
      async () => {
        const response = await this.octokit.pulls.create({
          owner: repo.owner,
          repo: repo.repo,
          title: draft.title,
          body: draft.body,
          head: draft.head,
          base: draft.base,
          draft: draft.draft,
          request: this.requestOptions()
        })
        logger.info(`Created pull request #${response.data.number}`)
        return toPullRequestInfo(response.data)
      }
    )
  }

  async updatePullRequest(
    ref: NumberedRef,
    patch: PullRequestPatch
  ): Promise<PullRequestInfo> {
    return await this.call(`update pull request ${describe(ref)}`, async () => {
      const response = await this.octokit.pulls.update({
        owner: ref.owner,
        repo: ref.repo,
        pull_number: ref.number,
        ...patch,
        request: this.requestOptions()
      })
      logger.info(`Updated pull request ${describe(ref)}`)
      return toPullRequestInfo(response.data)
    })
  }

  private requestOptions(): { signal: AbortSignal } {
    const timeout = AbortSignal.timeout(this.config.timeoutMs)
    return {
      signal: this.config.signal
        ? AbortSignal.any([this.config.signal, timeout])
        : timeout
    }
  }

  private async call<T>(action: string, fn: () => Promise<T>): Promise<T> {
    try {
      logger.debug(`GitHub: ${action}`)
      return await fn()
    } catch (error) {
      throw new GitHubAPIError(
        `Failed to ${action}: ${errorMessage(error)}`,
        statusOf(error)
      )
    }
  }
}

function describe(ref: NumberedRef): string {
  return `${ref.owner}/${ref.repo}#${ref.number}`
}

function statusOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
  ) {
    return error.status
  }
  return undefined
}

function toIssueInfo(issue: RawIssue): IssueInfo {
  return {
    number: issue.number,
    title: issue.title,
    body: issue.body ?? '',
    state: issue.state,
    url: issue.html_url,
    author: issue.user?.login ?? '',
    assignees: (issue.assignees ?? []).map((assignee) => assignee.login),
    labels: issue.labels
      .map((label) => (typeof label === 'string' ? label : (label.name ?? '')))
      .filter((name) => name !== ''),
    createdAt: issue.created_at,
    updatedAt: issue.updated_at,
    isPullRequest: issue.pull_request !== undefined && issue.pull_request !== null
  }
}

function toPullRequestInfo(pr: RawPullRequest): PullRequestInfo {
  return {
    number: pr.number,
    title: pr.title,
    body: pr.body ?? '',
    state: pr.state,
    draft: pr.draft ?? false,
    url: pr.html_url,
    author: pr.user.login,
    baseRef: pr.base.ref,
    headRef: pr.head.ref,
    baseSha: pr.base.sha,
    headSha: pr.head.sha,
    mergeCommitSha: pr.merge_commit_sha,
    mergeable: pr.mergeable,
    additions: pr.additions,
    deletions: pr.deletions,
    changedFiles: pr.changed_files,
    createdAt: pr.created_at,
    updatedAt: pr.updated_at
  }
}

function toListedPullRequestInfo(pr: RawListedPullRequest): PullRequestInfo {
  return {
    number: pr.number,
    title: pr.title,
    body: pr.body ?? '',
    state: pr.state,
    draft: pr.draft ?? false,
    url: pr.html_url,
    author: pr.user?.login ?? '',
    baseRef: pr.base.ref,
    headRef: pr.head.ref,
    baseSha: pr.base.sha,
    headSha: pr.head.sha,
    mergeCommitSha: pr.merge_commit_sha,
    mergeable: null,
    additions: 0,
    deletions: 0,
    changedFiles: 0,
    createdAt: pr.created_at,
    updatedAt: pr.updated_at
  }
}

function toIssueComment(comment: RawIssueComment): IssueComment {
  return {
    id: comment.id,
    url: comment.html_url,
    body: comment.body ?? '',
    author: comment.user?.login ?? '',
    createdAt: comment.created_at,
    updatedAt: comment.updated_at
  }
}

function toReviewComment(comment: RawReviewComment): ReviewComment {
  return {
    id: comment.id,
    url: comment.html_url,
    body: comment.body,
    author: comment.user?.login ?? '',
    path: comment.path,
    line: comment.line ?? comment.original_line ?? null,
    startLine: comment.start_line ?? null,
    side: comment.side ?? null,
    diffHunk: comment.diff_hunk,
    createdAt: comment.created_at,
    updatedAt: comment.updated_at,
    ...(comment.in_reply_to_id ? { inReplyToId: comment.in_reply_to_id } : {})
  }
}

function toCheckRun(run: RawCheckRun): CheckRun {
  return {
    id: run.id,
    name: run.name,
    status: run.status,
    conclusion: run.conclusion,
    detailsUrl: run.details_url,
    appSlug: run.app?.slug ?? null,
    startedAt: run.started_at,
    completedAt: run.completed_at
  }
}
