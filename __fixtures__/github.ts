import type { GitHubClient } from '../src/github/api.js'
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
} from '../src/github/types.js'
import { GitHubAPIError } from '../src/utils/errors.js'

export const BOT_LOGIN = 'github-actions[bot]'

type Mutation =
  | 'createIssueComment'
  | 'updateIssueComment'
  | 'createReviewReply'
  | 'createReview'
  | 'createPullRequest'
  | 'updatePullRequest'

/**
 * In-memory GitHub for one repository. Lists are paged like the REST API and
 * every mutating call is counted.
 */
export class FakeGitHub implements GitHubClient {
  readonly issues = new Map<number, IssueInfo>()
  readonly pulls = new Map<number, PullRequestInfo>()
  readonly diffs = new Map<number, string>()
  readonly files = new Map<number, ChangedFile[]>()
  readonly commits = new Map<number, CommitInfo[]>()
  readonly issueComments = new Map<number, IssueComment[]>()
  readonly reviewComments = new Map<number, ReviewComment[]>()
  readonly resolvedRoots = new Map<number, Set<number>>()
  readonly reviews = new Map<number, PullRequestReview[]>()
  readonly checkRuns = new Map<string, CheckRun[]>()
  readonly jobLogs = new Map<number, string>()
  readonly statuses = new Map<string, CombinedStatus>()

  readonly calls: string[] = []
  readonly mutations: Record<Mutation, number> = {
    createIssueComment: 0,
    updateIssueComment: 0,
    createReviewReply: 0,
    createReview: 0,
    createPullRequest: 0,
    updatePullRequest: 0
  }

  nextIssueCommentId = 2000000000
  nextReviewCommentId = 1000000000
  nextReviewId = 3000000000
  nextPullNumber = 100

  private failures = new Map<keyof GitHubClient, Error>()
  private clock = Date.UTC(2026, 0, 1)

  constructor(readonly botLogin: string = BOT_LOGIN) {}

  /** Make every later call to `method` reject. */
  failOn(
    method: keyof GitHubClient,
    error: Error = new GitHubAPIError(`Failed to ${method}: Server Error`, 500)
  ): void {
    this.failures.set(method, error)
  }

  addPullRequest(overrides: Partial<PullRequestInfo> = {}): PullRequestInfo {
    const pr = pullRequest(overrides)
    this.pulls.set(pr.number, pr)
    this.issues.set(
      pr.number,
      issue({ number: pr.number, title: pr.title, isPullRequest: true })
    )
    return pr
  }

  addIssue(overrides: Partial<IssueInfo> = {}): IssueInfo {
    const created = issue(overrides)
    this.issues.set(created.number, created)
    return created
  }

  async getIssue(ref: NumberedRef): Promise<IssueInfo> {
    this.enter('getIssue')
    return this.require(this.issues.get(ref.number), `issue #${ref.number}`)
  }

  async getPullRequest(ref: NumberedRef): Promise<PullRequestInfo> {
    this.enter('getPullRequest')
    return this.require(this.pulls.get(ref.number), `pull request #${ref.number}`)
  }

  async getPullRequestDiff(ref: NumberedRef): Promise<string> {
    this.enter('getPullRequestDiff')
    return this.diffs.get(ref.number) ?? ''
  }

  async listPullRequestFiles(
    ref: NumberedRef,
    request: PageRequest
  ): Promise<Page<ChangedFile>> {
    this.enter('listPullRequestFiles')
    return paginate(this.files.get(ref.number) ?? [], request)
  }

  async listPullRequestCommits(
    ref: NumberedRef,
    request: PageRequest
  ): Promise<Page<CommitInfo>> {
    this.enter('listPullRequestCommits')
    return paginate(this.commits.get(ref.number) ?? [], request)
  }

  async listIssueComments(
    ref: NumberedRef,
    request: PageRequest
  ): Promise<Page<IssueComment>> {
    this.enter('listIssueComments')
    return paginate(this.issueComments.get(ref.number) ?? [], request)
  }

  async listReviewComments(
    ref: NumberedRef,
    request: PageRequest
  ): Promise<Page<ReviewComment>> {
    this.enter('listReviewComments')
    return paginate(this.reviewComments.get(ref.number) ?? [], request)
  }

  async listResolvedThreadRootIds(ref: NumberedRef): Promise<Set<number>> {
    this.enter('listResolvedThreadRootIds')
    return new Set(this.resolvedRoots.get(ref.number) ?? [])
  }

  async listReviews(
    ref: NumberedRef,
    request: PageRequest
  ): Promise<Page<PullRequestReview>> {
    this.enter('listReviews')
    return paginate(this.reviews.get(ref.number) ?? [], request)
  }

  async listCheckRuns(
    _repo: RepoRef,
    sha: string,
    request: PageRequest
  ): Promise<Page<CheckRun>> {
    this.enter('listCheckRuns')
    return paginate(this.checkRuns.get(sha) ?? [], request)
  }

  async getJobLogs(_repo: RepoRef, jobId: number): Promise<string> {
    this.enter('getJobLogs')
    return this.require(this.jobLogs.get(jobId), `logs for job ${jobId}`)
  }

  async getCombinedStatus(_repo: RepoRef, sha: string): Promise<CombinedStatus> {
    this.enter('getCombinedStatus')
    return (
      this.statuses.get(sha) ?? { sha, state: 'pending', totalCount: 0, statuses: [] }
    )
  }

  async listOpenPullRequests(
    _repo: RepoRef,
    head: string,
    request: PageRequest
  ): Promise<Page<PullRequestInfo>> {
    this.enter('listOpenPullRequests')
    const branch = head.includes(':') ? head.slice(head.indexOf(':') + 1) : head
    const open = [...this.pulls.values()].filter(
      (pr) => pr.state === 'open' && pr.headRef === branch
    )
    return paginate(open, request)
  }

  async createIssueComment(
    ref: NumberedRef,
    body: string
  ): Promise<IssueComment> {
    this.enter('createIssueComment')
    this.mutations.createIssueComment++
    const id = ++this.nextIssueCommentId
    const createdAt = this.tick()
    const comment: IssueComment = {
      id,
      url: `https://github.com/${ref.owner}/${ref.repo}/issues/${ref.number}#issuecomment-${id}`,
      body,
      author: this.botLogin,
      createdAt,
      updatedAt: createdAt
    }
    this.listFor(this.issueComments, ref.number).push(comment)
    return comment
  }

  async updateIssueComment(
    _repo: RepoRef,
    commentId: number,
    body: string
  ): Promise<IssueComment> {
    this.enter('updateIssueComment')
    this.mutations.updateIssueComment++
    for (const comments of this.issueComments.values()) {
      const comment = comments.find((c) => c.id === commentId)
      if (comment) {
        comment.body = body
        comment.updatedAt = this.tick()
        return { ...comment }
      }
    }
    throw new GitHubAPIError(`Failed to update comment ${commentId}: Not Found`, 404)
  }

  async createReviewReply(
    ref: NumberedRef,
    commentId: number,
    body: string
  ): Promise<ReviewComment> {
    this.enter('createReviewReply')
    const comments = this.listFor(this.reviewComments, ref.number)
    const parent = this.require(
      comments.find((c) => c.id === commentId),
      `review comment ${commentId}`
    )
    this.mutations.createReviewReply++
    const reply = reviewComment(++this.nextReviewCommentId, {
      body,
      author: this.botLogin,
      path: parent.path,
      line: parent.line,
      createdAt: this.tick(),
      inReplyToId: commentId
    })
    comments.push(reply)
    return reply
  }

  async createReview(
    ref: NumberedRef,
    draft: ReviewDraft
  ): Promise<PullRequestReview> {
    this.enter('createReview')
    this.mutations.createReview++
    const pr = this.require(this.pulls.get(ref.number), `pull request #${ref.number}`)
    const review: PullRequestReview = {
      id: ++this.nextReviewId,
      author: this.botLogin,
      body: draft.body,
      state: draft.event === 'COMMENT' ? 'COMMENTED' : draft.event,
      commitId: draft.commitId ?? pr.headSha
    }
    this.listFor(this.reviews, ref.number).push(review)
    for (const comment of draft.comments) {
      this.listFor(this.reviewComments, ref.number).push(
        reviewComment(++this.nextReviewCommentId, {
          body: comment.body,
          author: this.botLogin,
          path: comment.path,
          line: comment.line,
          createdAt: this.tick()
        })
      )
    }
    return review
  }

  async createPullRequest(
    _repo: RepoRef,
    draft: PullRequestDraft
  ): Promise<PullRequestInfo> {
    this.enter('createPullRequest')
    this.mutations.createPullRequest++
    return this.addPullRequest({
      number: ++this.nextPullNumber,
      title: draft.title,
      body: draft.body,
      headRef: draft.head,
      baseRef: draft.base,
      draft: draft.draft,
      author: this.botLogin
    })
  }

  async updatePullRequest(
    ref: NumberedRef,
    patch: PullRequestPatch
  ): Promise<PullRequestInfo> {
    this.enter('updatePullRequest')
    const pr = this.require(this.pulls.get(ref.number), `pull request #${ref.number}`)
    this.mutations.updatePullRequest++
    const updated: PullRequestInfo = {
      ...pr,
      ...(patch.title !== undefined ? { title: patch.title } : {}),
      ...(patch.body !== undefined ? { body: patch.body } : {}),
      ...(patch.state !== undefined ? { state: patch.state } : {}),
      ...(patch.base !== undefined ? { baseRef: patch.base } : {}),
      updatedAt: this.tick()
    }
    this.pulls.set(ref.number, updated)
    return updated
  }

  totalMutations(): number {
    return Object.values(this.mutations).reduce((sum, n) => sum + n, 0)
  }

  private enter(method: keyof GitHubClient): void {
    this.calls.push(method)
    const failure = this.failures.get(method)
    if (failure) {
      throw failure
    }
  }

  private require<T>(value: T | undefined, what: string): T {
    if (value === undefined) {
      throw new GitHubAPIError(`Not Found: ${what}`, 404)
    }
    return value
  }

  private listFor<T>(map: Map<number, T[]>, key: number): T[] {
    let list = map.get(key)
    if (!list) {
      list = []
      map.set(key, list)
    }
    return list
  }

  private tick(): string {
    this.clock += 1000
    return new Date(this.clock).toISOString()
  }
}

function paginate<T>(items: T[], request: PageRequest): Page<T> {
  const start = (request.page - 1) * request.perPage
  return {
    items: items.slice(start, start + request.perPage),
    hasNextPage: start + request.perPage < items.length
  }
}

export function pullRequest(
  overrides: Partial<PullRequestInfo> = {}
): PullRequestInfo {
  return {
    number: 42,
    title: 'Add retry budget',
    body: 'Adds a retry budget to the scheduler.',
    state: 'open',
    draft: false,
    url: `https://github.com/acme/widgets/pull/${overrides.number ?? 42}`,
    author: 'octo-dev',
    baseRef: 'main',
    headRef: 'feature/retry-budget',
    baseSha: 'base000',
    headSha: 'head111',
    mergeCommitSha: null,
    mergeable: true,
    additions: 10,
    deletions: 2,
    changedFiles: 1,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides
  }
}

export function issue(overrides: Partial<IssueInfo> = {}): IssueInfo {
  return {
    number: 7,
    title: 'Scheduler drops jobs',
    body: 'Jobs vanish after a restart.',
    state: 'open',
    url: `https://github.com/acme/widgets/issues/${overrides.number ?? 7}`,
    author: 'octo-user',
    assignees: [],
    labels: ['bug'],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    isPullRequest: false,
    ...overrides
  }
}

export function issueComment(
  id: number,
  overrides: Partial<IssueComment> = {}
): IssueComment {
  return {
    id,
    url: `https://github.com/acme/widgets/issues/42#issuecomment-${id}`,
    body: `comment ${id}`,
    author: 'octo-user',
    createdAt: '2026-01-02T00:00:00.000Z',
    updatedAt: '2026-01-02T00:00:00.000Z',
    ...overrides
  }
}

export function reviewComment(
  id: number,
  overrides: Partial<ReviewComment> = {}
): ReviewComment {
  return {
    id,
    url: `https://github.com/acme/widgets/pull/42#discussion_r${id}`,
    body: `review comment ${id}`,
    author: 'octo-reviewer',
    path: 'src/scheduler.ts',
    line: 10,
    startLine: null,
    side: 'RIGHT',
    diffHunk: '@@ -1,3 +1,4 @@',
    createdAt: '2026-01-02T00:00:00.000Z',
    updatedAt: '2026-01-02T00:00:00.000Z',
    ...overrides
  }
}
