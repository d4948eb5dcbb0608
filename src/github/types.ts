export type TargetKind = 'issue' | 'pr'

export type RepoRef = {
  owner: string
  repo: string
}

export type TargetRef = RepoRef & {
  number: number
  kind: TargetKind | 'unknown'
}

export type ResolvedTargetRef = RepoRef & {
  number: number
  kind: TargetKind
}

/** Issue or pull request addressed by number, independent of its kind. */
export type NumberedRef = RepoRef & {
  number: number
}

export type PageRequest = {
  page: number
  perPage: number
}

export type Page<T> = {
  items: T[]
  hasNextPage: boolean
}

export type IssueInfo = {
  number: number
  title: string
  body: string
  state: string
  url: string
  author: string
  assignees: string[]
  labels: string[]
  createdAt: string
  updatedAt: string
  isPullRequest: boolean
}

export type PullRequestInfo = {
  number: number
  title: string
  body: string
  state: string
  draft: boolean
  url: string
  author: string
  baseRef: string
  headRef: string
  baseSha: string
  headSha: string
  mergeCommitSha: string | null
  mergeable: boolean | null
  additions: number
  deletions: number
  changedFiles: number
  createdAt: string
  updatedAt: string
}

export type IssueComment = {
  id: number
  url: string
  body: string
  author: string
  createdAt: string
  updatedAt: string
}

export type Comment = IssueComment & {
  isTrigger: boolean
}

/** A pull request review comment as listed by the REST API. */
export type ReviewComment = {
  id: number
  url: string
  body: string
  author: string
  path: string
  line: number | null
  startLine: number | null
  side: string | null
  diffHunk: string
  createdAt: string
  updatedAt: string
  inReplyToId?: number
}

export type Reply = {
  commentId: number
  url: string
  body: string
  author: string
  createdAt: string
  inReplyToId: number
  isTrigger: boolean
}

export type ReviewThread = {
  rootCommentId: number
  url: string
  path: string
  line: number | null
  startLine: number | null
  side: string | null
  diffHunk: string
  body: string
  author: string
  createdAt: string
  resolved: boolean
  isTrigger: boolean
  replies: Reply[]
}

export type ChangedFile = {
  filename: string
  status: string
  additions: number
  deletions: number
  changes: number
  patch?: string
}

export type CommitInfo = {
  sha: string
  message: string
  author: string
  date: string | null
}

export type CheckRun = {
  id: number
  name: string
  status: string
  conclusion: string | null
  detailsUrl: string | null
  appSlug: string | null
  startedAt: string | null
  completedAt: string | null
}

export type CommitStatus = {
  context: string
  state: string
  description: string | null
  targetUrl: string | null
}

export type CombinedStatus = {
  sha: string
  state: string
  totalCount: number
  statuses: CommitStatus[]
}

export type PullRequestReview = {
  id: number
  author: string
  body: string
  state: string
  commitId: string | null
}

export type ReviewDraftComment = {
  path: string
  line: number
  body: string
  side?: 'LEFT' | 'RIGHT'
  startLine?: number
  startSide?: 'LEFT' | 'RIGHT'
}

export type ReviewDraft = {
  body: string
  event: 'COMMENT' | 'APPROVE' | 'REQUEST_CHANGES'
  commitId?: string
  comments: ReviewDraftComment[]
}

export type PullRequestDraft = {
  title: string
  body: string
  head: string
  base: string
  draft: boolean
}

export type PullRequestPatch = {
  title?: string
  body?: string
  state?: 'open' | 'closed'
  base?: string
}
