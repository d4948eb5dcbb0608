import type { Reply, ResolvedTargetRef, ReviewThread, TargetKind } from '../github/types.js'

export type ArtifactStatus = 'present' | 'missing' | 'error'

export type ArtifactFormat = 'json' | 'text'

export type Artifact = {
  id: string
  path: string
  status: ArtifactStatus
  format: ArtifactFormat
  description: string
  requiredFor: TargetKind[]
}

export type CollectionManifest = {
  schemaVersion: string
  provider: string
  /** `unknown` only when the kind lookup itself failed. */
  kind: TargetKind | 'unknown'
  ref: string
  owner: string
  repo: string
  number: number
  collectedAt: string
  success: boolean
  artifacts: Artifact[]
  notes: string[]
}

export type CollectOptions = {
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

export type CollectionResult = {
  ref: ResolvedTargetRef
  manifest: CollectionManifest
  manifestPath: string
  /** Set when a required artifact failed verification. */
  verificationError?: string
}

export type ThreadGroupingOptions = {
  triggerCommentId?: number
  resolvedRootIds?: ReadonlySet<number>
}

export type ThreadGrouping = {
  threads: ReviewThread[]
  /** Replies whose parent could not be traced to any root. */
  orphans: Reply[]
}
