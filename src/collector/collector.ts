import { mkdir, rm, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'

import { MANIFEST_SCHEMA_VERSION } from '../config/constants.js'
import type { GitHubClient } from '../github/api.js'
import { collectAll } from '../github/pagination.js'
import { formatReference, lookupTargetKind } from '../github/reference.js'
import type {
  CheckRun,
  Comment,
  IssueInfo,
  NumberedRef,
  PullRequestInfo,
  ResolvedTargetRef,
  ReviewThread,
  TargetKind,
  TargetRef
} from '../github/types.js'
import {
  CollectionError,
  VerificationError,
  errorMessage
} from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import { writeManifest } from './manifest.js'
import { groupReviewThreads } from './threads.js'
import type {
  Artifact,
  CollectOptions,
  CollectionManifest,
  CollectionResult
} from './types.js'
import { verifyArtifacts } from './verifier.js'

type ArtifactEntry = Omit<Artifact, 'status'>

const FAILING_CONCLUSIONS = new Set(['failure', 'timed_out', 'action_required'])

const PR_METADATA: ArtifactEntry = {
  id: 'pr_metadata',
  path: 'github/pr.json',
  format: 'json',
  description: 'Pull request metadata and head/base refs.',
  requiredFor: ['pr']
}
const PR_FILES: ArtifactEntry = {
  id: 'files',
  path: 'github/files.json',
  format: 'json',
  description: 'Changed files list with per-file stats.',
  requiredFor: ['pr']
}
const REVIEW_THREADS: ArtifactEntry = {
  id: 'review_threads',
  path: 'github/review_threads.json',
  format: 'json',
  description: 'Existing review threads for deduplication.',
  requiredFor: []
}
const ORPHANED_REPLIES: ArtifactEntry = {
  id: 'orphaned_replies',
  path: 'github/orphaned_replies.json',
  format: 'json',
  description: 'Review replies whose thread root could not be found.',
  requiredFor: []
}
const PR_COMMENTS: ArtifactEntry = {
  id: 'comments',
  path: 'github/comments.json',
  format: 'json',
  description: 'Issue-style PR comments from the discussion timeline.',
  requiredFor: []
}
const PR_DIFF: ArtifactEntry = {
  id: 'diff',
  path: 'github/pr.diff',
  format: 'text',
  description: 'Unified diff for the pull request.',
  requiredFor: []
}
const CHECK_RUNS: ArtifactEntry = {
  id: 'check_runs',
  path: 'github/check_runs.json',
  format: 'json',
  description: 'Check runs on the PR head SHA.',
  requiredFor: []
}
const FAILURE_LOGS: ArtifactEntry = {
  id: 'test_failure_logs',
  path: 'github/test-failure-logs.txt',
  format: 'text',
  description: 'Workflow logs of failing check runs.',
  requiredFor: []
}
const COMMIT_STATUS: ArtifactEntry = {
  id: 'commit_status',
  path: 'github/commit_status.json',
  format: 'json',
  description: 'Combined commit status on the PR head SHA.',
  requiredFor: []
}
const PR_COMMITS: ArtifactEntry = {
  id: 'commits',
  path: 'github/commits.json',
  format: 'json',
  description: 'Commit list and metadata for the pull request.',
  requiredFor: []
}
const ISSUE_METADATA: ArtifactEntry = {
  id: 'issue_metadata',
  path: 'github/issue.json',
  format: 'json',
  description: 'Issue metadata including title/body/state.',
  requiredFor: ['issue']
}
const ISSUE_COMMENTS: ArtifactEntry = {
  id: 'comments',
  path: 'github/comments.json',
  format: 'json',
  description: 'Issue comments in chronological order.',
  requiredFor: ['issue']
}

/** Per-run accumulator of artifact entries and notes. */
class ArtifactLog {
  readonly artifacts: Artifact[] = []
  readonly notes: string[] = []

  constructor(private contextDir: string) {}

  async write(entry: ArtifactEntry, content: string): Promise<void> {
    const fullPath = join(this.contextDir, entry.path)
    await mkdir(dirname(fullPath), { recursive: true })
    await writeFile(fullPath, content, 'utf8')
    this.record(entry, 'present')
  }

  async missing(entry: ArtifactEntry, note: string): Promise<void> {
    await this.clear(entry)
    this.record(entry, 'missing')
    this.note(note)
  }

  async failed(entry: ArtifactEntry, note: string): Promise<void> {
    await this.clear(entry)
    this.record(entry, 'error')
    this.note(note)
  }

  /** Remove a file an earlier run left behind, without recording an entry. */
  async clear(entry: ArtifactEntry): Promise<void> {
    await rm(join(this.contextDir, entry.path), { force: true })
  }

  note(note: string): void {
    this.notes.push(note)
  }

  private record(entry: ArtifactEntry, status: Artifact['status']): void {
    this.artifacts.push({ ...entry, status })
  }
}

/**
 * Fetches everything known about an issue or pull request into a context
 * directory and describes it in `manifest.json`.
 */
export class Collector {
  constructor(private client: GitHubClient) {}

  async collect(
    target: TargetRef,
    options: CollectOptions
  ): Promise<CollectionResult> {
    const log = new ArtifactLog(options.contextDir)
    const display = formatReference(target)

    let ref: ResolvedTargetRef
    let issue: IssueInfo | undefined
    try {
      const lookup = await lookupTargetKind(this.client, target)
      ref = lookup.ref
      issue = lookup.issue
    } catch (error) {
      log.note(`Failed to determine whether ${display} is an issue or a pull request.`)
      await this.finish(target, 'unknown', options, log, false)
      throw new CollectionError(
        `Failed to resolve ${display}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      )
    }

    await logger.group(`Collecting ${ref.kind} context for ${display}`, async () => {
      if (ref.kind === 'pr') {
        await this.collectPullRequest(ref, options, log)
      } else {
        await this.collectIssue(ref, options, log, issue)
      }
    })

    let verificationError: string | undefined
    try {
      await verifyArtifacts(options.contextDir, ref.kind, log.artifacts)
    } catch (error) {
      if (!(error instanceof VerificationError)) {
        throw error
      }
      verificationError = error.message
      log.note(error.message)
      logger.error(error.message)
    }

    const { manifest, manifestPath } = await this.finish(
      ref,
      ref.kind,
      options,
      log,
      verificationError === undefined
    )

    return {
      ref,
      manifest,
      manifestPath,
      ...(verificationError !== undefined ? { verificationError } : {})
    }
  }

  private async collectPullRequest(
    ref: ResolvedTargetRef,
    options: CollectOptions,
    log: ArtifactLog
  ): Promise<void> {
    let pr: PullRequestInfo
    try {
      pr = await this.client.getPullRequest(ref)
    } catch (error) {
      await log.failed(PR_METADATA, 'Failed to fetch pull request metadata.')
      await this.finish(ref, 'pr', options, log, false)
      throw new CollectionError(
        `Failed to fetch pull request ${formatReference(ref)}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      )
    }
    await log.write(PR_METADATA, toJson(pr))
    logger.info(`Pull request #${pr.number}: ${pr.title}`)

    if (options.includeFiles) {
      await this.capture(log, PR_FILES, 'changed files', async () => {
        const files = await collectAll(
          (page) => this.client.listPullRequestFiles(ref, page),
          { limit: options.maxFiles }
        )
        if (pr.changedFiles > files.length) {
          log.note(
            `Changed files truncated to ${files.length} of ${pr.changedFiles} (max_files=${options.maxFiles}).`
          )
        }
        return toJson(files)
      })
    } else {
      await log.missing(
        { ...PR_FILES, requiredFor: [] },
        'Skipped files collection because include_files=false.'
      )
    }

    if (options.includeThreads) {
      await this.capture(log, REVIEW_THREADS, 'review threads', async () =>
        toJson(await this.fetchReviewThreads(ref, options, log))
      )
    } else {
      await log.missing(
        REVIEW_THREADS,
        'Skipped review threads collection because include_threads=false.'
      )
      await log.clear(ORPHANED_REPLIES)
    }

    await this.capture(log, PR_COMMENTS, 'comments', async () =>
      toJson(await this.fetchComments(ref, options.triggerCommentId))
    )

    if (options.includeDiff) {
      await this.capture(log, PR_DIFF, 'diff', async () =>
        this.client.getPullRequestDiff(ref)
      )
    } else {
      await log.missing(PR_DIFF, 'Skipped diff collection because include_diff=false.')
    }

    if (options.includeChecks) {
      await this.collectChecks(ref, pr.headSha, options, log)
    } else {
      await log.missing(
        CHECK_RUNS,
        'Skipped check runs collection because include_checks=false.'
      )
      await log.missing(
        COMMIT_STATUS,
        'Skipped commit status collection because include_checks=false.'
      )
      await log.clear(FAILURE_LOGS)
    }

    if (options.includeCommits) {
      await this.capture(log, PR_COMMITS, 'commits', async () =>
        toJson(
          await collectAll((page) =>
            this.client.listPullRequestCommits(ref, page)
          )
        )
      )
    } else {
      await log.missing(
        PR_COMMITS,
        'Skipped commits collection because include_commits=false.'
      )
    }
  }

  private async collectIssue(
    ref: ResolvedTargetRef,
    options: CollectOptions,
    log: ArtifactLog,
    known?: IssueInfo
  ): Promise<void> {
    try {
      const issue = known ?? (await this.client.getIssue(ref))
      await log.write(ISSUE_METADATA, toJson(issue))
      logger.info(`Issue #${issue.number}: ${issue.title}`)
    } catch (error) {
      await log.failed(ISSUE_METADATA, 'Failed to fetch issue metadata.')
      await this.finish(ref, 'issue', options, log, false)
      throw new CollectionError(
        `Failed to fetch issue ${formatReference(ref)}: ${errorMessage(error)}`,
        error instanceof Error ? error : undefined
      )
    }

    await this.capture(log, ISSUE_COMMENTS, 'comments', async () =>
      toJson(await this.fetchComments(ref, options.triggerCommentId))
    )
  }

  private async collectChecks(
    ref: ResolvedTargetRef,
    headSha: string,
    options: CollectOptions,
    log: ArtifactLog
  ): Promise<void> {
    let runs: CheckRun[] = []
    const fetched = await this.capture(log, CHECK_RUNS, 'check runs', async () => {
      runs = await collectAll(
        (page) => this.client.listCheckRuns(ref, headSha, page),
        { limit: options.maxCheckRuns }
      )
      return toJson(runs)
    })

    const failing = runs.filter(
      (run) =>
        run.conclusion !== null &&
        FAILING_CONCLUSIONS.has(run.conclusion) &&
        run.appSlug === 'github-actions'
    )
    if (fetched && failing.length > 0) {
      await this.capture(log, FAILURE_LOGS, 'workflow logs', async () =>
        this.fetchFailureLogs(ref, failing, log)
      )
    } else {
      await log.clear(FAILURE_LOGS)
    }

    await this.capture(log, COMMIT_STATUS, 'commit status', async () =>
      toJson(await this.client.getCombinedStatus(ref, headSha))
    )
  }

  private async fetchReviewThreads(
    ref: ResolvedTargetRef,
    options: CollectOptions,
    log: ArtifactLog
  ): Promise<ReviewThread[]> {
    const comments = await collectAll((page) =>
      this.client.listReviewComments(ref, page)
    )

    let resolvedRootIds = new Set<number>()
    try {
      resolvedRootIds = await this.client.listResolvedThreadRootIds(ref)
    } catch (error) {
      logger.warning(
        `Could not determine resolved review threads: ${errorMessage(error)}`
      )
    }

    const { threads, orphans } = groupReviewThreads(comments, {
      triggerCommentId: options.triggerCommentId,
      resolvedRootIds
    })
    logger.info(
      `Grouped ${comments.length} review comments into ${threads.length} threads`
    )

    if (orphans.length > 0) {
      await log.write(ORPHANED_REPLIES, toJson(orphans))
      log.note(
        `Kept ${orphans.length} review replies whose thread root was not found.`
      )
    } else {
      await log.clear(ORPHANED_REPLIES)
    }

    return threads
  }

  private async fetchComments(
    ref: NumberedRef,
    triggerCommentId: number | undefined
  ): Promise<Comment[]> {
    const comments = await collectAll((page) =>
      this.client.listIssueComments(ref, page)
    )
    const seen = new Set<number>()
    return comments
      .filter((comment) => {
        if (seen.has(comment.id)) {
          return false
        }
        seen.add(comment.id)
        return true
      })
      .map((comment) => ({
        ...comment,
        isTrigger: comment.id === triggerCommentId
      }))
  }

  private async fetchFailureLogs(
    ref: ResolvedTargetRef,
    runs: CheckRun[],
    log: ArtifactLog
  ): Promise<string> {
    const sections: string[] = []
    let failures = 0

    for (const run of runs) {
      try {
        const logs = await this.client.getJobLogs(ref, run.id)
        sections.push(`=== ${run.name} (${run.conclusion}) ===\n${logs.trimEnd()}\n`)
      } catch (error) {
        failures++
        log.note(`Failed to fetch workflow logs for ${run.name}.`)
        logger.warning(
          `Failed to fetch logs for check run ${run.id}: ${errorMessage(error)}`
        )
      }
    }

    if (failures === runs.length) {
      throw new CollectionError('No workflow logs could be downloaded')
    }
    return sections.join('\n')
  }

  /** Runs one best-effort fetch, recording `error` instead of throwing. */
  private async capture(
    log: ArtifactLog,
    entry: ArtifactEntry,
    label: string,
    fetch: () => Promise<string>
  ): Promise<boolean> {
    try {
      const content = await fetch()
      await log.write(entry, content)
      return true
    } catch (error) {
      logger.warning(`Failed to fetch ${label}: ${errorMessage(error)}`)
      await log.failed(entry, `Failed to fetch ${label}.`)
      return false
    }
  }

  private async finish(
    ref: NumberedRef,
    kind: TargetKind | 'unknown',
    options: CollectOptions,
    log: ArtifactLog,
    success: boolean
  ): Promise<{ manifest: CollectionManifest; manifestPath: string }> {
    const manifest: CollectionManifest = {
      schemaVersion: MANIFEST_SCHEMA_VERSION,
      provider: options.provider,
      kind,
      ref: formatReference(ref),
      owner: ref.owner,
      repo: ref.repo,
      number: ref.number,
      collectedAt: new Date().toISOString(),
      success,
      artifacts: log.artifacts,
      notes: log.notes
    }
    const manifestPath = await writeManifest(options.contextDir, manifest)
    logger.info(
      `Wrote manifest ${manifestPath} (${log.artifacts.length} artifacts, success=${success})`
    )
    return { manifest, manifestPath }
  }
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}
