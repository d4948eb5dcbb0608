/**
 * Unit tests for context collection, src/collector/collector.ts
 */
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals'
import { access, mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

jest.mock('@actions/core', () => jest.requireActual('../__fixtures__/core'))

import * as core from '../__fixtures__/core.js'
import {
  FakeGitHub,
  issueComment,
  reviewComment
} from '../__fixtures__/github.js'
import { Collector } from '../src/collector/collector.js'
import { readManifest } from '../src/collector/manifest.js'
import type { CollectOptions } from '../src/collector/types.js'
import { parseReference } from '../src/github/reference.js'
import type { ChangedFile } from '../src/github/types.js'
import { CollectionError } from '../src/utils/errors.js'

function changedFile(filename: string): ChangedFile {
  return { filename, status: 'modified', additions: 3, deletions: 1, changes: 4 }
}

function seedPullRequest(github: FakeGitHub): void {
  github.addPullRequest({ number: 42, headSha: 'head111', changedFiles: 1 })
  github.files.set(42, [changedFile('src/scheduler.ts')])
  github.diffs.set(42, 'diff --git a/src/scheduler.ts b/src/scheduler.ts\n')
  github.issueComments.set(42, [issueComment(501), issueComment(502)])
  github.reviewComments.set(42, [
    reviewComment(1001),
    reviewComment(1002, { inReplyToId: 1001 })
  ])
  github.resolvedRoots.set(42, new Set([1001]))
  github.checkRuns.set('head111', [
    {
      id: 601,
      name: 'unit-tests',
      status: 'completed',
      conclusion: 'failure',
      detailsUrl: null,
      appSlug: 'github-actions',
      startedAt: null,
      completedAt: null
    },
    {
      id: 602,
      name: 'lint',
      status: 'completed',
      conclusion: 'success',
      detailsUrl: null,
      appSlug: 'github-actions',
      startedAt: null,
      completedAt: null
    }
  ])
  github.jobLogs.set(601, 'FAIL src/queue.test.ts\n')
  github.commits.set(42, [
    { sha: 'head111', message: 'Add retry budget', author: 'octo-dev', date: null }
  ])
}

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf8'))
}

describe('Collector', () => {
  let contextDir: string
  let github: FakeGitHub
  let collector: Collector

  function options(overrides: Partial<CollectOptions> = {}): CollectOptions {
    return {
      contextDir,
      includeDiff: true,
      includeChecks: true,
      includeThreads: true,
      includeFiles: true,
      includeCommits: true,
      maxFiles: 200,
      maxCheckRuns: 200,
      provider: 'threadline',
      ...overrides
    }
  }

  beforeEach(async () => {
    jest.clearAllMocks()
    contextDir = await mkdtemp(join(tmpdir(), 'collector-'))
    github = new FakeGitHub()
    collector = new Collector(github)
  })

  afterEach(async () => {
    await rm(contextDir, { recursive: true, force: true })
  })

  it('collects every pull request resource and writes the manifest', async () => {
    seedPullRequest(github)

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options({ triggerCommentId: 502 })
    )

    expect(result.ref.kind).toBe('pr')
    expect(result.verificationError).toBeUndefined()
    expect(result.manifest.success).toBe(true)
    expect(result.manifest.notes).toEqual([])
    expect(result.manifest.artifacts.map((a) => [a.id, a.status])).toEqual([
      ['pr_metadata', 'present'],
      ['files', 'present'],
      ['review_threads', 'present'],
      ['comments', 'present'],
      ['diff', 'present'],
      ['check_runs', 'present'],
      ['test_failure_logs', 'present'],
      ['commit_status', 'present'],
      ['commits', 'present']
    ])

    const onDisk = await readManifest(result.manifestPath)
    expect(onDisk.ref).toBe('acme/widgets#42')
    expect(onDisk.kind).toBe('pr')
    expect(onDisk.artifacts).toEqual(result.manifest.artifacts)
  })

  it('writes grouped threads with resolution state', async () => {
    seedPullRequest(github)

    await collector.collect(parseReference('acme/widgets/pull/42'), options())

    const threads = await readJson(join(contextDir, 'github/review_threads.json'))
    expect(threads).toHaveLength(1)
    expect(threads).toMatchObject([
      {
        rootCommentId: 1001,
        resolved: true,
        replies: [{ commentId: 1002, inReplyToId: 1001 }]
      }
    ])
  })

  it('marks the trigger comment and writes failing workflow logs', async () => {
    seedPullRequest(github)

    await collector.collect(
      parseReference('acme/widgets#42'),
      options({ triggerCommentId: 502 })
    )

    expect(await readJson(join(contextDir, 'github/comments.json'))).toMatchObject([
      { id: 501, isTrigger: false },
      { id: 502, isTrigger: true }
    ])
    expect(
      await readFile(join(contextDir, 'github/test-failure-logs.txt'), 'utf8')
    ).toBe('=== unit-tests (failure) ===\nFAIL src/queue.test.ts\n')
    expect(github.calls.filter((c) => c === 'getJobLogs')).toHaveLength(1)
  })

  it('collects issue metadata and comments for issues', async () => {
    github.addIssue({ number: 7 })
    github.issueComments.set(7, [issueComment(801)])

    const result = await collector.collect(
      parseReference('7', 'acme/widgets'),
      options()
    )

    expect(result.ref.kind).toBe('issue')
    expect(result.manifest.success).toBe(true)
    expect(result.manifest.artifacts).toEqual([
      {
        id: 'issue_metadata',
        path: 'github/issue.json',
        status: 'present',
        format: 'json',
        description: 'Issue metadata including title/body/state.',
        requiredFor: ['issue']
      },
      {
        id: 'comments',
        path: 'github/comments.json',
        status: 'present',
        format: 'json',
        description: 'Issue comments in chronological order.',
        requiredFor: ['issue']
      }
    ])
  })

  it('records a missing artifact with a note for each disabled toggle', async () => {
    seedPullRequest(github)

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options({
        includeDiff: false,
        includeChecks: false,
        includeThreads: false,
        includeFiles: false,
        includeCommits: false
      })
    )

    expect(result.manifest.success).toBe(true)
    expect(result.manifest.artifacts.map((a) => [a.id, a.status])).toEqual([
      ['pr_metadata', 'present'],
      ['files', 'missing'],
      ['review_threads', 'missing'],
      ['comments', 'present'],
      ['diff', 'missing'],
      ['check_runs', 'missing'],
      ['commit_status', 'missing'],
      ['commits', 'missing']
    ])
    expect(
      result.manifest.artifacts.find((a) => a.id === 'files')?.requiredFor
    ).toEqual([])
    expect(result.manifest.notes).toEqual([
      'Skipped files collection because include_files=false.',
      'Skipped review threads collection because include_threads=false.',
      'Skipped diff collection because include_diff=false.',
      'Skipped check runs collection because include_checks=false.',
      'Skipped commit status collection because include_checks=false.',
      'Skipped commits collection because include_commits=false.'
    ])
    expect(github.calls).not.toContain('getPullRequestDiff')
    expect(github.calls).not.toContain('listCheckRuns')
  })

  it('keeps going when a secondary fetch fails', async () => {
    seedPullRequest(github)
    github.failOn('getPullRequestDiff')

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options()
    )

    expect(result.manifest.success).toBe(true)
    expect(result.manifest.artifacts.find((a) => a.id === 'diff')?.status).toBe(
      'error'
    )
    expect(result.manifest.notes).toEqual(['Failed to fetch diff.'])
    expect(
      result.manifest.artifacts.find((a) => a.id === 'commits')?.status
    ).toBe('present')
  })

  it('writes a failed manifest and throws when metadata cannot be fetched', async () => {
    seedPullRequest(github)
    github.failOn('getPullRequest')

    await expect(
      collector.collect(
        parseReference('https://github.com/acme/widgets/pull/42'),
        options()
      )
    ).rejects.toThrow(
      new CollectionError(
        'Failed to fetch pull request acme/widgets#42: Failed to getPullRequest: Server Error'
      )
    )

    const manifest = await readManifest(join(contextDir, 'manifest.json'))
    expect(manifest.success).toBe(false)
    expect(manifest.kind).toBe('pr')
    expect(manifest.artifacts.map((a) => [a.id, a.status])).toEqual([
      ['pr_metadata', 'error']
    ])
    expect(manifest.notes).toEqual(['Failed to fetch pull request metadata.'])
  })

  it('writes a failed manifest when the kind lookup fails', async () => {
    github.failOn('getIssue')

    await expect(
      collector.collect(parseReference('acme/widgets#42'), options())
    ).rejects.toThrow(CollectionError)

    const manifest = await readManifest(join(contextDir, 'manifest.json'))
    expect(manifest.kind).toBe('unknown')
    expect(manifest.success).toBe(false)
    expect(manifest.artifacts).toEqual([])
  })

  it('fails verification when a required file could not be fetched', async () => {
    seedPullRequest(github)
    github.failOn('listPullRequestFiles')

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options()
    )

    expect(result.manifest.success).toBe(false)
    expect(result.verificationError).toBe(
      'Required context file missing: github/files.json (check token and network connectivity)'
    )
    expect(result.manifest.notes).toEqual([
      'Failed to fetch changed files.',
      'Required context file missing: github/files.json (check token and network connectivity)'
    ])
  })

  it('leaves threads unresolved when resolution cannot be queried', async () => {
    seedPullRequest(github)
    github.failOn('listResolvedThreadRootIds')

    await collector.collect(parseReference('acme/widgets#42'), options())

    const threads = await readJson(join(contextDir, 'github/review_threads.json'))
    expect(threads).toMatchObject([{ rootCommentId: 1001, resolved: false }])
    expect(core.warning).toHaveBeenCalledWith(
      'Could not determine resolved review threads: Failed to listResolvedThreadRootIds: Server Error'
    )
  })

  it('keeps orphaned replies in their own artifact', async () => {
    seedPullRequest(github)
    github.reviewComments.get(42)?.push(reviewComment(1003, { inReplyToId: 999 }))

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options()
    )

    expect(
      result.manifest.artifacts.find((a) => a.id === 'orphaned_replies')?.status
    ).toBe('present')
    expect(result.manifest.notes).toEqual([
      'Kept 1 review replies whose thread root was not found.'
    ])
    const threads = await readJson(join(contextDir, 'github/review_threads.json'))
    expect(threads).toMatchObject([
      { rootCommentId: 1001, replies: [{ commentId: 1002 }] }
    ])
  })

  it('notes when changed files are truncated', async () => {
    seedPullRequest(github)
    github.addPullRequest({ number: 42, headSha: 'head111', changedFiles: 3 })
    github.files.set(42, [
      changedFile('a.ts'),
      changedFile('b.ts'),
      changedFile('c.ts')
    ])

    const result = await collector.collect(
      parseReference('acme/widgets#42'),
      options({ maxFiles: 2 })
    )

    expect(await readJson(join(contextDir, 'github/files.json'))).toHaveLength(2)
    expect(result.manifest.notes).toEqual([
      'Changed files truncated to 2 of 3 (max_files=2).'
    ])
  })

  describe('collecting again into the same directory', () => {
    it('fails verification instead of reusing a stale required file', async () => {
      github.addIssue({ number: 7 })
      github.issueComments.set(7, [issueComment(801)])
      await collector.collect(parseReference('acme/widgets#7'), options())

      github.failOn('listIssueComments')
      const result = await collector.collect(
        parseReference('acme/widgets#7'),
        options()
      )

      expect(
        result.manifest.artifacts.find((a) => a.id === 'comments')?.status
      ).toBe('error')
      expect(result.manifest.success).toBe(false)
      expect(result.verificationError).toBe(
        'Required context file missing: github/comments.json (check token and network connectivity)'
      )
      await expect(
        access(join(contextDir, 'github/comments.json'))
      ).rejects.toThrow()
    })

    it('removes optional files this run did not produce', async () => {
      seedPullRequest(github)
      github.reviewComments.get(42)?.push(reviewComment(1003, { inReplyToId: 999 }))
      await collector.collect(parseReference('acme/widgets#42'), options())

      github.reviewComments.set(42, [reviewComment(1001)])
      github.failOn('getPullRequestDiff')
      await collector.collect(
        parseReference('acme/widgets#42'),
        options({ includeChecks: false })
      )

      for (const path of [
        'github/pr.diff',
        'github/orphaned_replies.json',
        'github/check_runs.json',
        'github/test-failure-logs.txt',
        'github/commit_status.json'
      ]) {
        await expect(access(join(contextDir, path))).rejects.toThrow()
      }
    })
  })

  it('looks an issue up only once when the kind is unknown', async () => {
    github.addIssue({ number: 7 })

    await collector.collect(parseReference('acme/widgets#7'), options())

    expect(github.calls.filter((c) => c === 'getIssue')).toHaveLength(1)
  })

  it('writes a comment listed twice only once', async () => {
    github.addIssue({ number: 7 })
    github.issueComments.set(7, [issueComment(801), issueComment(801)])

    await collector.collect(parseReference('acme/widgets#7'), options())

    expect(await readJson(join(contextDir, 'github/comments.json'))).toMatchObject([
      { id: 801 }
    ])
    expect(await readJson(join(contextDir, 'github/comments.json'))).toHaveLength(1)
  })
})
