/**
 * Unit tests for artifact verification, src/collector/verifier.ts
 */
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals'
import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

jest.mock('@actions/core', () => jest.requireActual('../__fixtures__/core'))

import * as core from '../__fixtures__/core.js'
import type { Artifact } from '../src/collector/types.js'
import { verifyArtifacts } from '../src/collector/verifier.js'
import { VerificationError } from '../src/utils/errors.js'

const prMetadata: Artifact = {
  id: 'pr_metadata',
  path: 'github/pr.json',
  status: 'present',
  format: 'json',
  description: 'Pull request metadata and head/base refs.',
  requiredFor: ['pr']
}

const diff: Artifact = {
  id: 'diff',
  path: 'github/pr.diff',
  status: 'present',
  format: 'text',
  description: 'Unified diff for the pull request.',
  requiredFor: []
}

describe('verifyArtifacts', () => {
  let contextDir: string

  beforeEach(async () => {
    jest.clearAllMocks()
    contextDir = await mkdtemp(join(tmpdir(), 'verifier-'))
    await mkdir(join(contextDir, 'github'))
  })

  afterEach(async () => {
    await rm(contextDir, { recursive: true, force: true })
  })

  it('passes when required files exist and are non-empty', async () => {
    await writeFile(join(contextDir, 'github/pr.json'), '{"number":42}')

    await expect(
      verifyArtifacts(contextDir, 'pr', [prMetadata, diff])
    ).resolves.toBeUndefined()
  })

  it('fails on an empty required file with a token and network hint', async () => {
    await writeFile(join(contextDir, 'github/pr.json'), '')

    const result = verifyArtifacts(contextDir, 'pr', [prMetadata])

    await expect(result).rejects.toThrow(VerificationError)
    await expect(
      verifyArtifacts(contextDir, 'pr', [prMetadata])
    ).rejects.toThrow(
      'Required context file is empty: github/pr.json (check token and network connectivity)'
    )
  })

  it('fails on a missing required file', async () => {
    await expect(
      verifyArtifacts(contextDir, 'pr', [prMetadata])
    ).rejects.toThrow(
      'Required context file missing: github/pr.json (check token and network connectivity)'
    )
  })

  it('ignores artifacts not required for the kind', async () => {
    await expect(
      verifyArtifacts(contextDir, 'issue', [prMetadata, diff])
    ).resolves.toBeUndefined()
  })

  it('reports the failing path on the error', async () => {
    const error = await verifyArtifacts(contextDir, 'pr', [prMetadata]).catch(
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(VerificationError)
    expect(error instanceof VerificationError && error.path).toBe(
      'github/pr.json'
    )
  })

  it('only warns about optional JSON files that do not parse', async () => {
    const threads: Artifact = {
      id: 'review_threads',
      path: 'github/review_threads.json',
      status: 'present',
      format: 'json',
      description: 'Existing review threads for deduplication.',
      requiredFor: []
    }
    await writeFile(join(contextDir, 'github/pr.json'), '{}')
    await writeFile(join(contextDir, 'github/review_threads.json'), '[{')

    await expect(
      verifyArtifacts(contextDir, 'pr', [prMetadata, threads])
    ).resolves.toBeUndefined()
    expect(core.warning).toHaveBeenCalledTimes(1)
  })

  it('fails a required artifact this run did not write, even if a file exists', async () => {
    await writeFile(join(contextDir, 'github/pr.json'), '{"number":42}')

    await expect(
      verifyArtifacts(contextDir, 'pr', [{ ...prMetadata, status: 'error' }])
    ).rejects.toThrow(
      'Required context file missing: github/pr.json (check token and network connectivity)'
    )
  })
})
