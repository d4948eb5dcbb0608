/**
 * Unit tests for reference parsing, src/github/reference.ts
 */
import { describe, expect, it, jest } from '@jest/globals'

jest.mock('@actions/core', () => jest.requireActual('../__fixtures__/core'))

import { FakeGitHub } from '../__fixtures__/github.js'
import {
  formatReference,
  lookupTargetKind,
  parseReference,
  parseRepoRef,
  resolveTargetKind
} from '../src/github/reference.js'
import { InvalidReferenceError } from '../src/utils/errors.js'

describe('parseReference', () => {
  it('parses owner/repo#N without a hint as unknown kind', () => {
    expect(parseReference('owner/repo#42')).toEqual({
      owner: 'owner',
      repo: 'repo',
      number: 42,
      kind: 'unknown'
    })
  })

  it('parses pull request URLs', () => {
    expect(
      parseReference('https://github.com/acme/widgets/pull/17/files')
    ).toEqual({ owner: 'acme', repo: 'widgets', number: 17, kind: 'pr' })
  })

  it('parses issue URLs with a fragment', () => {
    expect(
      parseReference('https://github.com/acme/widgets/issues/3#issuecomment-9')
    ).toEqual({ owner: 'acme', repo: 'widgets', number: 3, kind: 'issue' })
  })

  it('parses path forms with a kind marker', () => {
    expect(parseReference('acme/widgets/pr/5').kind).toBe('pr')
    expect(parseReference('acme/widgets/pull/5').kind).toBe('pr')
    expect(parseReference('acme/widgets/issues/5').kind).toBe('issue')
  })

  it('completes bare numbers from the repository hint', () => {
    expect(parseReference('#12', 'acme/widgets')).toEqual({
      owner: 'acme',
      repo: 'widgets',
      number: 12,
      kind: 'unknown'
    })
    expect(parseReference('  12  ', 'acme/widgets').number).toBe(12)
  })

  it('trims whitespace before matching', () => {
    expect(parseReference('  acme/widgets#8\n').number).toBe(8)
  })

  it('rejects bare numbers without a hint', () => {
    expect(() => parseReference('12')).toThrow(InvalidReferenceError)
  })

  it('rejects a malformed hint', () => {
    expect(() => parseReference('12', 'widgets')).toThrow(
      "Invalid repository format: 'widgets' (expected owner/repo)"
    )
  })

  it('rejects unrecognised formats and empty input', () => {
    expect(() => parseReference('not a ref')).toThrow(
      'Invalid GitHub reference format: not a ref'
    )
    expect(() => parseReference('   ')).toThrow(InvalidReferenceError)
    expect(() => parseReference('/widgets#4')).toThrow(InvalidReferenceError)
  })

  it('rejects issue number zero', () => {
    expect(() => parseReference('acme/widgets#0')).toThrow(
      "Invalid issue or pull request number in 'acme/widgets#0'"
    )
  })
})

describe('parseRepoRef and formatReference', () => {
  it('round-trips owner/repo and owner/repo#N', () => {
    expect(parseRepoRef('acme/widgets')).toEqual({
      owner: 'acme',
      repo: 'widgets'
    })
    expect(formatReference({ owner: 'acme', repo: 'widgets' })).toBe(
      'acme/widgets'
    )
    expect(
      formatReference({ owner: 'acme', repo: 'widgets', number: 42 })
    ).toBe('acme/widgets#42')
  })
})

describe('resolveTargetKind', () => {
  it('keeps a kind that is already known without calling GitHub', async () => {
    const github = new FakeGitHub()
    const ref = await resolveTargetKind(github, {
      owner: 'acme',
      repo: 'widgets',
      number: 42,
      kind: 'pr'
    })

    expect(ref.kind).toBe('pr')
    expect(github.calls).toEqual([])
  })

  it('resolves unknown numbers through the issues endpoint', async () => {
    const github = new FakeGitHub()
    github.addPullRequest({ number: 42 })
    github.addIssue({ number: 7 })

    const pr = await resolveTargetKind(github, parseReference('acme/widgets#42'))
    const issue = await resolveTargetKind(
      github,
      parseReference('acme/widgets#7')
    )

    expect(pr.kind).toBe('pr')
    expect(issue.kind).toBe('issue')
  })
})

describe('lookupTargetKind', () => {
  it('returns the issue it fetched to decide the kind', async () => {
    const github = new FakeGitHub()
    github.addIssue({ number: 7, title: 'Scheduler drops jobs' })

    const { ref, issue } = await lookupTargetKind(
      github,
      parseReference('acme/widgets#7')
    )

    expect(ref).toEqual({ owner: 'acme', repo: 'widgets', number: 7, kind: 'issue' })
    expect(issue?.title).toBe('Scheduler drops jobs')
  })

  it('fetches nothing when the kind is known', async () => {
    const github = new FakeGitHub()

    const lookup = await lookupTargetKind(
      github,
      parseReference('https://github.com/acme/widgets/issues/7')
    )

    expect(lookup).toEqual({
      ref: { owner: 'acme', repo: 'widgets', number: 7, kind: 'issue' }
    })
    expect(github.calls).toEqual([])
  })
})
