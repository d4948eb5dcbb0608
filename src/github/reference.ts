import { InvalidReferenceError } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import type { GitHubClient } from './api.js'
import type {
  IssueInfo,
  RepoRef,
  ResolvedTargetRef,
  TargetRef
} from './types.js'

export type KindLookup = {
  ref: ResolvedTargetRef
  /** The issue record fetched to decide the kind, when a lookup was needed. */
  issue?: IssueInfo
}

const URL_PATTERN =
  /^https?:\/\/(?:www\.)?github\.com\/([^/\s]+)\/([^/\s]+)\/(pull|issues)\/(\d+)(?:[/?#].*)?$/
const SHORT_PATTERN = /^([^/\s#]+)\/([^/\s#]+)#(\d+)$/
const PATH_PATTERN = /^([^/\s]+)\/([^/\s]+)\/(pr|pull|issues)\/(\d+)$/
const NUMBER_PATTERN = /^#?(\d+)$/
const REPO_PATTERN = /^([^/\s]+)\/([^/\s]+)$/

const EXPECTED_FORMATS =
  'expected a GitHub URL, owner/repo#123, owner/repo/pr/123, or 123 with a repository hint'

/**
 * Parse a free-form issue or pull request reference.
 *
 * Only URLs and path forms carrying a `/pull/`, `/pr/` or `/issues/` marker
 * fix the kind; every other form is returned as `unknown` and must be
 * resolved with {@link resolveTargetKind}.
 */
export function parseReference(input: string, repoHint?: string): TargetRef {
  const ref = input.trim()

  if (!ref) {
    throw new InvalidReferenceError(`Empty reference (${EXPECTED_FORMATS})`)
  }

  const urlMatch = ref.match(URL_PATTERN)
  if (urlMatch) {
    return buildRef(
      urlMatch[1],
      urlMatch[2],
      urlMatch[4],
      urlMatch[3] === 'pull' ? 'pr' : 'issue',
      ref
    )
  }

  const shortMatch = ref.match(SHORT_PATTERN)
  if (shortMatch) {
    return buildRef(shortMatch[1], shortMatch[2], shortMatch[3], 'unknown', ref)
  }

  const pathMatch = ref.match(PATH_PATTERN)
  if (pathMatch) {
    return buildRef(
      pathMatch[1],
      pathMatch[2],
      pathMatch[4],
      pathMatch[3] === 'issues' ? 'issue' : 'pr',
      ref
    )
  }

  const numberMatch = ref.match(NUMBER_PATTERN)
  if (numberMatch) {
    if (!repoHint || !repoHint.trim()) {
      throw new InvalidReferenceError(
        `Reference '${ref}' needs a repository hint of the form owner/repo`
      )
    }
    const repo = parseRepoRef(repoHint)
    return buildRef(repo.owner, repo.repo, numberMatch[1], 'unknown', ref)
  }

  throw new InvalidReferenceError(
    `Invalid GitHub reference format: ${ref} (${EXPECTED_FORMATS})`
  )
}

export function parseRepoRef(input: string): RepoRef {
  const match = input.trim().match(REPO_PATTERN)
  if (!match) {
    throw new InvalidReferenceError(
      `Invalid repository format: '${input}' (expected owner/repo)`
    )
  }
  return { owner: match[1], repo: match[2] }
}

export function formatReference(ref: RepoRef & { number?: number }): string {
  const repo = `${ref.owner}/${ref.repo}`
  return ref.number === undefined ? repo : `${repo}#${ref.number}`
}

/**
 * Resolve an `unknown` kind with one lookup: the issues endpoint answers for
 * pull requests too and flags them.
 */
export async function resolveTargetKind(
  client: GitHubClient,
  ref: TargetRef
): Promise<ResolvedTargetRef> {
  return (await lookupTargetKind(client, ref)).ref
}

/** Like {@link resolveTargetKind}, but also hands back the fetched issue. */
export async function lookupTargetKind(
  client: GitHubClient,
  ref: TargetRef
): Promise<KindLookup> {
  if (ref.kind !== 'unknown') {
    return { ref: { ...ref, kind: ref.kind } }
  }

  logger.info(`Determining reference type for ${formatReference(ref)}`)
  const issue = await client.getIssue(ref)
  const kind = issue.isPullRequest ? 'pr' : 'issue'
  logger.info(`Reference type: ${kind}`)

  return { ref: { ...ref, kind }, issue }
}

function buildRef(
  owner: string,
  repo: string,
  numberText: string,
  kind: TargetRef['kind'],
  original: string
): TargetRef {
  const number = parseInt(numberText, 10)

  if (!owner || !repo) {
    throw new InvalidReferenceError(
      `Incomplete reference '${original}': owner and repo are required`
    )
  }

  if (!Number.isSafeInteger(number) || number < 1) {
    throw new InvalidReferenceError(
      `Invalid issue or pull request number in '${original}'`
    )
  }

  return { owner, repo, number, kind }
}
