import { readFile, stat } from 'node:fs/promises'
import { join } from 'node:path'

import type { TargetKind } from '../github/types.js'
import { VerificationError, errorMessage } from '../utils/errors.js'
import { logger } from '../utils/logger.js'
import type { Artifact } from './types.js'

const REMEDIATION = 'check token and network connectivity'

/**
 * Confirm every artifact required for `kind` was written by this run and is
 * non-empty under `contextDir`. An artifact recorded as `missing` or `error`
 * fails even if an older file is still on disk.
 */
export async function verifyArtifacts(
  contextDir: string,
  kind: TargetKind,
  artifacts: Artifact[]
): Promise<void> {
  for (const artifact of artifacts) {
    const fullPath = join(contextDir, artifact.path)

    if (artifact.requiredFor.includes(kind)) {
      const size =
        artifact.status === 'present' ? await fileSize(fullPath) : undefined
      if (size === undefined) {
        throw new VerificationError(
          `Required context file missing: ${artifact.path} (${REMEDIATION})`,
          artifact.path
        )
      }
      if (size === 0) {
        throw new VerificationError(
          `Required context file is empty: ${artifact.path} (${REMEDIATION})`,
          artifact.path
        )
      }
      continue
    }

    if (artifact.status === 'present' && artifact.format === 'json') {
      await warnOnInvalidJson(fullPath, artifact.path)
    }
  }

  logger.debug(`Verified ${artifacts.length} artifacts for ${kind}`)
}

async function fileSize(path: string): Promise<number | undefined> {
  try {
    const info = await stat(path)
    return info.isFile() ? info.size : undefined
  } catch {
    return undefined
  }
}

async function warnOnInvalidJson(
  fullPath: string,
  relativePath: string
): Promise<void> {
  try {
    JSON.parse(await readFile(fullPath, 'utf8'))
  } catch (error) {
    logger.warning(
      `Optional context file ${relativePath} is not valid JSON: ${errorMessage(error)}`
    )
  }
}
