import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname, join } from 'node:path'
import { z } from 'zod'

import { MANIFEST_FILE, MANIFEST_SCHEMA_VERSION } from '../config/constants.js'
import { CollectionError, errorMessage } from '../utils/errors.js'
import type { CollectionManifest } from './types.js'

const kindSchema = z.enum(['issue', 'pr'])

export const artifactSchema = z.object({
  id: z.string().min(1),
  path: z.string().min(1),
  required_for: z.array(kindSchema),
  status: z.enum(['present', 'missing', 'error']),
  format: z.enum(['json', 'text']),
  description: z.string()
})

export const manifestSchema = z.object({
  schema_version: z.literal(MANIFEST_SCHEMA_VERSION),
  provider: z.string(),
  kind: z.enum(['issue', 'pr', 'unknown']),
  ref: z.string(),
  owner: z.string(),
  repo: z.string(),
  number: z.number().int().positive(),
  collected_at: z.string(),
  success: z.boolean(),
  artifacts: z.array(artifactSchema),
  notes: z.array(z.string())
})

export type ManifestDocument = z.infer<typeof manifestSchema>

export function toManifestDocument(
  manifest: CollectionManifest
): ManifestDocument {
  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    provider: manifest.provider,
    kind: manifest.kind,
    ref: manifest.ref,
    owner: manifest.owner,
    repo: manifest.repo,
    number: manifest.number,
    collected_at: manifest.collectedAt,
    success: manifest.success,
    artifacts: manifest.artifacts.map((artifact) => ({
      id: artifact.id,
      path: artifact.path,
      required_for: artifact.requiredFor,
      status: artifact.status,
      format: artifact.format,
      description: artifact.description
    })),
    notes: manifest.notes
  }
}

export function fromManifestDocument(
  document: ManifestDocument
): CollectionManifest {
  return {
    schemaVersion: document.schema_version,
    provider: document.provider,
    kind: document.kind,
    ref: document.ref,
    owner: document.owner,
    repo: document.repo,
    number: document.number,
    collectedAt: document.collected_at,
    success: document.success,
    artifacts: document.artifacts.map((artifact) => ({
      id: artifact.id,
      path: artifact.path,
      requiredFor: artifact.required_for,
      status: artifact.status,
      format: artifact.format,
      description: artifact.description
    })),
    notes: document.notes
  }
}

/** Writes `manifest.json` into the context directory and returns its path. */
export async function writeManifest(
  contextDir: string,
  manifest: CollectionManifest
): Promise<string> {
  const path = join(contextDir, MANIFEST_FILE)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(
    path,
    `${JSON.stringify(toManifestDocument(manifest), null, 2)}\n`,
    'utf8'
  )
  return path
}

export async function readManifest(path: string): Promise<CollectionManifest> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    throw new CollectionError(
      `Failed to read manifest ${path}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    )
  }

  const parsed = manifestSchema.safeParse(raw)
  if (!parsed.success) {
    throw new CollectionError(
      `Invalid manifest ${path}: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    )
  }

  return fromManifestDocument(parsed.data)
}
