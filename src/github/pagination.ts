import { PAGE_SIZE } from '../config/constants.js'
import type { Page, PageRequest } from './types.js'

export type PageFetcher<T> = (request: PageRequest) => Promise<Page<T>>

/**
 * Yields pages until one comes back shorter than the page size or the
 * response carries no `next` link. Callers can stop early with `break`.
 */
export async function* iteratePages<T>(
  fetchPage: PageFetcher<T>,
  perPage: number = PAGE_SIZE
): AsyncGenerator<T[], void, undefined> {
  let page = 1

  while (true) {
    const result = await fetchPage({ page, perPage })

    if (result.items.length > 0) {
      yield result.items
    }

    if (result.items.length < perPage || !result.hasNextPage) {
      return
    }

    page++
  }
}

export async function collectAll<T>(
  fetchPage: PageFetcher<T>,
  options: { perPage?: number; limit?: number } = {}
): Promise<T[]> {
  const items: T[] = []
  const limit = options.limit ?? 0

  for await (const pageItems of iteratePages(fetchPage, options.perPage)) {
    items.push(...pageItems)
    if (limit > 0 && items.length >= limit) {
      return items.slice(0, limit)
    }
  }

  return items
}

export function hasNextLink(linkHeader: string | undefined): boolean {
  if (!linkHeader) {
    return false
  }
  return linkHeader.split(',').some((part) => /rel="next"/.test(part))
}
