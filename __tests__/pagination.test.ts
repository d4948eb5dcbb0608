/**
 * Unit tests for page iteration, src/github/pagination.ts
 */
import { describe, expect, it } from '@jest/globals'

import {
  collectAll,
  hasNextLink,
  iteratePages
} from '../src/github/pagination.js'
import type { Page, PageRequest } from '../src/github/types.js'

function pager(total: number, withNextLinks = true) {
  const requests: PageRequest[] = []
  const items = Array.from({ length: total }, (_, i) => i + 1)

  const fetchPage = async (request: PageRequest): Promise<Page<number>> => {
    requests.push(request)
    const start = (request.page - 1) * request.perPage
    return {
      items: items.slice(start, start + request.perPage),
      hasNextPage: withNextLinks && start + request.perPage < total
    }
  }

  return { fetchPage, requests }
}

describe('iteratePages', () => {
  it('stops after a short page', async () => {
    const { fetchPage, requests } = pager(5)
    const pages: number[][] = []

    for await (const page of iteratePages(fetchPage, 2)) {
      pages.push(page)
    }

    expect(pages).toEqual([[1, 2], [3, 4], [5]])
    expect(requests.map((r) => r.page)).toEqual([1, 2, 3])
  })

  it('stops on a full page without a next link', async () => {
    const { fetchPage, requests } = pager(4, false)
    const pages: number[][] = []

    for await (const page of iteratePages(fetchPage, 2)) {
      pages.push(page)
    }

    expect(pages).toEqual([[1, 2]])
    expect(requests).toHaveLength(1)
  })

  it('relies on the next link when the total is a multiple of the page size', async () => {
    const { fetchPage, requests } = pager(4)
    const items = await collectAll(fetchPage, { perPage: 2 })

    expect(items).toEqual([1, 2, 3, 4])
    expect(requests).toHaveLength(2)
  })

  it('fetches nothing more once the caller breaks', async () => {
    const { fetchPage, requests } = pager(10)

    for await (const page of iteratePages(fetchPage, 3)) {
      if (page.includes(2)) {
        break
      }
    }

    expect(requests).toHaveLength(1)
  })
})

describe('collectAll', () => {
  it('trims the result to the limit', async () => {
    const { fetchPage, requests } = pager(10)

    expect(await collectAll(fetchPage, { perPage: 3, limit: 4 })).toEqual([
      1, 2, 3, 4
    ])
    expect(requests).toHaveLength(2)
  })

  it('returns an empty list for an empty resource', async () => {
    const { fetchPage } = pager(0)
    expect(await collectAll(fetchPage)).toEqual([])
  })
})

describe('hasNextLink', () => {
  it('detects rel="next" in a Link header', () => {
    expect(
      hasNextLink(
        '<https://api.github.com/x?page=2>; rel="next", <https://api.github.com/x?page=5>; rel="last"'
      )
    ).toBe(true)
    expect(
      hasNextLink('<https://api.github.com/x?page=1>; rel="prev"')
    ).toBe(false)
    expect(hasNextLink(undefined)).toBe(false)
  })
})
