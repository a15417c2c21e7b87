/**
 * Observes the library app's reader API traffic while a search runs.
 *
 * Listeners only record what passes by; parsing happens when the resolver
 * polls, so no work is left running after detach().
 */

import type { Page, Request, Response } from "playwright-core"

import { API_PATHS } from "./selectors.js"
import type { ReaderField, ReaderRecord } from "./types.js"

const ID_KEYS = ["parentId", "readerId", "id", "reader_id"] as const
const LIST_KEYS = ["result", "results", "data", "items", "list"] as const
const SEARCH_VALUE_KEYS = ["searchValue", "query", "q", "search"] as const

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function idValue(value: unknown): string | null {
  if (typeof value === "number" && Number.isFinite(value)) return String(value)
  if (typeof value === "string" && value.trim()) return value.trim()
  return null
}

export function isSearchUrl(url: string): boolean {
  return API_PATHS.readerSearch.some((path) => url.includes(path))
}

export function isProfileUrl(url: string): boolean {
  return url.includes(API_PATHS.readerProfile) && !isSearchUrl(url)
}

/**
 * The reader list of a search payload: the body itself, or the first
 * array under one of the usual envelope keys.
 */
export function extractReaderList(body: unknown): unknown[] {
  if (Array.isArray(body)) return body
  if (isRecord(body)) {
    for (const key of LIST_KEYS) {
      const candidate = body[key]
      if (Array.isArray(candidate)) return candidate
    }
  }
  return []
}

export function toReaderRecord(raw: unknown): ReaderRecord | null {
  if (!isRecord(raw)) return null

  let externalId: string | null = null
  for (const key of ID_KEYS) {
    externalId = idValue(raw[key])
    if (externalId) break
  }

  const fields: ReaderField[] = []
  if (Array.isArray(raw.fieldModels)) {
    for (const field of raw.fieldModels) {
      if (!isRecord(field) || typeof field.code !== "string") continue
      const value = field.value
      fields.push({
        code: field.code,
        value: value === null || value === undefined ? "" : String(value),
      })
    }
  }

  return { externalId, fields }
}

export function readerIdFromUrl(url: string): string | null {
  const match = url.match(/[?&]readerId=([^&#]+)/)
  return match ? decodeURIComponent(match[1]) : null
}

export function readerIdFromPostData(postData: string | null): string | null {
  if (!postData) return null
  try {
    const parsed: unknown = JSON.parse(postData)
    if (isRecord(parsed)) {
      return idValue(parsed.readerId) ?? idValue(parsed.id)
    }
  } catch {
    // Not JSON; try form encoding
  }
  return idValue(new URLSearchParams(postData).get("readerId"))
}

/**
 * The text a search request asked for, from its URL or its JSON or
 * form-encoded body. Null when the request does not say.
 */
export function searchValueOf(url: string, postData: string | null): string | null {
  const queryIndex = url.indexOf("?")
  if (queryIndex >= 0) {
    const params = new URLSearchParams(url.slice(queryIndex + 1).split("#")[0])
    for (const key of SEARCH_VALUE_KEYS) {
      const value = params.get(key)
      if (value !== null) return value
    }
  }
  if (!postData) return null
  try {
    const parsed: unknown = JSON.parse(postData)
    if (isRecord(parsed)) {
      for (const key of SEARCH_VALUE_KEYS) {
        const value = parsed[key]
        if (typeof value === "string") return value
      }
      return null
    }
  } catch {
    // Not JSON; try form encoding
  }
  const form = new URLSearchParams(postData)
  for (const key of SEARCH_VALUE_KEYS) {
    const value = form.get(key)
    if (value !== null) return value
  }
  return null
}

function normalizeQuery(value: string): string {
  return value.trim().toLowerCase()
}

export function readerIdFromBody(body: unknown): string | null {
  if (!isRecord(body)) return null
  return idValue(body.readerId) ?? idValue(body.id)
}

export function readerIdFromOnclick(onclick: string | null): string | null {
  const match = onclick?.match(/readerId[=:]\s*(\d+)/)
  return match ? match[1] : null
}

async function readJson(response: Response): Promise<unknown> {
  try {
    const body: unknown = await response.json()
    return body
  } catch {
    return null
  }
}

interface SearchCapture {
  response: Response
  /** Position of the originating request among search requests, -1 if unseen */
  requestOrder: number
  searchValue: string | null
  afterSubmit: boolean
}

/**
 * Search traffic is matched against one query. Autocomplete fires a
 * request per typed prefix, so a payload counts only when its request
 * asked for the full query, or, for requests that do not name their
 * search text, when it arrived after markSubmitted(). Among those, the
 * payload of the latest request wins regardless of arrival order.
 */
export class ReaderTraffic {
  private readonly query: string
  private readonly searchRequests: Request[] = []
  private readonly searchResponses: SearchCapture[] = []
  private parsedSearchResponses = 0
  private submitted = false
  private latestReaders: ReaderRecord[] = []
  private latestOrder = Number.NEGATIVE_INFINITY
  private profileResponses: Response[] = []
  private profileIds: string[] = []

  private readonly onRequest = (request: Request): void => {
    const url = request.url()
    if (isSearchUrl(url)) {
      this.searchRequests.push(request)
      return
    }
    if (!isProfileUrl(url)) return
    const id = readerIdFromUrl(url) ?? readerIdFromPostData(request.postData())
    if (id) this.profileIds.push(id)
  }

  private readonly onResponse = (response: Response): void => {
    const url = response.url()
    if (isSearchUrl(url)) {
      const status = response.status()
      if (status < 200 || status >= 300) return
      const request = response.request()
      this.searchResponses.push({
        response,
        requestOrder: this.searchRequests.indexOf(request),
        searchValue: searchValueOf(request.url(), request.postData()),
        afterSubmit: this.submitted,
      })
    } else if (isProfileUrl(url)) {
      this.profileResponses.push(response)
    }
  }

  constructor(
    private readonly page: Page,
    query: string
  ) {
    this.query = normalizeQuery(query)
  }

  attach(): void {
    this.page.on("request", this.onRequest)
    this.page.on("response", this.onResponse)
  }

  detach(): void {
    this.page.off("request", this.onRequest)
    this.page.off("response", this.onResponse)
  }

  /** Call right before the search is submitted. */
  markSubmitted(): void {
    this.submitted = true
  }

  /**
   * Readers from the latest non-empty payload that answers the query.
   */
  async readers(): Promise<ReaderRecord[]> {
    while (this.parsedSearchResponses < this.searchResponses.length) {
      const capture = this.searchResponses[this.parsedSearchResponses++]
      if (!this.answersQuery(capture)) continue
      const list = extractReaderList(await readJson(capture.response))
        .map(toReaderRecord)
        .filter((reader): reader is ReaderRecord => reader !== null)
      if (list.length > 0 && capture.requestOrder >= this.latestOrder) {
        this.latestReaders = list
        this.latestOrder = capture.requestOrder
      }
    }
    return this.latestReaders
  }

  private answersQuery(capture: SearchCapture): boolean {
    if (capture.searchValue === null) return capture.afterSubmit
    return normalizeQuery(capture.searchValue) === this.query
  }

  /** Forget profile traffic seen so far, before opening the next profile. */
  resetProfiles(): void {
    this.profileResponses = []
    this.profileIds = []
  }

  /**
   * First reader id revealed by profile traffic since the last reset.
   */
  async takeProfileId(): Promise<string | null> {
    if (this.profileIds.length > 0) {
      return this.profileIds[0]
    }
    for (const response of this.profileResponses) {
      const id = readerIdFromUrl(response.url()) ?? readerIdFromBody(await readJson(response))
      if (id) return id
    }
    return null
  }
}
