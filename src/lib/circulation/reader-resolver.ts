/**
 * Finds readers and selects one in the issuance workspace.
 *
 * Search results are read from the app's own API traffic rather than the
 * DOM. Selection goes through the reader dropdown, which first renders a
 * generic list and only later swaps in the filtered one, so an option is
 * clicked only once its text actually contains the query.
 */

import type { Locator, Page } from "playwright-core"

import { createComponentLogger } from "../logger.js"
import type { Authenticator } from "./authenticator.js"
import { ReaderNotFoundError, ReaderNotSelectedError } from "./errors.js"
import { isVisibleWithin, requireVisible, toLocator } from "./locate.js"
import { ReaderTraffic, readerIdFromOnclick } from "./reader-traffic.js"
import {
  ANY_OPTION,
  DROPDOWN_OPTION,
  OPEN_DROPDOWN,
  OPTION_CONTENT,
  READER_CARD_TITLE,
  READER_DETAILS_CARD,
  READER_DETAILS_LABELS,
  READER_DETAILS_ROWS,
  READER_NOT_SELECTED_WARNING,
  READER_SEARCH_INPUT,
  RESULT_ID_ELEMENTS,
  RESULT_ITEM_SELECTORS,
} from "./selectors.js"
import type { ReaderRecord } from "./types.js"

const log = createComponentLogger("readers")

export const DEFAULT_SEARCH_WAIT_MS = 5000

// Search
const INPUT_TIMEOUT_MS = 5000
const SEARCH_TYPE_DELAY_MS = 30
const SEARCH_SETTLE_MS = 200
const SEARCH_POLL_INTERVAL_MS = 300
const SEARCH_EXTRA_WAIT_MS = 1000
const MAX_PROFILE_CLICKS = 5
const PROFILE_CLICK_TIMEOUT_MS = 2000
const PROFILE_WAIT_MS = 400
const PROFILE_CLOSE_WAIT_MS = 200

// Selection
const SELECT_FOCUS_WAIT_MS = 500
const SELECT_TYPE_DELAY_MS = 50
const DROPDOWN_POLL_ATTEMPTS = 20
const DROPDOWN_POLL_INTERVAL_MS = 250
const OPTION_POLL_ATTEMPTS = 10
const OPTION_POLL_INTERVAL_MS = 500
const OPTION_CONTENT_TIMEOUT_MS = 1000
const OPTION_CLICK_TIMEOUT_MS = 3000
// The details card renders a while after the click; check three times
const VERIFY_DELAYS_MS = [2500, 2000, 500]

// Verification probes
const WARNING_PROBE_MS = 300
const CARD_PROBE_MS = 500
const MIN_TITLE_LENGTH = 3
const MIN_DETAIL_ROWS = 3

export class ReaderResolver {
  constructor(private readonly auth: Authenticator) {}

  /**
   * Search readers by free text (name, card barcode, email).
   * Returns at most maxResults records, in the order the app returned them.
   */
  async search(
    page: Page,
    query: string,
    maxResults: number,
    waitMs: number = DEFAULT_SEARCH_WAIT_MS
  ): Promise<ReaderRecord[]> {
    await this.auth.ensureWorkspace(page)
    const input = await requireVisible(page, READER_SEARCH_INPUT, INPUT_TIMEOUT_MS, "reader search input")

    const traffic = new ReaderTraffic(page, query)
    traffic.attach()
    try {
      await input.click()
      await input.clear()
      await input.pressSequentially(query, { delay: SEARCH_TYPE_DELAY_MS })
      await page.waitForTimeout(SEARCH_SETTLE_MS)
      traffic.markSubmitted()
      await input.press("Enter")

      let readers = await this.awaitResults(page, traffic, waitMs)
      if (readers.length === 0) {
        await page.waitForTimeout(SEARCH_EXTRA_WAIT_MS)
        readers = await traffic.readers()
      }

      const results = readers.slice(0, maxResults).map((reader) => ({ ...reader }))
      if (results.length > 0) {
        await this.enrichFromAttributes(page, results)
        await this.enrichFromProfiles(page, results, traffic)
      }

      log.info({ query, found: readers.length, returned: results.length }, "Reader search finished")
      return results
    } finally {
      traffic.detach()
    }
  }

  /**
   * Type the query into the reader picker and click the option that
   * matches it. Throws ReaderNotFoundError when no option matches and
   * ReaderNotSelectedError when the click does not stick.
   */
  async selectByMatch(page: Page, query: string): Promise<void> {
    const needle = query.trim()
    const input = await requireVisible(page, READER_SEARCH_INPUT, INPUT_TIMEOUT_MS, "reader search input")

    await input.click()
    await page.waitForTimeout(SELECT_FOCUS_WAIT_MS)
    await input.clear()
    if ((await input.inputValue()) !== "") {
      await input.press("Control+a")
      await input.press("Delete")
    }
    await input.click()
    await input.pressSequentially(needle, { delay: SELECT_TYPE_DELAY_MS })

    if (!(await this.waitForDropdown(page))) {
      log.debug({ query: needle }, "Dropdown did not open, looking for options anyway")
    }

    const option = await this.findMatchingOption(page, needle)
    if (!option) {
      throw new ReaderNotFoundError(needle)
    }

    await this.clickOption(option)

    for (const delay of VERIFY_DELAYS_MS) {
      await page.waitForTimeout(delay)
      if (await this.verifySelected(page, needle)) {
        log.info({ query: needle }, "Reader selected")
        return
      }
    }

    throw new ReaderNotSelectedError(needle)
  }

  /**
   * Whether the workspace currently shows a selected reader. With
   * `expected`, the details shown must also mention it (case-insensitive),
   * so a card left over from an earlier reader does not count.
   */
  async verifySelected(page: Page, expected?: string): Promise<boolean> {
    const warning = toLocator(page, READER_NOT_SELECTED_WARNING).first()
    if (await isVisibleWithin(warning, WARNING_PROBE_MS)) {
      return false
    }

    const needle = expected?.trim().toLowerCase() ?? ""

    const card = page.locator(READER_DETAILS_CARD).first()
    if ((await isVisibleWithin(card, CARD_PROBE_MS)) && (await this.cardNamesReader(card))) {
      return this.mentions([card], needle)
    }

    const rows = page.locator(READER_DETAILS_ROWS)
    const rowCount = await rows.count()
    if (rowCount < MIN_DETAIL_ROWS) return false
    return this.mentions(
      Array.from({ length: rowCount }, (_, i) => rows.nth(i)),
      needle
    )
  }

  private async cardNamesReader(card: Locator): Promise<boolean> {
    for (const label of READER_DETAILS_LABELS) {
      if (await card.getByText(label).first().isVisible()) {
        return true
      }
    }

    const title = card.locator(READER_CARD_TITLE).first()
    if (!(await isVisibleWithin(title, CARD_PROBE_MS))) return false
    try {
      const text = (await title.innerText({ timeout: CARD_PROBE_MS })).trim()
      return text.length >= MIN_TITLE_LENGTH
    } catch (error) {
      log.debug({ error }, "Reader card title went away")
      return false
    }
  }

  private async mentions(parts: Locator[], needle: string): Promise<boolean> {
    if (!needle) return true
    const texts: string[] = []
    for (const part of parts) {
      try {
        texts.push(await part.innerText({ timeout: CARD_PROBE_MS }))
      } catch (error) {
        log.debug({ error }, "Could not read reader details")
      }
    }
    return texts.join(" ").toLowerCase().includes(needle)
  }

  // ==========================================================================
  // Search helpers
  // ==========================================================================

  private async awaitResults(page: Page, traffic: ReaderTraffic, waitMs: number): Promise<ReaderRecord[]> {
    const attempts = Math.max(1, Math.ceil(waitMs / SEARCH_POLL_INTERVAL_MS))
    for (let attempt = 0; attempt < attempts; attempt++) {
      const readers = await traffic.readers()
      if (readers.length > 0) return readers
      await page.waitForTimeout(SEARCH_POLL_INTERVAL_MS)
    }
    return []
  }

  private async enrichFromAttributes(page: Page, results: ReaderRecord[]): Promise<void> {
    const items = page.locator(RESULT_ID_ELEMENTS)
    const count = Math.min(await items.count(), results.length)

    for (let i = 0; i < count; i++) {
      if (results[i].externalId) continue
      try {
        const item = items.nth(i)
        const id =
          (await item.getAttribute("data-reader-id")) ||
          (await item.getAttribute("data-id")) ||
          readerIdFromOnclick(await item.getAttribute("onclick"))
        if (id) {
          results[i] = { ...results[i], externalId: id }
        }
      } catch (error) {
        log.debug({ error, index: i }, "Could not read reader id from result element")
      }
    }
  }

  /**
   * Open profiles of results still missing an id; the profile request
   * carries it.
   */
  private async enrichFromProfiles(
    page: Page,
    results: ReaderRecord[],
    traffic: ReaderTraffic
  ): Promise<void> {
    const missing = results
      .map((reader, index) => (reader.externalId ? -1 : index))
      .filter((index) => index >= 0)
      .slice(0, MAX_PROFILE_CLICKS)
    if (missing.length === 0) return

    const items = await this.findResultItems(page, results.length)
    if (!items) {
      log.debug({ missing: missing.length }, "No result elements to open for reader ids")
      return
    }

    for (const index of missing) {
      try {
        traffic.resetProfiles()
        const item = items.nth(index)
        await item.scrollIntoViewIfNeeded()
        await item.click({ timeout: PROFILE_CLICK_TIMEOUT_MS })
        await page.waitForTimeout(PROFILE_WAIT_MS)

        const id = await traffic.takeProfileId()
        if (id) {
          results[index] = { ...results[index], externalId: id }
        }

        await page.keyboard.press("Escape")
        await page.waitForTimeout(PROFILE_CLOSE_WAIT_MS)
      } catch (error) {
        log.debug({ error, index }, "Could not open reader profile")
      }
    }
  }

  private async findResultItems(page: Page, needed: number): Promise<Locator | null> {
    for (const selector of RESULT_ITEM_SELECTORS) {
      const items = page.locator(selector)
      if ((await items.count()) >= needed) {
        return items
      }
    }
    return null
  }

  // ==========================================================================
  // Selection helpers
  // ==========================================================================

  private async waitForDropdown(page: Page): Promise<boolean> {
    const dropdown = page.locator(OPEN_DROPDOWN).first()
    for (let attempt = 0; attempt < DROPDOWN_POLL_ATTEMPTS; attempt++) {
      if (await dropdown.isVisible()) return true
      await page.waitForTimeout(DROPDOWN_POLL_INTERVAL_MS)
    }
    return false
  }

  private async findMatchingOption(page: Page, needle: string): Promise<Locator | null> {
    const lowered = needle.toLowerCase()

    for (let attempt = 0; attempt < OPTION_POLL_ATTEMPTS; attempt++) {
      let options = page.locator(DROPDOWN_OPTION)
      if ((await options.count()) === 0) {
        options = page.locator(ANY_OPTION)
      }

      const count = await options.count()
      for (let i = 0; i < count; i++) {
        const option = options.nth(i)
        try {
          if (!(await option.isVisible())) continue
          const title = (await option.getAttribute("title")) ?? ""
          const text = await option.innerText()
          if (`${title} ${text}`.toLowerCase().includes(lowered)) {
            return option
          }
        } catch {
          // Option re-rendered mid-read; the next poll sees the new list
        }
      }

      await page.waitForTimeout(OPTION_POLL_INTERVAL_MS)
    }

    return null
  }

  private async clickOption(option: Locator): Promise<void> {
    const content = option.locator(OPTION_CONTENT).first()
    try {
      await content.waitFor({ state: "visible", timeout: OPTION_CONTENT_TIMEOUT_MS })
      await content.click({ timeout: OPTION_CLICK_TIMEOUT_MS })
      return
    } catch (error) {
      log.debug({ error }, "Option content not clickable, clicking the option")
    }

    try {
      await option.click({ timeout: OPTION_CLICK_TIMEOUT_MS })
    } catch (error) {
      log.debug({ error }, "Option click failed, dispatching a DOM click")
      await option.dispatchEvent("click")
    }
  }
}
