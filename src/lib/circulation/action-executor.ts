/**
 * Drives the issue and return forms of the issuance workspace.
 *
 * Both flows run EnsureWorkspace → SelectTab → ResolveReader →
 * EnterBarcode → (issue: due date) → Submit → AwaitOutcome → Classify,
 * with CleanupOnFailure closing any modal left open by a failed step.
 * Callers hold the operation lock for the whole flow.
 */

import type { Locator, Page, Response } from "playwright-core"

import type { DeskConfig } from "../config.js"
import { dueDateFor } from "../date-utils.js"
import { createComponentLogger } from "../logger.js"
import type { Authenticator } from "./authenticator.js"
import { ReaderQueryMissingError, SecurityRejectionError } from "./errors.js"
import { findFirstVisible, firstVisibleText, isVisibleWithin, requireVisible } from "./locate.js"
import type { ReaderResolver } from "./reader-resolver.js"
import { classifyOutcome } from "./result-classifier.js"
import {
  API_PATHS,
  BARCODE_INPUT,
  CONFIRM_BUTTONS,
  CONFIRM_MODAL,
  CONFIRM_MODAL_CANCEL,
  DIALOG_CONTAINERS,
  DUE_DATE_INPUTS,
  DUE_DATE_LABEL_HINTS,
  DUE_DATE_PLACEHOLDER_HINTS,
  ERROR_INDICATORS,
  MODAL_CLOSE_CONTROLS,
  SUCCESS_INDICATORS,
  TAB_STRATEGIES,
} from "./selectors.js"
import type { ActionRequest, ActionResult, CapturedResponse, OperationKind } from "./types.js"

const log = createComponentLogger("actions")

// Form interaction
const TAB_PROBE_MS = 2000
const TAB_SETTLE_MS = 500
const BARCODE_TIMEOUT_MS = 5000
const DIALOG_SETTLE_MS = 500
const DIALOG_PROBE_MS = 1000
const DATE_FIELD_PROBE_MS = 2000
const DATE_LABEL_PROBE_MS = 1000
const DATE_COMMIT_WAIT_MS = 300
const CONFIRM_CLICK_TIMEOUT_MS = 3000

// Outcome
const OUTCOME_POLL_ATTEMPTS = 10
const OUTCOME_POLL_INTERVAL_MS = 500

// Return warning dialog
const CANCEL_PROBE_MS = 500
const TRANSFER_WARNING_PHRASE = "given to another reader"

// Cleanup
const CLOSE_PROBE_MS = 300

/**
 * Records the first response from one action endpoint.
 */
class ActionResponseCapture {
  private response: Response | null = null

  private readonly onResponse = (response: Response): void => {
    if (!this.response && response.url().includes(this.path)) {
      this.response = response
    }
  }

  constructor(
    private readonly page: Page,
    private readonly path: string
  ) {}

  attach(): void {
    this.page.on("response", this.onResponse)
  }

  detach(): void {
    this.page.off("response", this.onResponse)
  }

  get received(): boolean {
    return this.response !== null
  }

  async read(): Promise<CapturedResponse | null> {
    const response = this.response
    if (!response) return null

    let body: unknown = null
    try {
      body = await response.json()
    } catch {
      try {
        body = await response.text()
      } catch (error) {
        log.debug({ error }, "Action response body unavailable")
      }
    }
    return { url: response.url(), status: response.status(), body }
  }
}

export interface ActionExecutorOptions {
  /** Source of "today" for due dates */
  today?: () => Date
}

export class ActionExecutor {
  private readonly today: () => Date

  constructor(
    private readonly auth: Authenticator,
    private readonly resolver: ReaderResolver,
    private readonly config: DeskConfig,
    options: ActionExecutorOptions = {}
  ) {
    this.today = options.today ?? (() => new Date())
  }

  /**
   * Issue a book to the reader matching readerMatchQuery.
   */
  async issue(page: Page, request: ActionRequest): Promise<ActionResult> {
    await this.auth.ensureWorkspace(page)

    const query = request.readerMatchQuery?.trim()
    if (!query) {
      throw new ReaderQueryMissingError()
    }

    return this.withCleanup(page, async () => {
      await this.selectTab(page, "issue")
      await this.resolver.selectByMatch(page, query)

      const barcode = await this.enterBarcode(page, request.itemBarcode)
      // Enter on the barcode opens the issuance modal
      await barcode.press("Enter")
      await this.waitForDialog(page)

      const loanDays = request.loanDurationDays ?? this.config.maxLoanDays
      await this.fillDueDate(page, dueDateFor(this.today(), loanDays))

      return this.submitAndClassify(page, "issue", barcode)
    })
  }

  /**
   * Return a book. Selecting the reader first is optional; without it the
   * library decides who held the item.
   */
  async returnItem(page: Page, request: ActionRequest): Promise<ActionResult> {
    await this.auth.ensureWorkspace(page)

    return this.withCleanup(page, async () => {
      await this.selectTab(page, "return")

      const query = request.readerMatchQuery?.trim()
      if (query) {
        await this.resolver.selectByMatch(page, query)
      } else {
        log.warn({ barcode: request.itemBarcode }, "Returning without selecting a reader")
      }

      const barcode = await this.enterBarcode(page, request.itemBarcode)
      return this.submitAndClassify(page, "return", barcode)
    })
  }

  // ==========================================================================
  // Steps
  // ==========================================================================

  private async withCleanup(page: Page, flow: () => Promise<ActionResult>): Promise<ActionResult> {
    try {
      const result = await flow()
      if (!result.ok) {
        await this.cleanup(page)
      }
      return result
    } catch (error) {
      await this.cleanup(page)
      throw error
    }
  }

  private async selectTab(page: Page, kind: OperationKind): Promise<void> {
    const tab = await findFirstVisible(page, TAB_STRATEGIES[kind], TAB_PROBE_MS)
    if (!tab) {
      log.warn({ kind }, "Form toggle not found, continuing with the current form")
      return
    }
    await tab.click()
    await page.waitForTimeout(TAB_SETTLE_MS)
  }

  private async enterBarcode(page: Page, itemBarcode: string): Promise<Locator> {
    const input = await requireVisible(page, BARCODE_INPUT, BARCODE_TIMEOUT_MS, "barcode input")
    await input.clear()
    await input.fill(itemBarcode)
    return input
  }

  private async waitForDialog(page: Page): Promise<void> {
    await page.waitForTimeout(DIALOG_SETTLE_MS)
    const dialog = await findFirstVisible(page, DIALOG_CONTAINERS, DIALOG_PROBE_MS)
    if (!dialog) {
      log.warn("Issuance dialog not found, continuing")
    }
  }

  private async fillDueDate(page: Page, dueDate: string): Promise<void> {
    const field = (await this.findDueDateField(page)) ?? (await this.findDueDateFieldByLabel(page))
    if (!field) {
      log.warn({ dueDate }, "Due date field not found")
      return
    }

    await field.click()
    await field.press("Control+a")
    await field.fill(dueDate)
    await field.press("Tab")
    await page.waitForTimeout(DATE_COMMIT_WAIT_MS)
    if (await field.inputValue()) return

    // Some date pickers only commit on Enter
    await field.click()
    await field.press("Control+a")
    await field.fill(dueDate)
    await field.press("Enter")
    await page.waitForTimeout(DATE_COMMIT_WAIT_MS)
    if (!(await field.inputValue())) {
      log.warn({ dueDate }, "Due date did not stick")
    }
  }

  private async findDueDateField(page: Page): Promise<Locator | null> {
    for (const selector of DUE_DATE_INPUTS) {
      const candidate = page.locator(selector).first()
      if (!(await isVisibleWithin(candidate, DATE_FIELD_PROBE_MS))) continue

      const placeholder = ((await candidate.getAttribute("placeholder")) ?? "").toLowerCase()
      const type = (await candidate.getAttribute("type")) ?? ""
      if (type === "date" || DUE_DATE_PLACEHOLDER_HINTS.some((hint) => placeholder.includes(hint))) {
        return candidate
      }
    }
    return null
  }

  private async findDueDateFieldByLabel(page: Page): Promise<Locator | null> {
    const labels = page.locator("label")
    const count = await labels.count()

    for (let i = 0; i < count; i++) {
      const label = labels.nth(i)
      const text = (await label.innerText()).toLowerCase()
      if (!DUE_DATE_LABEL_HINTS.some((hint) => text.includes(hint))) continue

      const forId = await label.getAttribute("for")
      if (forId) {
        const byId = page.locator(`#${forId}`).first()
        if (await isVisibleWithin(byId, DATE_LABEL_PROBE_MS)) return byId
      }

      const sibling = label.locator("xpath=..").locator("input").first()
      if (await isVisibleWithin(sibling, DATE_LABEL_PROBE_MS)) return sibling
    }
    return null
  }

  private async submitAndClassify(page: Page, kind: OperationKind, barcode: Locator): Promise<ActionResult> {
    const capture = new ActionResponseCapture(page, API_PATHS[kind])
    capture.attach()
    try {
      await this.clickConfirm(page, kind, barcode)

      for (let attempt = 0; ; attempt++) {
        if (kind === "return") {
          await this.rejectTransferIfPrompted(page)
        }
        if (capture.received || attempt >= OUTCOME_POLL_ATTEMPTS) break
        await page.waitForTimeout(OUTCOME_POLL_INTERVAL_MS)
      }

      const response = await capture.read()
      const dom = {
        errorText: await firstVisibleText(page, ERROR_INDICATORS),
        successText: await firstVisibleText(page, SUCCESS_INDICATORS),
      }
      const barcodeCleared = await this.isCleared(barcode)

      const classification = classifyOutcome({
        operation: kind,
        response,
        dom,
        barcodeCleared,
        ambiguousPolicy: this.config.ambiguousOutcome,
      })

      const logContext = { kind, outcome: classification.outcome, status: response?.status }
      if (classification.ok) {
        log.info(logContext, classification.message)
      } else {
        log.warn(logContext, classification.message)
      }

      return {
        ok: classification.ok,
        message: classification.message,
        outcome: classification.outcome,
        securityRejection: false,
        rawResponse: response?.body,
      }
    } finally {
      capture.detach()
    }
  }

  private async clickConfirm(page: Page, kind: OperationKind, barcode: Locator): Promise<void> {
    for (const selector of CONFIRM_BUTTONS[kind]) {
      const buttons = page.locator(selector)
      const count = await buttons.count()

      for (let i = 0; i < count; i++) {
        const button = buttons.nth(i)
        try {
          if (!(await button.isVisible())) continue
          // Form toggles share the label and carry aria-selected
          if ((await button.getAttribute("aria-selected")) !== null) continue
          await button.click({ timeout: CONFIRM_CLICK_TIMEOUT_MS })
          return
        } catch (error) {
          log.debug({ error, selector }, "Confirm candidate not clickable")
        }
      }
    }

    log.debug({ kind }, "No confirm button found, submitting with Enter")
    if (kind === "issue") {
      await page.keyboard.press("Enter")
    } else {
      await barcode.press("Enter")
    }
  }

  /**
   * The library asks for confirmation before returning a book that is on
   * loan to someone else. That prompt is always cancelled, never confirmed.
   */
  private async rejectTransferIfPrompted(page: Page): Promise<void> {
    const modal = page.locator(CONFIRM_MODAL).first()
    if (!(await modal.isVisible())) return

    const text = ((await modal.textContent()) ?? "").toLowerCase()
    const isTransferWarning =
      text.includes(TRANSFER_WARNING_PHRASE) || (text.includes("warning") && text.includes("book"))
    if (!isTransferWarning) return

    log.warn("Return blocked: book is issued to another reader")

    const cancel = await findFirstVisible(page, CONFIRM_MODAL_CANCEL, CANCEL_PROBE_MS)
    if (cancel) {
      await cancel.click()
    } else {
      await page.keyboard.press("Escape")
    }

    throw new SecurityRejectionError()
  }

  private async isCleared(barcode: Locator): Promise<boolean> {
    try {
      return (await barcode.inputValue()) === ""
    } catch {
      return false
    }
  }

  /**
   * Close whatever modal a failed step left open.
   */
  private async cleanup(page: Page): Promise<void> {
    try {
      const close = await findFirstVisible(page, MODAL_CLOSE_CONTROLS, CLOSE_PROBE_MS)
      if (close) {
        await close.click()
      }
      await page.keyboard.press("Escape")
    } catch (error) {
      log.debug({ error }, "Cleanup after failed action did not complete")
    }
  }
}
