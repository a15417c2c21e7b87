/**
 * Operation boundary of the circulation desk.
 *
 * Every call starts the browser if needed, takes the shared operation lock,
 * makes sure a page is open and then hands over to one component. Errors
 * never escape: they come back as `{ ok: false, message, errorKind }`.
 */

import { errors, type Page } from "playwright-core"

import { clampLoanDays, getDeskConfig, type DeskConfig } from "../config.js"
import { createComponentLogger } from "../logger.js"
import { ActionExecutor } from "./action-executor.js"
import { Authenticator } from "./authenticator.js"
import { CirculationError, ElementNotFoundError } from "./errors.js"
import { ReaderResolver } from "./reader-resolver.js"
import { SessionManager, type BrowserLauncher } from "./session-manager.js"
import type {
  ActionResult,
  ErrorKind,
  ManualLoginResult,
  OperationKind,
  SearchResult,
  SessionHealth,
} from "./types.js"

const log = createComponentLogger("desk")

export interface IssueRequest {
  itemBarcode: string
  readerId?: string
  /** Clamped to [1, maxLoanDays]; defaults to maxLoanDays */
  loanDurationDays?: number
  readerMatchQuery?: string
}

export interface ReturnRequest {
  itemBarcode: string
  readerId?: string
  readerMatchQuery?: string
}

/** What the HTTP routes and the CLI need from the desk. */
export interface DeskOperations {
  search(query: string, limit?: number): Promise<SearchResult>
  issue(request: IssueRequest): Promise<ActionResult>
  returnItem(request: ReturnRequest): Promise<ActionResult>
  health(): Promise<SessionHealth>
  manualLogin(): Promise<ManualLoginResult>
}

export interface CirculationDeskOptions {
  config?: DeskConfig
  launcher?: BrowserLauncher
  today?: () => Date
}

interface FailureDetails {
  message: string
  errorKind: ErrorKind
}

/**
 * Map any thrown value to a message and a stable error kind.
 */
export function describeFailure(error: unknown): FailureDetails {
  if (error instanceof CirculationError) {
    return { message: error.message, errorKind: error.kind }
  }
  if (error instanceof errors.TimeoutError) {
    return { message: error.message, errorKind: "operation-timeout" }
  }
  return {
    message: error instanceof Error ? error.message : String(error),
    errorKind: "unexpected",
  }
}

function logFailure(operation: string, error: unknown, details: FailureDetails): void {
  if (error instanceof ElementNotFoundError) {
    // Usually means the library UI changed
    log.error({ operation, element: error.element, tried: error.strategiesTried }, details.message)
  } else if (details.errorKind === "unexpected") {
    log.error({ operation, error }, "Unexpected desk failure")
  } else {
    log.warn({ operation, errorKind: details.errorKind }, details.message)
  }
}

export class CirculationDesk implements DeskOperations {
  readonly config: DeskConfig
  readonly session: SessionManager
  readonly auth: Authenticator
  readonly resolver: ReaderResolver
  readonly executor: ActionExecutor

  constructor(options: CirculationDeskOptions = {}) {
    this.config = options.config ?? getDeskConfig()
    this.session = new SessionManager({ config: this.config, launcher: options.launcher })
    this.auth = new Authenticator(this.session)
    this.resolver = new ReaderResolver(this.auth)
    this.executor = new ActionExecutor(this.auth, this.resolver, this.config, { today: options.today })
  }

  async start(): Promise<void> {
    await this.session.start()
  }

  async stop(): Promise<void> {
    await this.session.stop()
  }

  async search(query: string, limit: number = this.config.searchLimit): Promise<SearchResult> {
    try {
      const results = await this.withPage((page) => this.resolver.search(page, query.trim(), limit))
      return { ok: true, results }
    } catch (error) {
      const details = describeFailure(error)
      logFailure("search", error, details)
      return { ok: false, results: [], error: details.message, errorKind: details.errorKind }
    }
  }

  async issue(request: IssueRequest): Promise<ActionResult> {
    const loanDurationDays = clampLoanDays(request.loanDurationDays, this.config.maxLoanDays)
    return this.runAction("issue", (page) =>
      this.executor.issue(page, { ...request, operationKind: "issue", loanDurationDays })
    )
  }

  async returnItem(request: ReturnRequest): Promise<ActionResult> {
    return this.runAction("return", (page) =>
      this.executor.returnItem(page, { ...request, operationKind: "return" })
    )
  }

  async health(): Promise<SessionHealth> {
    return this.session.health()
  }

  async manualLogin(): Promise<ManualLoginResult> {
    try {
      return await this.session.manualLogin()
    } catch (error) {
      const details = describeFailure(error)
      logFailure("manual-login", error, details)
      return { ok: false, message: details.message, url: null }
    }
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async withPage<T>(work: (page: Page) => Promise<T>): Promise<T> {
    // Unlocked check first so start() takes the lock on its own
    if (!this.session.isInitialized()) {
      await this.session.start()
    }
    return this.session.lock.run(async () => work(await this.session.ensurePage()))
  }

  private async runAction(
    operation: OperationKind,
    work: (page: Page) => Promise<ActionResult>
  ): Promise<ActionResult> {
    try {
      return await this.withPage(work)
    } catch (error) {
      const details = describeFailure(error)
      logFailure(operation, error, details)
      const securityRejection = details.errorKind === "security-rejection"
      return {
        ok: false,
        message: details.message,
        outcome: securityRejection ? "security-rejection" : "failure",
        securityRejection,
        errorKind: details.errorKind,
      }
    }
  }
}

let shutdownHooksRegistered = false

/**
 * Close the browser when the process is asked to stop, after running
 * `beforeStop` (e.g. a shutdown notification). Safe to call more than once.
 */
export function registerShutdownHooks(
  desk: Pick<CirculationDesk, "stop">,
  beforeStop?: () => Promise<void>
): void {
  if (shutdownHooksRegistered) {
    return
  }
  shutdownHooksRegistered = true

  const cleanup = async () => {
    try {
      await beforeStop?.()
      await desk.stop()
    } catch (error) {
      log.warn({ error }, "Error stopping desk during shutdown")
    }
  }

  process.on("SIGINT", async () => {
    await cleanup()
    process.exit(0)
  })

  process.on("SIGTERM", async () => {
    await cleanup()
    process.exit(0)
  })
}
