/**
 * Owns the one persistent browser context and its active page.
 *
 * A single Chromium profile is shared by every desk operation, so launch,
 * teardown and all page work go through one OperationLock. start() and
 * stop() take the lock themselves; ensurePage() must be called by code
 * already holding it.
 */

import { chromium, type BrowserContext, type BrowserType, type Page } from "playwright-core"

import { loginUrl, workspaceUrl, type DeskConfig } from "../config.js"
import { createComponentLogger } from "../logger.js"
import { InitializationError } from "./errors.js"
import { findFirstVisible } from "./locate.js"
import { createOperationLock, type OperationLock } from "./operation-lock.js"
import { READER_SEARCH_INPUT } from "./selectors.js"
import type { ManualLoginResult, SessionHealth, SessionPhase } from "./types.js"

const log = createComponentLogger("session")

type PersistentContextOptions = NonNullable<Parameters<BrowserType["launchPersistentContext"]>[1]>

/** The part of Playwright's BrowserType the session needs. */
export interface BrowserLauncher {
  launchPersistentContext(userDataDir: string, options?: PersistentContextOptions): Promise<BrowserContext>
}

// Timeouts
const NAVIGATION_TIMEOUT_MS = 30000
const HEALTH_NAVIGATION_TIMEOUT_MS = 15000
const HEALTH_MARKER_TIMEOUT_MS = 2000

// Hides navigator.webdriver from the library's bot checks
const LAUNCH_ARGS = ["--disable-blink-features=AutomationControlled"]

export interface SessionManagerOptions {
  config: DeskConfig
  launcher?: BrowserLauncher
  lock?: OperationLock
}

export class SessionManager {
  readonly lock: OperationLock
  readonly config: DeskConfig

  private readonly launcher: BrowserLauncher
  private context: BrowserContext | null = null
  private page: Page | null = null
  private currentPhase: SessionPhase = "stopped"

  constructor(options: SessionManagerOptions) {
    this.config = options.config
    this.launcher = options.launcher ?? chromium
    this.lock = options.lock ?? createOperationLock()
  }

  get phase(): SessionPhase {
    return this.currentPhase
  }

  /** Read-only check, safe to call without the lock. */
  isInitialized(): boolean {
    return this.currentPhase !== "stopped"
  }

  isLoginInProgress(): boolean {
    return this.currentPhase === "logging-in"
  }

  /** Called by the authenticator, under the lock. */
  beginLogin(): void {
    this.currentPhase = "logging-in"
  }

  endLogin(): void {
    if (this.currentPhase === "logging-in") {
      this.currentPhase = "ready"
    }
  }

  /**
   * Launch the browser unless it is already running.
   */
  async start(headless: boolean = this.config.headless): Promise<void> {
    if (this.isInitialized()) return

    await this.lock.run(async () => {
      if (this.isInitialized()) return
      await this.launch(headless)
    })
  }

  /**
   * Close the browser context. Safe to call when never started.
   */
  async stop(): Promise<void> {
    await this.lock.run(async () => {
      const context = this.context
      this.context = null
      this.page = null
      this.currentPhase = "stopped"

      if (context) {
        try {
          await context.close()
          log.info("Browser session stopped")
        } catch (error) {
          log.warn({ error }, "Error closing browser context")
        }
      }
    })
  }

  /**
   * Return a live page, launching or reopening as needed.
   * Must be called while holding the lock.
   */
  async ensurePage(): Promise<Page> {
    if (!this.isInitialized()) {
      await this.launch(this.config.headless)
    }

    if (this.page && !this.page.isClosed()) {
      return this.page
    }

    if (!this.context) {
      // Next operation relaunches from scratch
      this.currentPhase = "stopped"
      throw new InitializationError("Browser context lost")
    }

    log.info("Active page was closed, opening a new one")
    this.page = await this.context.newPage()
    return this.page
  }

  /**
   * Best-effort status report. Never launches a browser and never throws.
   */
  async health(): Promise<SessionHealth> {
    if (!this.isInitialized()) {
      return {
        ok: false,
        pageOpen: false,
        url: null,
        loggedIn: false,
        message: "Browser session is not started",
      }
    }

    return this.lock.run(async () => {
      const page = this.page
      if (!page || page.isClosed()) {
        return { ok: false, pageOpen: false, url: null, loggedIn: false, message: "No open page" }
      }

      try {
        const url = page.url()
        // Leave the login page alone: an operator may be typing into it
        if (url.includes(this.config.loginPath)) {
          return { ok: true, pageOpen: true, url, loggedIn: false, message: "Login required" }
        }

        if (!url.includes(this.config.workspacePath)) {
          await page.goto(workspaceUrl(this.config), {
            waitUntil: "domcontentloaded",
            timeout: HEALTH_NAVIGATION_TIMEOUT_MS,
          })
        }

        const onLoginPage = page.url().includes(this.config.loginPath)
        const marker = onLoginPage
          ? null
          : await findFirstVisible(page, READER_SEARCH_INPUT, HEALTH_MARKER_TIMEOUT_MS)
        const loggedIn = marker !== null

        return {
          ok: true,
          pageOpen: true,
          url: page.url(),
          loggedIn,
          message: loggedIn ? "Session ready" : "Login required",
        }
      } catch (error) {
        log.warn({ error }, "Health check failed")
        return {
          ok: false,
          pageOpen: !page.isClosed(),
          url: page.isClosed() ? null : page.url(),
          loggedIn: false,
          message: error instanceof Error ? error.message : String(error),
        }
      }
    })
  }

  /**
   * Open the workspace so an operator can log in by hand in the browser window.
   */
  async manualLogin(): Promise<ManualLoginResult> {
    await this.start()

    return this.lock.run(async () => {
      const page = await this.ensurePage()
      await page.goto(workspaceUrl(this.config), {
        waitUntil: "domcontentloaded",
        timeout: NAVIGATION_TIMEOUT_MS,
      })

      const url = page.url()
      const needsLogin = url.includes(this.config.loginPath)
      log.info({ url, needsLogin }, "Opened workspace for manual login")

      return {
        ok: true,
        message: needsLogin
          ? `Log in at ${loginUrl(this.config)} in the browser window`
          : "Already logged in",
        url,
      }
    })
  }

  private async launch(headless: boolean): Promise<void> {
    if (!this.config.baseUrl) {
      throw new InitializationError("LIBRARY_BASE_URL is not configured")
    }

    let context: BrowserContext | null = null
    try {
      context = await this.launcher.launchPersistentContext(this.config.profileDir, {
        headless,
        args: LAUNCH_ARGS,
        executablePath: this.config.executablePath,
        channel: this.config.channel,
        viewport: { width: 1366, height: 900 },
      })

      const page = context.pages()[0] ?? (await context.newPage())

      const launched = context
      launched.on("close", () => {
        if (this.context === launched) {
          log.warn("Browser context closed unexpectedly")
          this.context = null
          this.page = null
        }
      })

      this.context = context
      this.page = page
      this.currentPhase = "ready"
      log.info({ headless, profileDir: this.config.profileDir }, "Browser session started")
    } catch (error) {
      this.context = null
      this.page = null
      this.currentPhase = "stopped"

      if (context) {
        try {
          await context.close()
        } catch (closeError) {
          log.warn({ error: closeError }, "Error closing partially launched context")
        }
      }

      log.error({ error }, "Failed to start browser session")
      const message = error instanceof Error ? error.message : String(error)
      throw new InitializationError(`Failed to start browser: ${message}`)
    }
  }
}
