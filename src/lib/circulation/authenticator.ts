/**
 * Keeps the shared page logged in to the library system.
 *
 * Login is detected by URL: the app redirects to the login path whenever
 * the session cookie is missing or expired.
 */

import type { Locator, Page } from "playwright-core"

import { workspaceUrl, type DeskConfig, type LibraryCredentials } from "../config.js"
import { createComponentLogger } from "../logger.js"
import { AuthenticationRequiredError, AuthenticationTimeoutError, ElementNotFoundError } from "./errors.js"
import { findFirstVisible, requireVisible } from "./locate.js"
import {
  describeStrategy,
  LOGIN_EMAIL_FIELDS,
  LOGIN_PASSWORD_FIELDS,
  LOGIN_SUBMIT_CONTROLS,
  READER_SEARCH_INPUT,
} from "./selectors.js"
import type { SessionManager } from "./session-manager.js"

const log = createComponentLogger("auth")

// Timeouts
const FIELD_PROBE_TIMEOUT_MS = 1500
const LOGIN_REDIRECT_TIMEOUT_MS = 30000
const NAVIGATION_TIMEOUT_MS = 30000
const WORKSPACE_READY_TIMEOUT_MS = 5000

// Waiting on a login already in progress
const LOGIN_POLL_ATTEMPTS = 40
const LOGIN_POLL_INTERVAL_MS = 1000

const WORKSPACE_CYCLES = 2

export class Authenticator {
  constructor(private readonly session: SessionManager) {}

  private get config(): DeskConfig {
    return this.session.config
  }

  isOnLoginPage(page: Page): boolean {
    return page.url().includes(this.config.loginPath)
  }

  isOnWorkspace(page: Page): boolean {
    return page.url().includes(this.config.workspacePath)
  }

  /**
   * Log in with the configured credentials if the page sits on the login
   * boundary. No-op otherwise.
   */
  async autoLoginIfNeeded(page: Page): Promise<void> {
    if (!this.isOnLoginPage(page)) return

    if (this.session.isLoginInProgress()) {
      await this.waitForLoginInProgress(page)
      return
    }

    const credentials = this.config.credentials
    if (!credentials) {
      throw new AuthenticationRequiredError()
    }

    this.session.beginLogin()
    try {
      await this.submitLoginForm(page, credentials)
      log.info("Logged in to the library system")
    } finally {
      this.session.endLogin()
    }
  }

  /**
   * Bring the page to the issuance workspace, logging in on the way if
   * needed. Tries twice before giving up.
   */
  async ensureWorkspace(page: Page): Promise<void> {
    for (let cycle = 1; cycle <= WORKSPACE_CYCLES; cycle++) {
      await this.autoLoginIfNeeded(page)

      if (!this.isOnWorkspace(page)) {
        await page.goto(workspaceUrl(this.config), {
          waitUntil: "domcontentloaded",
          timeout: NAVIGATION_TIMEOUT_MS,
        })
      }

      const ready = await findFirstVisible(page, READER_SEARCH_INPUT, WORKSPACE_READY_TIMEOUT_MS)
      if (ready) return

      log.warn({ cycle, url: page.url() }, "Workspace not ready")
    }

    throw new ElementNotFoundError(
      "the issuance workspace",
      READER_SEARCH_INPUT.map(describeStrategy)
    )
  }

  private async waitForLoginInProgress(page: Page): Promise<void> {
    log.info("Login already in progress, waiting")
    for (let attempt = 0; attempt < LOGIN_POLL_ATTEMPTS; attempt++) {
      if (!this.isOnLoginPage(page)) return
      await page.waitForTimeout(LOGIN_POLL_INTERVAL_MS)
    }
    throw new AuthenticationTimeoutError("Timed out waiting for a login already in progress")
  }

  private async submitLoginForm(page: Page, credentials: LibraryCredentials): Promise<void> {
    const email = await requireVisible(page, LOGIN_EMAIL_FIELDS, FIELD_PROBE_TIMEOUT_MS, "login email field")
    await email.fill(credentials.email)

    const password = await requireVisible(
      page,
      LOGIN_PASSWORD_FIELDS,
      FIELD_PROBE_TIMEOUT_MS,
      "login password field"
    )
    await password.fill(credentials.password)

    await this.submit(page, password)

    const loginPath = this.config.loginPath
    try {
      await page.waitForURL((url) => !url.href.includes(loginPath), {
        timeout: LOGIN_REDIRECT_TIMEOUT_MS,
      })
    } catch {
      throw new AuthenticationTimeoutError(
        `Still on the login page ${LOGIN_REDIRECT_TIMEOUT_MS / 1000}s after submitting credentials`
      )
    }

    try {
      await page.goto(workspaceUrl(this.config), {
        waitUntil: "networkidle",
        timeout: NAVIGATION_TIMEOUT_MS,
      })
    } catch (error) {
      // The workspace check that follows decides whether this mattered
      log.warn({ error }, "Navigation to workspace after login failed")
    }
  }

  private async submit(page: Page, password: Locator): Promise<void> {
    const submit = await findFirstVisible(page, LOGIN_SUBMIT_CONTROLS, FIELD_PROBE_TIMEOUT_MS)
    if (submit) {
      await submit.click()
    } else {
      log.debug("No submit control found, pressing Enter")
      await password.press("Enter")
    }
  }
}
