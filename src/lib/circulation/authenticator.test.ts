import { describe, it, expect } from "vitest"
import { DEFAULT_DESK_CONFIG, type DeskConfig, type LibraryCredentials } from "../config.js"
import { FakeContext, FakePage, asContext, asPage, el } from "../../test/fake-page.js"
import { Authenticator } from "./authenticator.js"
import { SessionManager } from "./session-manager.js"
import {
  AuthenticationRequiredError,
  AuthenticationTimeoutError,
  ElementNotFoundError,
} from "./errors.js"

const BASE = "https://library.test"
const WORKSPACE = `${BASE}/workspace/issuance`
const LOGIN = `${BASE}/auth/login`
const SUBMIT_KEY = "role=button[name=/Sign in|Log in|Login|Войти/i]"
const CREDENTIALS: LibraryCredentials = { email: "desk@library.test", password: "test-password" }

async function setup(page: FakePage, credentials: LibraryCredentials | undefined = CREDENTIALS) {
  const config: DeskConfig = { ...DEFAULT_DESK_CONFIG, baseUrl: BASE, credentials }
  const context = new FakeContext([page])
  const session = new SessionManager({
    config,
    launcher: { launchPersistentContext: async () => asContext(context) },
  })
  await session.start()
  return { session, auth: new Authenticator(session) }
}

/** Library app whose workspace redirects to login until the form is submitted. */
function libraryPage(startUrl = LOGIN) {
  const state = { loggedIn: false }
  const page = new FakePage(startUrl)
  page.onGoto = (_url, p) => {
    if (!state.loggedIn) p.setUrl(LOGIN)
  }
  page.add("placeholder=E-mail", el("email"))
  page.add("placeholder=Password", el("password"))
  page.add(
    SUBMIT_KEY,
    el("sign-in", {
      onClick: (p) => {
        state.loggedIn = true
        p.setUrl(WORKSPACE)
      },
    })
  )
  page.set("placeholder=Search user", (p) =>
    state.loggedIn && p.url().startsWith(WORKSPACE) ? [el("reader-search")] : []
  )
  return { page, state }
}

describe("Authenticator", () => {
  describe("autoLoginIfNeeded", () => {
    it("does nothing away from the login page", async () => {
      const page = new FakePage(WORKSPACE)
      const { auth } = await setup(page)

      await auth.autoLoginIfNeeded(asPage(page))

      expect(page.actions).toEqual([])
    })

    it("requires configured credentials", async () => {
      const { page } = libraryPage()
      const { auth, session } = await setup(page, undefined)

      await expect(auth.autoLoginIfNeeded(asPage(page))).rejects.toBeInstanceOf(
        AuthenticationRequiredError
      )
      expect(page.actions).toEqual([])
      expect(session.phase).toBe("ready")
    })

    it("fills the form, submits and opens the workspace", async () => {
      const { page, state } = libraryPage()
      const { auth, session } = await setup(page)

      await auth.autoLoginIfNeeded(asPage(page))

      expect(state.loggedIn).toBe(true)
      expect(page.actions).toEqual([
        "fill:email=desk@library.test",
        "fill:password=test-password",
        "click:sign-in",
        `goto:${WORKSPACE}`,
      ])
      expect(session.phase).toBe("ready")
    })

    it("presses Enter in the password field when there is no submit control", async () => {
      const { page, state } = libraryPage()
      page.remove(SUBMIT_KEY)
      page.remove("placeholder=Password")
      page.add(
        "input[type='password']",
        el("password", {
          onPress: (key, p) => {
            if (key === "Enter") {
              state.loggedIn = true
              p.setUrl(WORKSPACE)
            }
          },
        })
      )
      const { auth } = await setup(page)

      await auth.autoLoginIfNeeded(asPage(page))

      expect(page.actions).toContain("press:password=Enter")
      expect(state.loggedIn).toBe(true)
    })

    it("times out when the login page never redirects", async () => {
      const { page } = libraryPage()
      page.remove(SUBMIT_KEY)
      page.add(SUBMIT_KEY, el("sign-in"))
      const { auth, session } = await setup(page)

      const error = await auth.autoLoginIfNeeded(asPage(page)).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(AuthenticationTimeoutError)
      expect(error).toMatchObject({ kind: "authentication-timeout" })
      expect(session.phase).toBe("ready")
    })

    it("names the strategies when no email field is found", async () => {
      const { page } = libraryPage()
      page.remove("placeholder=E-mail")
      const { auth } = await setup(page)

      const error = await auth.autoLoginIfNeeded(asPage(page)).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ElementNotFoundError)
      expect(error).toMatchObject({
        strategiesTried: [
          "placeholder=E-mail",
          "placeholder=Email",
          "placeholder=E-mail address",
          "label=E-mail",
          "label=Email",
          "input[type='email']",
          "input[name='email']",
          "input[name*='username']",
        ],
      })
    })

    it("waits for a login already in progress instead of submitting again", async () => {
      const { page } = libraryPage()
      page.at(3000, (p) => p.setUrl(WORKSPACE))
      const { auth, session } = await setup(page)
      session.beginLogin()

      await auth.autoLoginIfNeeded(asPage(page))

      expect(page.actions).toEqual([])
      expect(page.clock).toBe(3000)
    })

    it("gives up on a login in progress after 40 seconds", async () => {
      const { page } = libraryPage()
      const { auth, session } = await setup(page)
      session.beginLogin()

      await expect(auth.autoLoginIfNeeded(asPage(page))).rejects.toThrow(
        "Timed out waiting for a login already in progress"
      )
      expect(page.clock).toBe(40000)
    })
  })

  describe("ensureWorkspace", () => {
    it("logs in when the workspace redirects to login", async () => {
      const { page } = libraryPage(`${BASE}/catalog`)
      const { auth } = await setup(page)

      await auth.ensureWorkspace(asPage(page))

      expect(page.actions).toEqual([
        `goto:${WORKSPACE}`,
        "fill:email=desk@library.test",
        "fill:password=test-password",
        "click:sign-in",
        `goto:${WORKSPACE}`,
      ])
      expect(page.url()).toBe(WORKSPACE)
    })

    it("does nothing when the workspace is already open", async () => {
      const page = new FakePage(WORKSPACE).add("placeholder=Search user", el("reader-search"))
      const { auth } = await setup(page)

      await auth.ensureWorkspace(asPage(page))

      expect(page.actions).toEqual([])
      expect(page.clock).toBe(0)
    })

    it("gives up after two cycles", async () => {
      const page = new FakePage(WORKSPACE)
      const { auth } = await setup(page)

      await expect(auth.ensureWorkspace(asPage(page))).rejects.toThrow(
        "Could not find the issuance workspace (tried: placeholder=Search user)"
      )
      expect(page.clock).toBe(10000)
    })
  })
})
