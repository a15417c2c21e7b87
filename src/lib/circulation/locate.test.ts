import { describe, it, expect } from "vitest"
import { FakePage, asPage, el } from "../../test/fake-page.js"
import { findFirstVisible, firstVisibleText, isVisibleWithin, requireVisible } from "./locate.js"
import { ElementNotFoundError } from "./errors.js"
import { LOGIN_EMAIL_FIELDS, LOGIN_SUBMIT_CONTROLS, type SelectorStrategy } from "./selectors.js"

describe("findFirstVisible", () => {
  it("returns the first strategy with a visible match", async () => {
    const page = new FakePage()
      .add("placeholder=Email", el("email-by-placeholder"))
      .add("input[type='email']", el("email-by-type"))

    const found = await findFirstVisible(asPage(page), LOGIN_EMAIL_FIELDS, 1500)

    expect(found).not.toBeNull()
    await found?.fill("desk@library.test")
    expect(page.actions).toEqual(["fill:email-by-placeholder=desk@library.test"])
  })

  it("skips strategies whose matches stay hidden", async () => {
    const page = new FakePage()
      .add("placeholder=E-mail", el("hidden-email", { visible: false }))
      .add("label=Email", el("labelled-email"))

    const found = await findFirstVisible(asPage(page), LOGIN_EMAIL_FIELDS, 1500)
    await found?.click()

    expect(page.actions).toEqual(["click:labelled-email"])
  })

  it("spends at most the per-strategy timeout on each miss", async () => {
    const page = new FakePage()

    const found = await findFirstVisible(asPage(page), LOGIN_EMAIL_FIELDS, 1500)

    expect(found).toBeNull()
    expect(page.clock).toBe(LOGIN_EMAIL_FIELDS.length * 1500)
  })

  it("picks up an element that appears during the wait", async () => {
    const page = new FakePage().set("placeholder=E-mail", (p) =>
      p.clock >= 800 ? [el("late-email")] : []
    )

    const found = await findFirstVisible(asPage(page), LOGIN_EMAIL_FIELDS, 1500)
    await found?.click()

    expect(page.actions).toEqual(["click:late-email"])
    expect(page.clock).toBe(800)
  })

  it("resolves role strategies by accessible name", async () => {
    const page = new FakePage().add(
      "role=button[name=/Sign in|Log in|Login|Войти/i]",
      el("sign-in")
    )

    const found = await findFirstVisible(asPage(page), LOGIN_SUBMIT_CONTROLS, 1500)
    await found?.click()

    expect(page.actions).toEqual(["click:sign-in"])
  })
})

describe("requireVisible", () => {
  it("names every strategy tried when nothing matches", async () => {
    const strategies: SelectorStrategy[] = [
      { kind: "placeholder", value: "Enter barcode" },
      { kind: "css", value: "input#barcode" },
    ]

    const error = await requireVisible(asPage(new FakePage()), strategies, 100, "barcode input").catch(
      (e: unknown) => e
    )

    expect(error).toBeInstanceOf(ElementNotFoundError)
    expect(error).toMatchObject({
      kind: "element-not-found",
      message: "Could not find barcode input (tried: placeholder=Enter barcode, input#barcode)",
    })
  })
})

describe("isVisibleWithin", () => {
  it("returns false on timeout instead of throwing", async () => {
    const page = new FakePage()

    expect(await isVisibleWithin(asPage(page).locator(".missing"), 300)).toBe(false)
    expect(page.clock).toBe(300)
  })
})

describe("firstVisibleText", () => {
  it("returns trimmed text of the first visible indicator", async () => {
    const page = new FakePage()
      .add(".error", el("stale", { visible: false, text: "Old error" }))
      .add(".toast-error", el("toast", { text: "  Item is already on loan  " }))

    const text = await firstVisibleText(asPage(page), [
      { kind: "css", value: ".error" },
      { kind: "css", value: ".toast-error" },
    ])

    expect(text).toBe("Item is already on loan")
    expect(page.clock).toBe(0)
  })

  it("falls back to the selector when the indicator has no text", async () => {
    const page = new FakePage().add(".success", el("badge"))

    expect(await firstVisibleText(asPage(page), [{ kind: "css", value: ".success" }])).toBe(".success")
  })

  it("returns null when nothing is visible", async () => {
    expect(await firstVisibleText(asPage(new FakePage()), [{ kind: "text", value: "error" }])).toBeNull()
  })
})
